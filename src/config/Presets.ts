// Presets.ts — Reusable configuration presets for the Gauss-Jordan engine

import type { InverterConfig } from '../core/InverterConfig';

/**
 * NOTE:
 * - Presets never change the pivoting rule, only tolerance, logging and the
 *   unit-pivot scaling policy.
 * - Pass a preset straight to `new GaussJordanEngine(preset)` or `invert(m, preset)`.
 */

/** Prints every recorded operation as it is applied */
export const AuditPreset: InverterConfig = {
    tolerance: 1e-10,
    skipUnitPivotScale: false,
    log: {
        name: 'GaussJordanAudit',
        verbose: true,
        level: 'debug',
    },
};

/** Omits SCALE entries for pivots that are already 1 */
export const CompactLogPreset: InverterConfig = {
    tolerance: 1e-10,
    skipUnitPivotScale: true,
    log: {
        name: 'GaussJordanCompact',
        verbose: false,
        level: 'info',
    },
};

/**
 * Helper to make a preset on the fly
 */
export function makeInverterPreset(opts: Partial<InverterConfig> = {}): InverterConfig {
    return {
        tolerance: opts.tolerance ?? 1e-10,
        minSize: opts.minSize ?? 2,
        maxSize: opts.maxSize ?? 10,
        skipUnitPivotScale: opts.skipUnitPivotScale ?? false,
        log: {
            name: opts.log?.name ?? 'GaussJordanPreset',
            verbose: opts.log?.verbose ?? false,
            level: opts.log?.level ?? 'info',
        },
    };
}
