// InverterConfig.ts - Configuration interface, defaults and helpers for the Gauss-Jordan engine

/* =========== Types =========== */

export type LogLevel = 'info' | 'debug';

export interface InverterConfig {
    /** Pivot magnitudes below this are treated as zero (singular) */
    tolerance?: number;

    /** Smallest accepted matrix size N */
    minSize?: number;

    /** Largest accepted matrix size N */
    maxSize?: number;

    /**
     * When true, a pivot already within tolerance of 1 is not scaled and no SCALE
     * entry is recorded. Default false: every pivot column logs its SCALE step.
     */
    skipUnitPivotScale?: boolean;

    /** Logging options */
    log?: {
        name?: string;
        verbose?: boolean;
        level?: LogLevel;
    };
}

export type ResolvedInverterConfig = Required<Omit<InverterConfig, 'log'>> & {
    log: Required<NonNullable<InverterConfig['log']>>;
};

/* =========== Defaults =========== */

export const DEFAULT_TOLERANCE = 1e-10;
export const DEFAULT_MIN_SIZE = 2;
export const DEFAULT_MAX_SIZE = 10;

export const defaultInverterConfig: ResolvedInverterConfig = {
    tolerance: DEFAULT_TOLERANCE,
    minSize: DEFAULT_MIN_SIZE,
    maxSize: DEFAULT_MAX_SIZE,
    skipUnitPivotScale: false,
    log: { name: 'GaussJordan', verbose: false, level: 'info' },
};

/* =========== Helpers =========== */

/**
 * Merge a partial config over the defaults. Rejects settings that would make the
 * engine meaningless (non-positive tolerance, inverted size range).
 */
export function normalizeConfig(cfg: InverterConfig = {}): ResolvedInverterConfig {
    const d = defaultInverterConfig;
    const merged: ResolvedInverterConfig = {
        tolerance: cfg.tolerance ?? d.tolerance,
        minSize: cfg.minSize ?? d.minSize,
        maxSize: cfg.maxSize ?? d.maxSize,
        skipUnitPivotScale: cfg.skipUnitPivotScale ?? d.skipUnitPivotScale,
        log: {
            name: cfg.log?.name ?? d.log.name,
            verbose: cfg.log?.verbose ?? d.log.verbose,
            level: cfg.log?.level ?? d.log.level,
        },
    };

    if (!Number.isFinite(merged.tolerance) || merged.tolerance <= 0) {
        throw new RangeError(`tolerance must be a positive finite number, got ${merged.tolerance}`);
    }
    if (!Number.isInteger(merged.minSize) || !Number.isInteger(merged.maxSize)
        || merged.minSize < 1 || merged.maxSize < merged.minSize) {
        throw new RangeError(`invalid size range [${merged.minSize}, ${merged.maxSize}]`);
    }
    return merged;
}
