// GaussJordan.ts - Gauss-Jordan inversion with partial pivoting and a replayable step log

import {
    normalizeConfig,
    type InverterConfig,
    type ResolvedInverterConfig,
} from './InverterConfig';
import { OperationLog, type OperationLogSnapshot } from './OperationLog';
import {
    addMultipleOperation,
    applyRowOperation,
    scaleOperation,
    swapOperation,
    type RowOperation,
} from './RowOperation';
import { WorkingMatrix } from './WorkingMatrix';
import { NumericOverflowError } from './InversionErrors';

/* =========================
 * Result types
 * ========================= */

export interface InversionSuccess {
    kind: 'success';
    inverse: number[][];
    log: OperationLogSnapshot;
    /** (-1)^swaps × product of pivots */
    determinant: number;
}

export interface InversionSingular {
    kind: 'singular';
    /** Operations applied before the failing column */
    log: OperationLogSnapshot;
    /** 0-based column whose best pivot candidate fell below tolerance */
    pivotColumn: number;
}

export type InversionResult = InversionSuccess | InversionSingular;

export type EliminationOutcome =
    | { kind: 'reduced'; log: OperationLogSnapshot; determinant: number }
    | InversionSingular;

export function isSingular(result: InversionResult): result is InversionSingular {
    return result.kind === 'singular';
}

/* =========================
 * Engine
 * ========================= */

export class GaussJordanEngine {
    public readonly config: ResolvedInverterConfig;
    public readonly tolerance: number;
    public readonly verbose: boolean;
    public readonly name: string;

    constructor(config: InverterConfig = {}) {
        const cfg = normalizeConfig(config);
        this.config = cfg;
        this.tolerance = cfg.tolerance;
        this.verbose = cfg.log.verbose;
        this.name = cfg.log.name;
    }

    /**
     * Invert `matrix`. Throws InvalidDimensionError / InvalidValueError before any
     * elimination when the input is unusable; a singular matrix is a returned result.
     */
    invert(matrix: unknown): InversionResult {
        const working = WorkingMatrix.initialize(matrix, this.config);
        const outcome = this.eliminate(working);

        if (outcome.kind === 'singular') {
            if (this.verbose) {
                console.warn(`⚠️ ${this.name}: ${working.size}x${working.size} matrix is singular (column ${outcome.pivotColumn + 1}, ${outcome.log.length} steps)`);
            }
            return outcome;
        }

        if (this.verbose) {
            console.log(`✅ ${this.name}: inverted ${working.size}x${working.size} matrix in ${outcome.log.length} steps (det ≈ ${outcome.determinant.toPrecision(6)})`);
        }
        return {
            kind: 'success',
            inverse: working.extractRightHalf(),
            log: outcome.log,
            determinant: outcome.determinant,
        };
    }

    /**
     * Reduce the left half of `working` to the identity in place.
     * Each operation is recorded before it is applied. Throws NumericOverflowError
     * when a pivot candidate or the final matrix holds a non-finite value.
     */
    eliminate(working: WorkingMatrix): EliminationOutcome {
        const n = working.size;
        const tol = this.tolerance;
        const log = new OperationLog();
        let determinant = 1;

        const apply = (op: RowOperation) => {
            log.record(op);
            applyRowOperation(working, op);
            if (this.verbose && this.config.log.level === 'debug') {
                console.log(`   ${String(log.length).padStart(3)}. ${op.notation.padEnd(12)} ${op.description}`);
            }
        };

        for (let c = 0; c < n; c++) {
            // Partial pivot: largest magnitude at or below the diagonal
            let pivotRow = c;
            let best = -1;
            for (let r = c; r < n; r++) {
                const v = Math.abs(working.get(r, c));
                if (!Number.isFinite(v)) {
                    throw new NumericOverflowError(`non-finite value in row ${r + 1}, column ${c + 1} during elimination`, c);
                }
                if (v > best) { best = v; pivotRow = r; }
            }
            if (best < tol) {
                return { kind: 'singular', log: log.snapshot(), pivotColumn: c };
            }

            if (pivotRow !== c) {
                apply(swapOperation(c, pivotRow));
                determinant = -determinant;
            }

            const pivot = working.get(c, c);
            determinant *= pivot;
            if (!(this.config.skipUnitPivotScale && Math.abs(pivot - 1) <= tol)) {
                apply(scaleOperation(c, 1 / pivot));
            }

            for (let r = 0; r < n; r++) {
                if (r === c) continue;
                const entry = working.get(r, c);
                if (Math.abs(entry) <= tol) continue;
                apply(addMultipleOperation(r, c, -entry));
            }
        }

        for (let r = 0; r < n; r++) {
            for (let j = 0; j < working.width; j++) {
                if (!Number.isFinite(working.get(r, j))) {
                    throw new NumericOverflowError(`non-finite value in row ${r + 1}, column ${j + 1} after elimination`, n - 1);
                }
            }
        }
        return { kind: 'reduced', log: log.snapshot(), determinant };
    }
}

/** One-shot inversion with an engine built from `config` */
export function invert(matrix: unknown, config?: InverterConfig): InversionResult {
    return new GaussJordanEngine(config).invert(matrix);
}
