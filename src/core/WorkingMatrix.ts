// WorkingMatrix.ts — the augmented [A | I] store mutated during elimination

import { Matrix, assertFinite, assertRect } from './Matrix';
import { IndexOutOfRangeError, InvalidDimensionError } from './InversionErrors';
import { DEFAULT_MAX_SIZE, DEFAULT_MIN_SIZE } from './InverterConfig';

export interface SizeBounds {
    minSize?: number;
    maxSize?: number;
}

/**
 * Validates `matrix` as a square grid of finite numbers whose size lies in the bounds.
 * Shape problems are reported before value problems.
 */
export function assertInvertibleShape(matrix: unknown, bounds: SizeBounds = {}): asserts matrix is number[][] {
    const lo = bounds.minSize ?? DEFAULT_MIN_SIZE;
    const hi = bounds.maxSize ?? DEFAULT_MAX_SIZE;

    assertRect(matrix, 'matrix');
    const n = matrix.length;
    if (matrix[0].length !== n) {
        throw new InvalidDimensionError(`matrix must be square, got ${n}x${matrix[0].length}`);
    }
    if (n < lo || n > hi) {
        throw new InvalidDimensionError(`matrix size ${n}x${n} is outside the supported range ${lo}..${hi}`);
    }
    assertFinite(matrix, 'matrix');
}

export class WorkingMatrix {
    /** N: number of rows */
    readonly size: number;
    /** 2N: number of columns */
    readonly width: number;

    private readonly rows: number[][];
    private readonly original: number[][];

    private constructor(original: number[][], rows: number[][]) {
        this.original = original;
        this.rows = rows;
        this.size = original.length;
        this.width = 2 * original.length;
    }

    /** Build [A | I] from a copy of `matrix` */
    static initialize(matrix: unknown, bounds?: SizeBounds): WorkingMatrix {
        assertInvertibleShape(matrix, bounds);
        const A = Matrix.clone(matrix);
        const I = Matrix.identity(A.length);
        const aug = A.map((row, i) => row.concat(I[i]));
        return new WorkingMatrix(A, aug);
    }

    /** The N×N input this store was built from (copy) */
    get input(): number[][] {
        return Matrix.clone(this.original);
    }

    get(row: number, col: number): number {
        this.checkIndex(row, col);
        return this.rows[row][col];
    }

    set(row: number, col: number, value: number): void {
        this.checkIndex(row, col);
        this.rows[row][col] = value;
    }

    /* ========= row primitives ========= */

    swapRows(a: number, b: number): void {
        this.checkRow(a);
        this.checkRow(b);
        const tmp = this.rows[a];
        this.rows[a] = this.rows[b];
        this.rows[b] = tmp;
    }

    scaleRow(row: number, factor: number): void {
        this.checkRow(row);
        const R = this.rows[row];
        for (let c = 0; c < this.width; c++) R[c] *= factor;
    }

    /** R_target += factor · R_source */
    addMultipleOfRow(target: number, source: number, factor: number): void {
        this.checkRow(target);
        this.checkRow(source);
        const T = this.rows[target];
        const S = this.rows[source];
        for (let c = 0; c < this.width; c++) T[c] += factor * S[c];
    }

    /* ========= extraction ========= */

    extractLeftHalf(): number[][] {
        return this.rows.map(row => row.slice(0, this.size));
    }

    extractRightHalf(): number[][] {
        return this.rows.map(row => row.slice(this.size, this.width));
    }

    toArray(): number[][] {
        return Matrix.clone(this.rows);
    }

    private checkRow(row: number): void {
        if (!Number.isInteger(row) || row < 0 || row >= this.size) {
            throw new IndexOutOfRangeError(`row ${row} out of range 0..${this.size - 1}`);
        }
    }

    private checkIndex(row: number, col: number): void {
        this.checkRow(row);
        if (!Number.isInteger(col) || col < 0 || col >= this.width) {
            throw new IndexOutOfRangeError(`col ${col} out of range 0..${this.width - 1}`);
        }
    }
}
