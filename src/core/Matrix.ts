// Matrix.ts — small dense helpers with dimension checks

import { InvalidDimensionError, InvalidValueError } from './InversionErrors';

/* ===================== Shape checks ===================== */

function isRow(row: unknown): row is unknown[] {
    return Array.isArray(row);
}

/**
 * Verifies that `A` is a non-empty array of equally long, non-empty rows.
 * Entries are not inspected here; see {@link assertFinite}.
 */
export function assertRect(A: unknown, name = 'matrix'): asserts A is unknown[][] {
    if (!Array.isArray(A) || A.length === 0) {
        throw new InvalidDimensionError(`${name} must be a non-empty 2D array`);
    }
    const first: unknown = A[0];
    if (!isRow(first)) throw new InvalidDimensionError(`${name} row 0 missing/invalid`);
    const C = first.length;
    if (C === 0) throw new InvalidDimensionError(`${name} has zero width`);

    for (let r = 0; r < A.length; r++) {
        const row: unknown = A[r];
        if (!isRow(row)) throw new InvalidDimensionError(`${name} row ${r} invalid`);
        if (row.length !== C) {
            throw new InvalidDimensionError(`${name} has ragged rows: row 0 = ${C} cols, row ${r} = ${row.length} cols`);
        }
    }
}

export function assertFinite(A: unknown[][], name = 'matrix'): asserts A is number[][] {
    for (let r = 0; r < A.length; r++) {
        const row = A[r];
        for (let c = 0; c < row.length; c++) {
            const v = row[c];
            if (typeof v !== 'number' || !Number.isFinite(v)) {
                throw new InvalidValueError(`${name} row ${r}, col ${c} is not finite: ${String(v)}`, r, c);
            }
        }
    }
}

export function isSquare(A: ArrayLike<ArrayLike<number>>): boolean {
    return A.length > 0 && A.length === A[0].length;
}

/* ============================== Matrix ============================== */

export class Matrix {
    static shape(A: number[][]): [number, number] {
        return [A.length, A.length ? A[0].length : 0];
    }

    static clone(A: number[][]): number[][] {
        return A.map(row => row.slice());
    }

    static zeros(rows: number, cols: number): number[][] {
        const out: number[][] = new Array(rows);
        for (let i = 0; i < rows; i++) out[i] = new Array<number>(cols).fill(0);
        return out;
    }

    static identity(n: number): number[][] {
        const I = Matrix.zeros(n, n);
        for (let i = 0; i < n; i++) I[i][i] = 1;
        return I;
    }

    static multiply(A: number[][], B: number[][]): number[][] {
        const [m, n] = Matrix.shape(A);
        const [nb, p] = Matrix.shape(B);
        if (n !== nb) {
            throw new InvalidDimensionError(`matmul dims mismatch: A(${m}x${n}) * B(${nb}x${p})`);
        }
        const C = Matrix.zeros(m, p);
        for (let i = 0; i < m; i++) {
            const Ai = A[i];
            for (let k = 0; k < n; k++) {
                const aik = Ai[k];
                const Bk = B[k];
                for (let j = 0; j < p; j++) C[i][j] += aik * Bk[j];
            }
        }
        return C;
    }

    /** Largest absolute element-wise difference; Infinity when shapes differ */
    static maxAbsDiff(A: number[][], B: number[][]): number {
        const [m, n] = Matrix.shape(A);
        const [mb, nb] = Matrix.shape(B);
        if (m !== mb || n !== nb) return Infinity;
        let worst = 0;
        for (let i = 0; i < m; i++) {
            for (let j = 0; j < n; j++) {
                const d = Math.abs(A[i][j] - B[i][j]);
                if (d > worst) worst = d;
            }
        }
        return worst;
    }

    static isIdentity(A: number[][], tol = 1e-9): boolean {
        return isSquare(A) && Matrix.maxAbsDiff(A, Matrix.identity(A.length)) <= tol;
    }
}
