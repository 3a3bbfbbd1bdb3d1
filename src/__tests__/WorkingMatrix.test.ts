import { describe, it, expect } from 'vitest';
import { WorkingMatrix } from '../core/WorkingMatrix';
import {
    IndexOutOfRangeError,
    InvalidDimensionError,
    InvalidValueError,
} from '../core/InversionErrors';
import { Matrix } from '../core/Matrix';

describe('WorkingMatrix.initialize', () => {
    it('builds the augmented [A | I] form', () => {
        const W = WorkingMatrix.initialize([[1, 2], [3, 4]]);
        expect(W.size).toBe(2);
        expect(W.width).toBe(4);
        expect(W.toArray()).toEqual([
            [1, 2, 1, 0],
            [3, 4, 0, 1],
        ]);
        expect(W.extractLeftHalf()).toEqual([[1, 2], [3, 4]]);
        expect(W.extractRightHalf()).toEqual(Matrix.identity(2));
    });

    it('copies the caller matrix', () => {
        const A = [[1, 2], [3, 4]];
        const W = WorkingMatrix.initialize(A);
        A[0][0] = 99;
        expect(W.get(0, 0)).toBe(1);
        expect(W.input).toEqual([[1, 2], [3, 4]]);
    });

    it('rejects non-square input', () => {
        expect(() => WorkingMatrix.initialize([[1, 2, 3], [4, 5, 6]])).toThrow(InvalidDimensionError);
    });

    it('rejects sizes outside 2..10', () => {
        expect(() => WorkingMatrix.initialize([[1]])).toThrow(InvalidDimensionError);
        expect(() => WorkingMatrix.initialize(Matrix.identity(11))).toThrow(InvalidDimensionError);
        expect(() => WorkingMatrix.initialize(Matrix.identity(10))).not.toThrow();
    });

    it('honours custom bounds', () => {
        expect(() => WorkingMatrix.initialize(Matrix.identity(11), { maxSize: 12 })).not.toThrow();
        expect(() => WorkingMatrix.initialize(Matrix.identity(2), { minSize: 3 })).toThrow(InvalidDimensionError);
    });

    it('rejects ragged, empty and non-array input', () => {
        expect(() => WorkingMatrix.initialize([[1, 2], [3]])).toThrow(InvalidDimensionError);
        expect(() => WorkingMatrix.initialize([])).toThrow(InvalidDimensionError);
        expect(() => WorkingMatrix.initialize('1 2; 3 4')).toThrow(InvalidDimensionError);
        expect(() => WorkingMatrix.initialize([1, 2])).toThrow(InvalidDimensionError);
    });

    it('reports shape problems before value problems', () => {
        expect(() => WorkingMatrix.initialize([[NaN, 1], [2]])).toThrow(InvalidDimensionError);
    });

    it('rejects non-finite and non-numeric entries with their position', () => {
        expect(() => WorkingMatrix.initialize([[1, Infinity], [0, 1]])).toThrow(InvalidValueError);
        expect(() => WorkingMatrix.initialize([[1, 0], [0, '1']])).toThrow(InvalidValueError);

        let caught: unknown;
        try {
            WorkingMatrix.initialize([[1, 0], [NaN, 1]]);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(InvalidValueError);
        if (caught instanceof InvalidValueError) {
            expect(caught.code).toBe('InvalidValue');
            expect(caught.row).toBe(1);
            expect(caught.col).toBe(0);
        }
    });
});

describe('WorkingMatrix access', () => {
    it('reads and writes over the full N x 2N range', () => {
        const W = WorkingMatrix.initialize([[1, 2], [3, 4]]);
        W.set(1, 3, 7.5);
        expect(W.get(1, 3)).toBe(7.5);
        expect(W.extractRightHalf()).toEqual([[1, 0], [0, 7.5]]);
    });

    it('throws IndexOutOfRange outside the grid', () => {
        const W = WorkingMatrix.initialize([[1, 2], [3, 4]]);
        expect(() => W.get(2, 0)).toThrow(IndexOutOfRangeError);
        expect(() => W.get(0, 4)).toThrow(IndexOutOfRangeError);
        expect(() => W.get(-1, 0)).toThrow(IndexOutOfRangeError);
        expect(() => W.set(0, 1.5, 1)).toThrow(IndexOutOfRangeError);
        expect(() => W.swapRows(0, 2)).toThrow(IndexOutOfRangeError);
    });

    it('applies row primitives across both halves', () => {
        const W = WorkingMatrix.initialize([[1, 2], [3, 4]]);
        W.swapRows(0, 1);
        expect(W.toArray()).toEqual([[3, 4, 0, 1], [1, 2, 1, 0]]);
        W.scaleRow(1, 2);
        expect(W.toArray()).toEqual([[3, 4, 0, 1], [2, 4, 2, 0]]);
        W.addMultipleOfRow(0, 1, -1);
        expect(W.toArray()).toEqual([[1, 0, -2, 1], [2, 4, 2, 0]]);
    });

    it('hands out copies', () => {
        const W = WorkingMatrix.initialize([[1, 2], [3, 4]]);
        const snapshot = W.toArray();
        snapshot[0][0] = 42;
        const right = W.extractRightHalf();
        right[0][0] = 42;
        expect(W.get(0, 0)).toBe(1);
        expect(W.get(0, 2)).toBe(1);
    });
});
