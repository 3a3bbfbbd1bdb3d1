import { describe, it, expect } from 'vitest';
import {
    formatAugmented,
    formatMatrix,
    formatNumber,
    formatOperationTable,
    formatResult,
    toLatex,
    toSubscript,
} from '../utils/Format';
import { invert } from '../core/GaussJordan';
import { scaleOperation, swapOperation } from '../core/RowOperation';
import { WorkingMatrix } from '../core/WorkingMatrix';

describe('formatNumber', () => {
    it('collapses values near zero and near integers', () => {
        expect(formatNumber(0)).toBe('0');
        expect(formatNumber(1e-12)).toBe('0');
        expect(formatNumber(-3)).toBe('-3');
        expect(formatNumber(2.00000000000001)).toBe('2');
    });

    it('prints four decimals otherwise', () => {
        expect(formatNumber(0.25)).toBe('0.2500');
        expect(formatNumber(-1.75)).toBe('-1.7500');
        expect(formatNumber(1 / 3)).toBe('0.3333');
    });
});

describe('toSubscript', () => {
    it('maps every digit', () => {
        expect(toSubscript(1)).toBe('₁');
        expect(toSubscript(12)).toBe('₁₂');
        expect(toSubscript(90)).toBe('₉₀');
    });
});

describe('matrix rendering', () => {
    it('right-aligns a grid', () => {
        expect(formatMatrix([[1, -0.5], [10, 2]])).toBe('[       1  -0.5000 ]\n[      10        2 ]');
    });

    it('separates the halves of the augmented matrix', () => {
        const W = WorkingMatrix.initialize([[1, 2], [3, 4]]);
        expect(formatAugmented(W)).toBe('[ 1  2 | 1  0 ]\n[ 3  4 | 0  1 ]');
    });

    it('emits a LaTeX bmatrix', () => {
        expect(toLatex([[1, 2], [3, 0.5]])).toBe('\\begin{bmatrix} 1 & 2 \\\\ 3 & 0.5000 \\end{bmatrix}');
    });
});

describe('step rendering', () => {
    it('tabulates operation type and notation', () => {
        const table = formatOperationTable([swapOperation(0, 1), scaleOperation(0, 0.5)]);
        expect(table.split('\n')).toEqual([
            'Type | Operation',
            '-----+-----------',
            '1    | E₁,₂',
            '2    | E₁(0.5000)',
        ]);
    });

    it('reports a singular matrix with its partial steps', () => {
        expect(formatResult(invert([[1, 2], [2, 4]])).split('\n')).toEqual([
            'Matrix is singular (no usable pivot in column 2); it cannot be inverted.',
            'Determinant: 0',
            '',
            'Row operations (3):',
            '1. R1 ↔ R2',
            '2. R1 → 0.5000·R1',
            '3. R2 → R2 + (-1)·R1',
        ]);
    });

    it('reports the inverse and determinant on success', () => {
        const lines = formatResult(invert([[2, 0], [0, 4]])).split('\n');
        expect(lines.slice(0, 4)).toEqual([
            'Inverse:',
            '[ 0.5000       0 ]',
            '[      0  0.2500 ]',
            'Determinant: 8.000000',
        ]);
        expect(lines[5]).toBe('Row operations (2):');
    });
});
