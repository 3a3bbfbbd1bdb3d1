// Format.ts — plain-text and LaTeX rendering of matrices, step logs and results

import type { InversionResult } from '../core/GaussJordan';
import type { RowOperation } from '../core/RowOperation';
import type { WorkingMatrix } from '../core/WorkingMatrix';

const SUBSCRIPT_DIGITS = '₀₁₂₃₄₅₆₇₈₉';

export function toSubscript(n: number): string {
    return String(n).replace(/[0-9]/g, d => SUBSCRIPT_DIGITS[Number(d)]);
}

/**
 * `0` near zero, integer text near an integer, otherwise four decimals.
 */
export function formatNumber(value: number, tol = 1e-10): string {
    if (Math.abs(value) < tol) return '0';
    const rounded = Math.round(value);
    if (Math.abs(value - rounded) < tol) return String(rounded);
    return value.toFixed(4);
}

/** Right-aligned grid, one line per row */
export function formatMatrix(M: number[][], tol?: number): string {
    const cells = M.map(row => row.map(v => formatNumber(v, tol)));
    const width = Math.max(1, ...cells.flat().map(s => s.length));
    return cells.map(row => '[ ' + row.map(s => s.padStart(width)).join('  ') + ' ]').join('\n');
}

/** Augmented view with a bar between the two halves */
export function formatAugmented(working: WorkingMatrix, tol?: number): string {
    const n = working.size;
    const cells = working.toArray().map(row => row.map(v => formatNumber(v, tol)));
    const width = Math.max(1, ...cells.flat().map(s => s.length));
    return cells
        .map(row => {
            const pad = row.map(s => s.padStart(width));
            return '[ ' + pad.slice(0, n).join('  ') + ' | ' + pad.slice(n).join('  ') + ' ]';
        })
        .join('\n');
}

export function toLatex(M: number[][], tol?: number): string {
    const body = M.map(row => row.map(v => formatNumber(v, tol)).join(' & ')).join(' \\\\ ');
    return `\\begin{bmatrix} ${body} \\end{bmatrix}`;
}

/** Two-column table of elementary operations: type (1/2/3) and notation */
export function formatOperationTable(log: readonly RowOperation[]): string {
    const header = ['Type', 'Operation'];
    const rows = log.map(op => [String(op.type), op.notation]);
    const w0 = Math.max(header[0].length, ...rows.map(r => r[0].length));
    const w1 = Math.max(header[1].length, ...rows.map(r => r[1].length));
    const line = (a: string, b: string) => `${a.padEnd(w0)} | ${b.padEnd(w1)}`.trimEnd();
    return [
        line(header[0], header[1]),
        `${'-'.repeat(w0)}-+-${'-'.repeat(w1)}`,
        ...rows.map(r => line(r[0], r[1])),
    ].join('\n');
}

export function formatSteps(log: readonly RowOperation[]): string {
    return log.map((op, i) => `${i + 1}. ${op.description}`).join('\n');
}

export function formatResult(result: InversionResult): string {
    const lines: string[] = [];
    if (result.kind === 'singular') {
        lines.push(`Matrix is singular (no usable pivot in column ${result.pivotColumn + 1}); it cannot be inverted.`);
        lines.push('Determinant: 0');
    } else {
        lines.push('Inverse:');
        lines.push(formatMatrix(result.inverse));
        lines.push(`Determinant: ${result.determinant.toFixed(6)}`);
    }
    lines.push('');
    lines.push(`Row operations (${result.log.length}):`);
    lines.push(result.log.length ? formatSteps(result.log) : '(none)');
    return lines.join('\n');
}
