// IO.ts — turn text/CSV input into numeric matrices and persist results

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import type { InversionResult } from '../core/GaussJordan';
import { assertRect } from '../core/Matrix';
import { InvalidDimensionError, InvalidValueError } from '../core/InversionErrors';

const SEPARATORS = [',', ';', '\t'];

function parseCell(raw: string, row: number, col: number): number {
    const s = raw.trim();
    const v = s === '' ? NaN : Number(s);
    if (!Number.isFinite(v)) {
        throw new InvalidValueError(`Invalid value at position (${row + 1}, ${col + 1}): "${raw}"`, row, col);
    }
    return v;
}

/**
 * Parse one matrix from text. Rows are lines; cells are separated by commas,
 * semicolons or tabs, or by runs of spaces when no such separator appears.
 */
export function parseMatrix(text: string): number[][] {
    const hasSeparator = SEPARATORS.some(s => text.includes(s));
    const source = hasSeparator
        ? text
        : text.split(/\r?\n/).map(line => line.trim().split(/\s+/).join(',')).join('\n');

    const records: string[][] = parse(source, {
        delimiter: SEPARATORS,
        skip_empty_lines: true,
        relax_column_count: true,
    });
    if (records.length === 0) throw new InvalidDimensionError('no matrix rows found');

    const M = records.map((cells, r) => cells.map((cell, c) => parseCell(cell, r, c)));
    assertRect(M, 'matrix');
    return M;
}

export function loadMatrixFile(path: string): number[][] {
    return parseMatrix(fs.readFileSync(path, 'utf8'));
}

export interface SerializedResult {
    kind: InversionResult['kind'];
    inverse?: number[][];
    determinant: number;
    pivotColumn?: number;
    steps: { type: number; notation: string; description: string }[];
}

export function serializeResult(result: InversionResult): SerializedResult {
    const steps = result.log.map(op => ({ type: op.type, notation: op.notation, description: op.description }));
    if (result.kind === 'singular') {
        return { kind: result.kind, determinant: 0, pivotColumn: result.pivotColumn, steps };
    }
    return { kind: result.kind, inverse: result.inverse, determinant: result.determinant, steps };
}

export function saveResultAsJSON(result: InversionResult, fileName: string): void {
    fs.writeFileSync(fileName, JSON.stringify(serializeResult(result), null, 2) + '\n', 'utf8');
}
