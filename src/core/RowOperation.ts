// RowOperation.ts — immutable records of elementary row operations

import type { WorkingMatrix } from './WorkingMatrix';
import { formatNumber, toSubscript } from '../utils/Format';

export type RowOperationKind = 'SWAP' | 'SCALE' | 'ADD_MULTIPLE';

/** Elementary matrix type: 1 = interchange, 2 = scaling, 3 = row addition */
export type ElementaryType = 1 | 2 | 3;

interface RowOperationBase {
    readonly kind: RowOperationKind;
    readonly type: ElementaryType;
    /** e.g. `R2 → R2 + (-2)·R1` (rows 1-based) */
    readonly description: string;
    /** Elementary-matrix notation, e.g. `E₂,₁(-2)` */
    readonly notation: string;
}

export interface SwapOperation extends RowOperationBase {
    readonly kind: 'SWAP';
    readonly type: 1;
    readonly rows: readonly [number, number];
}

export interface ScaleOperation extends RowOperationBase {
    readonly kind: 'SCALE';
    readonly type: 2;
    readonly row: number;
    readonly factor: number;
}

export interface AddMultipleOperation extends RowOperationBase {
    readonly kind: 'ADD_MULTIPLE';
    readonly type: 3;
    readonly targetRow: number;
    readonly sourceRow: number;
    readonly factor: number;
}

export type RowOperation = SwapOperation | ScaleOperation | AddMultipleOperation;

/* ===================== factories ===================== */

const label = (row: number) => `R${row + 1}`;
const sub = (row: number) => toSubscript(row + 1);

export function swapOperation(a: number, b: number): SwapOperation {
    const rows: readonly [number, number] = Object.freeze([a, b] as const);
    const op: SwapOperation = {
        kind: 'SWAP',
        type: 1,
        rows,
        description: `${label(a)} ↔ ${label(b)}`,
        notation: `E${sub(a)},${sub(b)}`,
    };
    return Object.freeze(op);
}

export function scaleOperation(row: number, factor: number): ScaleOperation {
    const k = formatNumber(factor);
    const op: ScaleOperation = {
        kind: 'SCALE',
        type: 2,
        row,
        factor,
        description: `${label(row)} → ${k}·${label(row)}`,
        notation: `E${sub(row)}(${k})`,
    };
    return Object.freeze(op);
}

export function addMultipleOperation(targetRow: number, sourceRow: number, factor: number): AddMultipleOperation {
    const k = formatNumber(factor);
    const op: AddMultipleOperation = {
        kind: 'ADD_MULTIPLE',
        type: 3,
        targetRow,
        sourceRow,
        factor,
        description: `${label(targetRow)} → ${label(targetRow)} + (${k})·${label(sourceRow)}`,
        notation: `E${sub(targetRow)},${sub(sourceRow)}(${k})`,
    };
    return Object.freeze(op);
}

/** Apply one recorded operation to the store, exactly as elimination did */
export function applyRowOperation(working: WorkingMatrix, op: RowOperation): void {
    switch (op.kind) {
        case 'SWAP':
            working.swapRows(op.rows[0], op.rows[1]);
            return;
        case 'SCALE':
            working.scaleRow(op.row, op.factor);
            return;
        case 'ADD_MULTIPLE':
            working.addMultipleOfRow(op.targetRow, op.sourceRow, op.factor);
            return;
    }
}
