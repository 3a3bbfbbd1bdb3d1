// OperationLog.ts — append-only history of row operations, in application order

import { applyRowOperation, type RowOperation } from './RowOperation';
import { WorkingMatrix, type SizeBounds } from './WorkingMatrix';

/** A frozen, ordered view of a log at one point in time */
export type OperationLogSnapshot = readonly RowOperation[];

export class OperationLog implements Iterable<RowOperation> {
    private readonly entries: RowOperation[] = [];

    record(operation: RowOperation): void {
        this.entries.push(operation);
    }

    /** Copy of the sequence as of now; later records do not reach it */
    snapshot(): OperationLogSnapshot {
        return Object.freeze(this.entries.slice());
    }

    get length(): number {
        return this.entries.length;
    }

    [Symbol.iterator](): Iterator<RowOperation> {
        return this.entries[Symbol.iterator]();
    }
}

/**
 * Rebuild [A | I] from `matrix` and apply `log` in order.
 * For a log produced by elimination of the same matrix the result equals the
 * engine's final working matrix element for element.
 */
export function replayOperations(
    matrix: number[][],
    log: Iterable<RowOperation>,
    bounds?: SizeBounds
): WorkingMatrix {
    const working = WorkingMatrix.initialize(matrix, bounds);
    for (const op of log) applyRowOperation(working, op);
    return working;
}
