// InversionErrors.ts — thrown failures; a singular matrix is a result, not one of these

export type InversionErrorCode = 'InvalidDimension' | 'InvalidValue' | 'IndexOutOfRange' | 'NumericOverflow';

export class InversionError extends Error {
    readonly code: InversionErrorCode;

    constructor(code: InversionErrorCode, msg: string) {
        super(msg);
        this.name = 'InversionError';
        this.code = code;
    }
}

/** Input is not a square grid, or its size is outside the accepted range */
export class InvalidDimensionError extends InversionError {
    constructor(msg: string) {
        super('InvalidDimension', msg);
        this.name = 'InvalidDimensionError';
    }
}

export class InvalidValueError extends InversionError {
    /** 0-based position of the offending entry, when known */
    readonly row?: number;
    readonly col?: number;

    constructor(msg: string, row?: number, col?: number) {
        super('InvalidValue', msg);
        this.name = 'InvalidValueError';
        this.row = row;
        this.col = col;
    }
}

export class IndexOutOfRangeError extends InversionError {
    constructor(msg: string) {
        super('IndexOutOfRange', msg);
        this.name = 'IndexOutOfRangeError';
    }
}

/** Elimination produced an infinite or NaN value (input magnitudes near the float limit) */
export class NumericOverflowError extends InversionError {
    /** 0-based pivot column being processed when the overflow was seen */
    readonly column: number;

    constructor(msg: string, column: number) {
        super('NumericOverflow', msg);
        this.name = 'NumericOverflowError';
        this.column = column;
    }
}

export function isInversionError(err: unknown): err is InversionError {
    return err instanceof InversionError;
}
