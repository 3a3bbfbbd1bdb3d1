export * from './core/InversionErrors';
export * from './core/Matrix';
export * from './core/InverterConfig';
export * from './core/WorkingMatrix';
export * from './core/RowOperation';
export * from './core/OperationLog';
export * from './core/GaussJordan';

export * from './config/Presets';

export * from './utils/Format';
export * from './utils/IO';
