export * from './types';
export * from './errors';
export * from './schemas';
export * from './algorithms/decimalPlaces';
export * from './algorithms/zeros';
export * from './algorithms/significantFigures';
export * from './rounding';
export * from './fluent';
