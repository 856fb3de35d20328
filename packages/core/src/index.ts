export * from './money.js';
export * from './errors.js';
export * from './money-validation.js';
export * from './money-arithmetic.js';
export * from './money-aggregation.js';
