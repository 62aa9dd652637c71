export * from './currency.js';
export * from './currency-catalog.js';
export * from './errors/index.js';
export * from './utils/decimal-utils.js';
export * from './utils/money-format.js';
export * from './value-objects/money.js';
