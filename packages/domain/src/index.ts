export * from './constants.js';
export * from './currency.js';
export * from './errors.js';
export * from './fees.js';
export * from './gateways.js';
export * from './limits.js';
export * from './money.js';
export * from './transfer.js';
