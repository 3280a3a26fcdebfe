export * from './errors/index.js';
export * from './types/transaction-record.js';
export * from './utils/decimal-utils.js';
export * from './utils/zod-utils.js';
