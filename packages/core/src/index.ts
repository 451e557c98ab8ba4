export * from './errors/index.js';
export * from './schemas/transaction-record.js';
export * from './types/account.js';
export * from './types/transaction.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
