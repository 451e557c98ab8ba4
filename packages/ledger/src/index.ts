export * from './settlement/settlement-engine.js';
export * from './processing/transaction-processor.js';
