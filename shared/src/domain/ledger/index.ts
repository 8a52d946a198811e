export * from './types.js';
export * from './transactionState.js';
export * from './ledger.js';
