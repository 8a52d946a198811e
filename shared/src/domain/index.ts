/**
 * Domain Layer
 *
 * Cost model, lots, ledger and valuation. Pure in-memory logic;
 * persistence and logging live in services/.
 */

export * from './constants.js';
export * from './valuation/index.js';
export * from './lots/index.js';
export * from './ledger/index.js';
