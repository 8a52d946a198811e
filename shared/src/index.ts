/**
 * @humidor/shared - Valuation and transaction ledger engine
 *
 * Pure domain logic (cost model, lots, ledger, valuation), record schemas,
 * and the engine façade that persists through a repository port.
 */

export * from './domain/index.js';
export * from './errors/index.js';
export * from './schemas/index.js';
export * from './config/index.js';
export * from './services/index.js';

export { default as logger, engineLogger, lotsLogger, ledgerLogger, storageLogger } from './utils/logger.js';
