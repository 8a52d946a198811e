/**
 * Zod Schemas
 *
 * Record schemas for everything that crosses the persistence boundary.
 */

export * from './common.js';
export * from './records.js';
export * from './legacy.js';
