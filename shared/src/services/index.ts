/**
 * Services
 *
 * The engine façade, its persistence port and the snapshot/legacy converters.
 */

export * from './persistence.js';
export * from './snapshot.js';
export * from './legacyImport.js';
export * from './inventoryEngine.js';
