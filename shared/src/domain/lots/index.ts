export * from './types.js';
export * from './identity.js';
export * from './lotStore.js';
export * from './catalog.js';
export * from './browse.js';
