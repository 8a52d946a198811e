export { createEngineConfig, type EngineConfig } from './engine.js';
