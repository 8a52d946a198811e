/**
 * Engine Configuration
 *
 * Process-wide defaults the engine reads instead of hidden global state.
 * One instance is created at startup and handed to the engine; a resupply
 * order updates the current tax rate here explicitly.
 */

import { DEFAULT_TAX_RATE } from '../domain/constants.js';

export interface EngineConfig {
    /** Current default tax rate as a fraction (0.086 = 8.6%) */
    taxRate: number;
}

export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    return {
        taxRate: overrides.taxRate ?? DEFAULT_TAX_RATE,
    };
}
