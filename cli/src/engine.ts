/**
 * Opens the inventory engine over the data directory from the environment.
 */

import { createEngineConfig, InventoryEngine, percentToRate } from '@humidor/shared';
import { env } from './config/env.js';
import { error, persistence } from './format.js';
import { JsonFileInventoryRepository } from './store.js';

export function openEngine(): InventoryEngine {
  const engine = new InventoryEngine({
    repository: new JsonFileInventoryRepository(env.HUMIDOR_DATA_DIR),
    config: createEngineConfig(),
  });

  const loaded = engine.load();
  if (!loaded.success) {
    error(loaded.error.message);
    process.exit(1);
  }

  if (env.HUMIDOR_TAX_RATE !== undefined) {
    const rate = percentToRate(env.HUMIDOR_TAX_RATE);
    if (rate !== engine.taxRate()) {
      const result = engine.setTaxRate(rate);
      if (result.success) persistence(result.persistence);
    }
  }

  return engine;
}

/** Print the failure of an engine result and mark the process as failed */
export function fail(message: string): void {
  error(message);
  process.exitCode = 1;
}
