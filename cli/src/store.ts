/**
 * JSON file storage for the CLI
 *
 * The whole inventory lives in one `inventory.json` under the data directory.
 * Legacy files from the original desktop application are read from any
 * directory for `import-legacy`.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  INVENTORY_ERROR_CODES,
  InventoryError,
  LEGACY_FILE_KEYS,
  LEGACY_FILE_NAMES,
  storageLogger,
  type InventoryRepository,
  type LegacyFiles,
  type Snapshot,
} from '@humidor/shared';

export const INVENTORY_FILE = 'inventory.json';

export class JsonFileInventoryRepository implements InventoryRepository {
  readonly file: string;

  constructor(private readonly dataDir: string) {
    this.file = join(dataDir, INVENTORY_FILE);
  }

  load(): unknown {
    if (!existsSync(this.file)) {
      storageLogger.debug({ file: this.file }, 'No inventory file yet');
      return null;
    }
    return readJson(this.file);
  }

  save(snapshot: Snapshot): void {
    if (!existsSync(this.dataDir)) {
      mkdirSync(this.dataDir, { recursive: true });
    }
    writeFileSync(this.file, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8');
    storageLogger.debug({ file: this.file, lots: snapshot.lots.length }, 'Inventory saved');
  }
}

/** Reads whichever legacy files exist in `dir`; missing ones stay undefined */
export function readLegacyFiles(dir: string): LegacyFiles {
  const files: LegacyFiles = {};
  for (const key of LEGACY_FILE_KEYS) {
    const path = join(dir, LEGACY_FILE_NAMES[key]);
    if (existsSync(path)) {
      files[key] = readJson(path);
    } else {
      storageLogger.debug({ file: path }, 'Legacy file not found');
    }
  }
  return files;
}

function readJson(path: string): unknown {
  const text = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw new InventoryError(INVENTORY_ERROR_CODES.INVALID_SNAPSHOT, {
      technicalMessage: `${path} is not valid JSON`,
      context: { path, cause: error instanceof Error ? error.message : String(error) },
    });
  }
}
