import { Command } from 'commander';
import { randomUUID } from 'node:crypto';
import { importLegacy, InventoryError, LEGACY_FILE_NAMES, type LegacyFiles } from '@humidor/shared';
import { fail, openEngine } from '../engine.js';
import { field, heading, persistence, success, warn } from '../format.js';
import { readLegacyFiles } from '../store.js';

export function registerImportCommands(program: Command): void {
  program
    .command('import-legacy <dir>')
    .description(`Replace the inventory with the desktop app's files (${LEGACY_FILE_NAMES.inventory}, ${LEGACY_FILE_NAMES.sales}, ...)`)
    .option('--force', 'Replace an inventory that already has lots')
    .action((dir: string, opts: { force?: boolean }) => {
      const engine = openEngine();
      if (engine.lots().length > 0 && !opts.force) {
        fail('The inventory already has lots. Re-run with --force to replace it.');
        return;
      }

      let files: LegacyFiles;
      try {
        files = readLegacyFiles(dir);
      } catch (err: unknown) {
        if (err instanceof InventoryError) {
          fail(err.message);
          return;
        }
        throw err;
      }
      if (files.inventory === undefined) warn(`${LEGACY_FILE_NAMES.inventory} not found in ${dir}`);

      const imported = importLegacy(files, { newId: randomUUID, taxRate: engine.taxRate() });
      if (!imported.success) {
        fail(imported.error.message);
        return;
      }

      const unlinked = imported.data.entries.filter((e) => e.lotId === null).length;
      const result = engine.replaceState(imported.data);
      if (!result.success) {
        fail(result.error.message);
        return;
      }

      success('Legacy data imported');
      heading('Imported');
      field('Lots', result.data.lots);
      field('Sales', result.data.entries);
      field('Sale groups', result.data.transactions);
      if (unlinked > 0) warn(`${unlinked} sale(s) refer to lots that no longer exist and cannot be reversed`);
      persistence(result.persistence);
      console.log();
    });
}
