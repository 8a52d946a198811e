import { Command } from 'commander';
import { CATALOG_KINDS, isCatalogKind } from '@humidor/shared';
import { fail, openEngine } from '../engine.js';
import { field, heading, persistence, success } from '../format.js';

export function registerCatalogCommands(program: Command): void {
  program
    .command('catalog [kind]')
    .description(`Known ${CATALOG_KINDS.join(', ')}`)
    .option('-a, --add <value>', 'Add a value to the given kind')
    .action((kind: string | undefined, opts: { add?: string }) => {
      if (kind !== undefined && !isCatalogKind(kind)) {
        fail(`Unknown catalog "${kind}". Use one of: ${CATALOG_KINDS.join(', ')}`);
        return;
      }
      const engine = openEngine();

      if (opts.add !== undefined) {
        if (kind === undefined) {
          fail('Name the catalog to add to, e.g. catalog brands --add Padron');
          return;
        }
        const result = engine.addCatalogValue(kind, opts.add);
        if (!result.success) {
          fail(result.error.message);
          return;
        }
        success(`${kind}: ${result.data[kind].join(', ')}`);
        persistence(result.persistence);
        return;
      }

      const catalog = engine.catalog();
      heading('Catalog');
      for (const k of kind === undefined ? CATALOG_KINDS : [kind]) {
        field(k, catalog[k].join(', ') || null);
      }
      console.log();
    });
}
