import { Command } from 'commander';
import chalk from 'chalk';
import { isLotSortColumn, LOT_SORT_COLUMNS, lotShipping, type Lot } from '@humidor/shared';
import { parseOnDuplicate, toLotPatch, type LotEditOptions } from '../args.js';
import { fail, openEngine } from '../engine.js';
import { field, heading, json, money, persistence, stockColor, success, table, warn } from '../format.js';

interface LotAddOptions {
  name: string;
  brand: string;
  size: string;
  type?: string;
  count: string;
  price: string;
  shipping: string;
  tax: string;
  rating?: string;
}

function lotRow(lot: Lot): Record<string, unknown> {
  return {
    ID: lot.id.slice(0, 8),
    Brand: lot.brand || '—',
    Name: lot.name,
    Size: lot.size || '—',
    Type: lot.type || '—',
    Qty: stockColor(lot.count),
    Price: money(lot.price),
    Shipping: money(lotShipping(lot)),
    'Unit cost': money(lot.unitCost),
    Rating: lot.rating ?? '—',
  };
}

function showLot(lot: Lot): void {
  heading(`${lot.brand} ${lot.name}`.trim());
  field('ID', lot.id);
  field('Size', lot.size || null);
  field('Type', lot.type || null);
  field('Count', lot.count);
  field('Original quantity', lot.originalQuantity);
  field('Price', money(lot.price));
  field('Shipping', money(lot.allocatedShipping));
  field('Tax', money(lot.allocatedTax));
  field('Tax rate', `${(lot.taxRate * 100).toFixed(2)}%`);
  field('Unit cost', money(lot.unitCost));
  field('Rating', lot.rating);
  field('Merges', lot.history.length);
}

export function registerLotCommands(program: Command): void {
  program
    .command('lots [search]')
    .description('List lots. Search by brand or name.')
    .option('-s, --sort <column>', `Sort by ${LOT_SORT_COLUMNS.join(', ')}`)
    .option('--desc', 'Sort descending')
    .option('--json', 'Output raw JSON')
    .action((search: string | undefined, opts: { sort?: string; desc?: boolean; json?: boolean }) => {
      const column = opts.sort;
      if (column !== undefined && !isLotSortColumn(column)) {
        fail(`Unknown sort column "${column}". Use one of: ${LOT_SORT_COLUMNS.join(', ')}`);
        return;
      }
      const engine = openEngine();
      const lots = engine.search(search ?? '', {
        column,
        direction: opts.desc ? 'desc' : 'asc',
      });

      if (opts.json) {
        json(lots);
        return;
      }

      heading(search ? `Lots: "${search}" (${lots.length} results)` : `Lots (${lots.length})`);
      table(lots.map(lotRow));
      console.log();
    });

  const lot = program.command('lot').description('Add, show, edit or remove a lot');

  lot
    .command('show <id>')
    .description('Show one lot')
    .action((id: string) => {
      const found = openEngine().lot(id);
      if (!found) {
        fail(`Lot ${id} not found`);
        return;
      }
      showLot(found);
      console.log();
    });

  lot
    .command('add')
    .description('Add a lot; an existing brand/name/size is merged into')
    .requiredOption('--name <name>', 'Cigar name')
    .option('--brand <brand>', 'Brand', '')
    .option('--size <size>', 'Size', '')
    .option('--type <type>', 'Wrapper or type')
    .requiredOption('--count <n>', 'Units')
    .requiredOption('--price <amount>', 'Total price paid')
    .option('--shipping <amount>', 'Shipping charged to this lot', '0')
    .option('--tax <amount>', 'Tax charged to this lot', '0')
    .option('--rating <n>', 'Rating 1-10')
    .action((opts: LotAddOptions) => {
      const result = openEngine().addLot(opts);
      if (!result.success) {
        fail(result.error.message);
        return;
      }
      const { lot: added, merged } = result.data;
      success(merged ? `Merged into existing lot ${added.id}` : `Added lot ${added.id}`);
      showLot(added);
      persistence(result.persistence);
      console.log();
    });

  lot
    .command('edit <id>')
    .description('Edit a lot; numeric fields that do not parse are skipped')
    .option('--brand <brand>', 'Brand')
    .option('--name <name>', 'Name')
    .option('--size <size>', 'Size')
    .option('--type <type>', 'Type')
    .option('--count <n>', 'Units on hand')
    .option('--price <amount>', 'Total price')
    .option('--shipping <amount>', 'Allocated shipping')
    .option('--tax <amount>', 'Allocated tax')
    .option('--rating <n>', 'Rating 1-10, or "" to clear')
    .option('--on-duplicate <choice>', 'combine | keep | cancel, when the edit matches another lot')
    .action((id: string, opts: LotEditOptions & { onDuplicate?: string }) => {
      const engine = openEngine();
      const patch = toLotPatch(opts);
      const edit = engine.editLot(id, patch);
      if (!edit.success) {
        fail(edit.error.message);
        return;
      }

      const outcome = edit.data;
      if (outcome.status === 'applied') {
        for (const r of outcome.rejected) warn(`${r.field}: ${r.message}`);
        success(`Updated lot ${outcome.lot.id}`);
        showLot(outcome.lot);
        persistence(edit.persistence);
        return;
      }

      const existing = engine.lot(outcome.conflict.existingLotId);
      warn(`${outcome.conflict.message}: ${existing ? `${existing.brand} ${existing.name} ${existing.size}` : outcome.conflict.existingLotId}`);

      const resolution = parseOnDuplicate(opts.onDuplicate);
      if (!resolution) {
        fail('Re-run with --on-duplicate combine, keep or cancel');
        return;
      }

      const resolved = engine.resolveDuplicate(id, patch, resolution);
      if (!resolved.success) {
        fail(resolved.error.message);
        return;
      }
      const r = resolved.data;
      if (r.resolution === 'cancel') {
        console.log(chalk.dim('  Edit cancelled; nothing changed'));
        return;
      }
      for (const rejected of r.rejected) warn(`${rejected.field}: ${rejected.message}`);
      success(r.resolution === 'combine' ? `Combined into lot ${r.lot.id}` : `Kept separate as "${r.lot.name}"`);
      showLot(r.lot);
      persistence(resolved.persistence);
    });

  lot
    .command('remove <id>')
    .description('Delete a lot. Its ledger entries stay but can no longer be reversed.')
    .action((id: string) => {
      const result = openEngine().removeLot(id);
      if (!result.success) {
        fail(result.error.message);
        return;
      }
      success(`Removed ${result.data.brand} ${result.data.name}`.trim());
      persistence(result.persistence);
    });
}
