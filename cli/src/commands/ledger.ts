import { Command } from 'commander';
import chalk from 'chalk';
import type { LedgerEntryKind } from '@humidor/shared';
import { fail, openEngine } from '../engine.js';
import { failures, heading, json, money, persistence, statusColor, success, table } from '../format.js';

const KINDS: readonly LedgerEntryKind[] = ['sale', 'resupply'];

function isKind(value: string): value is LedgerEntryKind {
  return (KINDS as readonly string[]).includes(value);
}

export function registerLedgerCommands(program: Command): void {
  program
    .command('ledger')
    .description('List ledger entries, newest first')
    .option('-k, --kind <kind>', 'sale | resupply')
    .option('-t, --transaction <id>', 'Only entries of one sale or order')
    .option('--json', 'Output raw JSON')
    .action((opts: { kind?: string; transaction?: string; json?: boolean }) => {
      const kind = opts.kind;
      if (kind !== undefined && !isKind(kind)) {
        fail(`Unknown kind "${kind}". Use sale or resupply.`);
        return;
      }
      const engine = openEngine();
      const entries = (opts.transaction ? engine.entriesFor(opts.transaction) : engine.entries(kind))
        .filter((e) => kind === undefined || e.kind === kind)
        .reverse();

      if (opts.json) {
        json(entries);
        return;
      }

      heading(`Ledger (${entries.length})`);
      table(
        entries.map((e) => ({
          Entry: e.id,
          Transaction: e.transactionId,
          When: e.timestamp.replace('T', ' ').slice(0, 19),
          Kind: e.kind === 'sale' ? chalk.blue('sale') : chalk.magenta('resupply'),
          Cigar: `${e.brand} ${e.name} ${e.size}`.trim(),
          Qty: e.quantity === e.recordedQuantity ? e.quantity : `${e.quantity}/${e.recordedQuantity}`,
          'Unit price': money(e.unitPrice),
          Total: money(e.totalCost),
        }))
      );
      console.log();
    });

  program
    .command('transactions')
    .description('List sales and resupply orders with their reversal status')
    .action(() => {
      const transactions = [...openEngine().transactions()].reverse();
      heading(`Transactions (${transactions.length})`);
      table(
        transactions.map((t) => ({
          ID: t.id,
          When: t.timestamp.replace('T', ' ').slice(0, 19),
          Kind: t.kind,
          Entries: t.entryCount,
          Status: statusColor(t.status),
          Shipping: t.totalShipping === undefined ? '' : money(t.totalShipping),
          'Tax %': t.taxRatePercent ?? '',
        }))
      );
      console.log();
    });

  const reverse = program.command('reverse').description('Undo a sale or resupply, in full or in part');

  reverse
    .command('entry <id> [quantity]')
    .description('Reverse one entry; quantity defaults to all of it')
    .action((id: string, quantity: string | undefined) => {
      const engine = openEngine();
      const entry = engine.entries().find((e) => e.id === id);
      if (!entry) {
        fail('This entry has already been reversed or does not exist');
        return;
      }

      const qty = quantity === undefined ? entry.quantity : Number(quantity);
      const result =
        entry.kind === 'sale' ? engine.reverseSaleEntry(id, qty) : engine.reverseResupplyEntry(id, qty);
      if (!result.success) {
        fail(result.error.message);
        return;
      }

      const r = result.data;
      success(
        `${r.kind === 'sale' ? 'Returned' : 'Removed'} ${r.quantity} unit(s); transaction ${r.transactionId} is ${statusColor(r.status)}`
      );
      persistence(result.persistence);
    });

  reverse
    .command('txn <id>')
    .description('Reverse every remaining entry of a sale or order')
    .action((id: string) => {
      const result = openEngine().reverseWholeTransaction(id);
      if (!result.success) {
        fail(result.error.message);
        return;
      }

      const r = result.data;
      failures(r.failures, (i) => `Entry ${i + 1}`);
      success(`Reversed ${r.reversed.length} entry(ies); transaction is ${statusColor(r.status)}`);
      persistence(result.persistence);
    });
}
