import { Command } from 'commander';
import { parseResupplyItems, parseSaleItems } from '../args.js';
import { fail, openEngine } from '../engine.js';
import { failures, heading, money, persistence, success, table } from '../format.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerSaleCommands(program: Command): void {
  program
    .command('quote <items...>')
    .description('Price a sale without recording it. Items are lotId:qty.')
    .action((args: string[]) => {
      const parsed = parseSaleItems(args);
      if (!parsed.success) {
        fail(parsed.error.message);
        return;
      }
      const engine = openEngine();
      const quote = engine.quoteSale(parsed.data);

      heading(`Quote (${quote.totalUnits} units)`);
      table(
        quote.lines.map((l) => ({
          Lot: engine.lot(l.lotId)?.name ?? l.lotId,
          Qty: l.quantity,
          'Unit price': money(l.unitPrice),
          Total: money(l.total),
        }))
      );
      console.log(`\n  Total: ${money(quote.totalPrice)}\n`);
    });

  program
    .command('sell <items...>')
    .description('Record a sale. Items are lotId:qty; lines without stock are skipped.')
    .action((args: string[]) => {
      const parsed = parseSaleItems(args);
      if (!parsed.success) {
        fail(parsed.error.message);
        return;
      }
      const engine = openEngine();
      const result = engine.recordSale(parsed.data);
      if (!result.success) {
        fail(result.error.message);
        return;
      }

      const sale = result.data;
      failures(sale.failures, (i) => args[i]);
      if (!sale.transactionId) {
        fail('Nothing was sold');
        return;
      }

      const total = sale.entries.reduce((sum, e) => sum + e.totalCost, 0);
      success(`Sale ${sale.transactionId} recorded: ${sale.entries.length} line(s), ${money(total)}`);
      table(
        sale.entries.map((e) => ({
          Entry: e.id,
          Cigar: `${e.brand} ${e.name}`.trim(),
          Qty: e.quantity,
          'Unit price': money(e.unitPrice),
          Total: money(e.totalCost),
        }))
      );
      persistence(result.persistence);
    });

  program
    .command('resupply')
    .description('Receive a resupply order; matching lots are merged into')
    .requiredOption('--item <json>', 'Order line as JSON (repeatable)', collect, [])
    .requiredOption('--shipping <amount>', 'Total shipping for the order')
    .option('--tax <percent>', 'Tax rate in percent (defaults to the current rate)')
    .action((opts: { item: string[]; shipping: string; tax?: string }) => {
      const parsed = parseResupplyItems(opts.item);
      if (!parsed.success) {
        fail(parsed.error.message);
        return;
      }
      const engine = openEngine();
      const result = engine.recordResupply(
        parsed.data,
        Number(opts.shipping),
        opts.tax === undefined ? undefined : Number(opts.tax)
      );
      if (!result.success) {
        fail(result.error.message);
        return;
      }

      const order = result.data;
      failures(order.failures, (i) => `Item ${i + 1}`);
      if (!order.orderId) {
        fail('No order line was accepted');
        return;
      }

      success(
        `Order ${order.orderId}: ${order.createdLotIds.length} new lot(s), ${order.mergedLotIds.length} merged`
      );
      table(
        order.entries.map((e) => ({
          Entry: e.id,
          Cigar: `${e.brand} ${e.name}`.trim(),
          Qty: e.quantity,
          Shipping: money(e.allocatedShipping),
          Tax: money(e.allocatedTax),
          'Unit cost': money(e.unitPrice),
        }))
      );
      persistence(result.persistence);
    });
}
