import { Command } from 'commander';
import { parseAmount, parseQuantity, percentToRate, rateToPercent, shippingBreakdown } from '@humidor/shared';
import { fail, openEngine } from '../engine.js';
import { field, heading, json, money, persistence, success } from '../format.js';

export function registerValuationCommands(program: Command): void {
  program
    .command('totals')
    .description('Inventory count and value at current unit costs')
    .option('--json', 'Output raw JSON')
    .action((opts: { json?: boolean }) => {
      const totals = openEngine().aggregate();
      if (opts.json) {
        json(totals);
        return;
      }
      heading('Inventory Totals');
      field('Units', totals.totalCount);
      field('Value', money(totals.totalValue));
      field('Avg unit cost', money(totals.averageUnitCost));
      field('Avg lot shipping', money(totals.averageShipping));
      console.log();
    });

  program
    .command('ship-calc <shipping> <units>')
    .description('Shipping per unit, per 5-pack and per 10-pack')
    .action((shippingArg: string, unitsArg: string) => {
      const shipping = parseAmount(shippingArg);
      const units = parseQuantity(unitsArg);
      if (shipping === null || units === null) {
        fail('Shipping must be an amount and units a whole number');
        return;
      }
      const b = shippingBreakdown(shipping, units);
      heading('Shipping Breakdown');
      field('Total shipping', money(b.totalShipping));
      field('Units', b.totalUnits);
      field('Per unit', money(b.perUnit));
      field('Per unit (5-pack)', money(b.perUnitFivePack));
      field('Per unit (10-pack)', money(b.perUnitTenPack));
      console.log();
    });

  program
    .command('tax [percent]')
    .description('Show or set the default tax rate, in percent')
    .action((percent: string | undefined) => {
      const engine = openEngine();
      if (percent === undefined) {
        field('Tax rate', `${rateToPercent(engine.taxRate())}%`);
        return;
      }
      const value = parseAmount(percent);
      if (value === null) {
        fail(`"${percent}" is not a valid percentage`);
        return;
      }
      const result = engine.setTaxRate(percentToRate(value));
      if (!result.success) {
        fail(result.error.message);
        return;
      }
      success(`Default tax rate set to ${rateToPercent(result.data)}%`);
      persistence(result.persistence);
    });
}
