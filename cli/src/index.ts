#!/usr/bin/env node

import { Command } from 'commander';
import { registerLotCommands } from './commands/lots.js';
import { registerSaleCommands } from './commands/sales.js';
import { registerLedgerCommands } from './commands/ledger.js';
import { registerValuationCommands } from './commands/valuation.js';
import { registerCatalogCommands } from './commands/catalog.js';
import { registerImportCommands } from './commands/importLegacy.js';

const program = new Command();

program
  .name('humidor')
  .description('Humidor inventory — lots, sales, resupplies and reversals')
  .version('1.0.0');

// Inventory
registerLotCommands(program);
registerCatalogCommands(program);

// Ledger
registerSaleCommands(program);
registerLedgerCommands(program);

// Numbers
registerValuationCommands(program);

// Migration
registerImportCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parse(args);
