/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import type { ItemFailure, PersistenceStatus, TransactionStatus } from '@humidor/shared';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function statusColor(status: TransactionStatus): string {
  if (status === 'fully_reversed') return chalk.red(status);
  if (status === 'partially_reversed') return chalk.yellow(status);
  return chalk.green(status);
}

export function stockColor(count: number): string {
  if (count === 0) return chalk.red(String(count));
  if (count < 3) return chalk.yellow(String(count));
  return chalk.green(String(count));
}

/** One warning line per skipped batch item */
export function failures(items: readonly ItemFailure[], label: (index: number) => string): void {
  for (const f of items) {
    warn(`${label(f.index)}: ${f.message}`);
  }
}

/** Warn when a change was applied but not written to disk */
export function persistence(status: PersistenceStatus): void {
  if (!status.saved && 'error' in status) warn(status.error.message);
}

export function table(rows: Record<string, unknown>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns || Object.keys(rows[0]);
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => visibleLength(String(r[c] ?? ''))))
  );

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => pad(String(row[c] ?? ''), widths[i])).join('  ');
    console.log(`  ${line}`);
  }
}

// Colored cells carry escape codes that take no width on screen
const ANSI = /\u001b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI, '').length;
}

function pad(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - visibleLength(text)));
}
