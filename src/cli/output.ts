/**
 * Terminal output for the report CLI.
 *
 * Results go to stdout; warnings, errors and the pino logs go to stderr.
 */

import type { CounterRow, FetchFailure } from '../inventory/types.js';

const writeErr = (message: string): void => {
  process.stderr.write(message + '\n');
};

export function print(message: string): void {
  process.stdout.write(message + '\n');
}

export function printError(message: string): void {
  writeErr(message);
}

export function printWarn(message: string): void {
  writeErr(message);
}

/**
 * Rewrite the current line with a progress counter. No-op when stdout is piped.
 */
export function printProgress(message: string): void {
  if (process.stdout.isTTY) {
    process.stdout.write(`\r${message.padEnd(80)}`);
  }
}

export function formatCounterRow(row: CounterRow): string {
  return `${row.count.toString().padStart(5)}  ${row.name}`;
}

export function formatFailure(failure: FetchFailure): string {
  const status = failure.statusCode !== undefined ? ` (HTTP ${failure.statusCode})` : '';
  return `${failure.resource ?? 'record'} ${failure.id}: [${failure.kind}] ${failure.message}${status}`;
}

export function printCounterRows(title: string, rows: readonly CounterRow[]): void {
  if (rows.length === 0) return;
  print(`   ${title}:`);
  rows.forEach((row) => print(`     ${formatCounterRow(row)}`));
}
