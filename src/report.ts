import chalk from 'chalk';
import Table from 'cli-table3';
import type { AttemptReport, PriceRecord } from './scrapers/mmtcpamp/types.js';

export const ATTEMPT_COLUMNS = ['#', 'Mode', 'Strategy', 'Products', 'Error'] as const;

export function attemptRows(attempts: readonly AttemptReport[]): string[][] {
  return attempts.map(report => [
    String(report.attempt),
    report.mode,
    report.strategy ?? '-',
    String(report.count),
    report.error ?? ''
  ]);
}

export function renderRecords(records: readonly PriceRecord[]): string {
  const table = new Table({
    head: ['Date', 'Product Name', 'Price'],
    style: { head: ['cyan'] }
  });
  for (const record of records) {
    table.push([record.date, record.productName, chalk.green(record.price)]);
  }
  return table.toString();
}

export function renderAttempts(attempts: readonly AttemptReport[]): string {
  const table = new Table({
    head: [...ATTEMPT_COLUMNS],
    style: { head: ['cyan'] }
  });
  for (const row of attemptRows(attempts)) {
    table.push(row);
  }
  return table.toString();
}
