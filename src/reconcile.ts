import type { PriceRecord } from './scrapers/mmtcpamp/types.js';

export const STORE_COLUMNS = ['Date', 'Product Name', 'Price'] as const;

export interface StoredTable {
  header: string[];
  rows: string[][];
}

export interface MergeSummary {
  added: number;
  updated: number;
  unchanged: number;
}

export interface MergeResult {
  records: PriceRecord[];
  summary: MergeSummary;
}

export const EMPTY_TABLE: StoredTable = { header: [], rows: [] };

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase();
}

function recordKey(record: Pick<PriceRecord, 'date' | 'productName'>): string {
  return `${record.date}\u0000${record.productName}`;
}

/**
 * Projects a stored table onto Date / Product Name / Price. Missing columns
 * read as empty strings and rows with no content are dropped.
 */
export function normalizeStoredRows(table: StoredTable): PriceRecord[] {
  const headers = table.header.map(normalizeHeader);
  const [dateIndex, nameIndex, priceIndex] = STORE_COLUMNS.map(column => headers.indexOf(normalizeHeader(column)));
  const cell = (row: string[], index: number): string => (index >= 0 ? (row[index] ?? '').trim() : '');

  return table.rows
    .filter(row => row.some(value => String(value ?? '').trim() !== ''))
    .map(row => ({
      date: cell(row, dateIndex),
      productName: cell(row, nameIndex),
      price: cell(row, priceIndex)
    }));
}

/** Keeps the last row for each (date, product name) at that row's position. */
export function dedupeByDateAndProduct(records: readonly PriceRecord[]): PriceRecord[] {
  const lastIndex = new Map<string, number>();
  records.forEach((record, index) => lastIndex.set(recordKey(record), index));
  return records.filter((record, index) => lastIndex.get(recordKey(record)) === index);
}

export function summarizeChanges(history: readonly PriceRecord[], today: readonly PriceRecord[]): MergeSummary {
  const previous = new Map<string, string>();
  for (const record of history) {
    previous.set(recordKey(record), record.price);
  }
  const summary: MergeSummary = { added: 0, updated: 0, unchanged: 0 };
  for (const record of today) {
    const existing = previous.get(recordKey(record));
    if (existing === undefined) {
      summary.added += 1;
    } else if (existing === record.price) {
      summary.unchanged += 1;
    } else {
      summary.updated += 1;
    }
  }
  return summary;
}

/**
 * Appends today's records to the stored history and resolves conflicts on
 * (date, product name) in favour of the later row. "Later" means later in
 * the table, not a newer timestamp.
 */
export function mergeRecords(stored: StoredTable, today: readonly PriceRecord[]): MergeResult {
  const history = normalizeStoredRows(stored);
  const summary = summarizeChanges(history, today);
  if (history.length === 0) {
    return { records: [...today], summary };
  }
  return { records: dedupeByDateAndProduct([...history, ...today]), summary };
}

export function toStoredTable(records: readonly PriceRecord[]): StoredTable {
  return {
    header: [...STORE_COLUMNS],
    rows: records.map(record => [record.date, record.productName, record.price])
  };
}
