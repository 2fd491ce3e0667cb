import type { Logger } from './logger.js';
import { mergeRecords, toStoredTable, type MergeSummary, type StoredTable } from './reconcile.js';
import type { ScrapeOutcome } from './scrapers/mmtcpamp/types.js';

export interface PriceStore {
  describe(): string;
  readTable(): Promise<StoredTable>;
  /** Replaces the whole table; callers are assumed to be the only writer. */
  writeTable(table: StoredTable): Promise<void>;
}

function describeExhausted(outcome: ScrapeOutcome): string {
  const tried = outcome.attempts.map(report => report.mode).join(', ') || 'none';
  return `No products extracted for ${outcome.date} after every render mode (tried: ${tried})`;
}

export class ScrapeExhaustedError extends Error {
  constructor(public readonly outcome: ScrapeOutcome) {
    super(describeExhausted(outcome));
    this.name = 'ScrapeExhaustedError';
  }
}

export interface SyncOptions {
  scrape: () => Promise<ScrapeOutcome>;
  store: PriceStore;
  logger: Logger;
  dryRun?: boolean;
  /** Wraps the store write, e.g. with a spinner. */
  onWrite?: (write: () => Promise<void>, rowCount: number) => Promise<void>;
}

export interface SyncResult {
  outcome: ScrapeOutcome;
  summary: MergeSummary | null;
  totalRows: number | null;
}

/**
 * Scrapes today's prices and upserts them into the store. An empty scrape
 * throws before the store is read, so a broken extractor never looks like
 * an unchanged day.
 */
export async function syncPrices(options: SyncOptions): Promise<SyncResult> {
  const { store, logger } = options;
  const outcome = await options.scrape();
  if (outcome.records.length === 0) {
    throw new ScrapeExhaustedError(outcome);
  }

  if (options.dryRun) {
    logger.info(`Dry run: skipping write to ${store.describe()}`);
    return { outcome, summary: null, totalRows: null };
  }

  logger.debug(`Reading existing rows from ${store.describe()}`);
  const existing = await store.readTable();
  const { records, summary } = mergeRecords(existing, outcome.records);
  const table = toStoredTable(records);

  const write = () => store.writeTable(table);
  if (options.onWrite) {
    await options.onWrite(write, records.length);
  } else {
    await write();
  }

  return { outcome, summary, totalRows: records.length };
}
