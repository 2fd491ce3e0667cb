import { createArrayCsvWriter } from 'csv-writer';
import fs from 'fs/promises';
import path from 'path';
import type { PriceStore } from './priceSync.js';
import { EMPTY_TABLE, type StoredTable } from './reconcile.js';

export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    const nextChar = line[i + 1];

    if (char === '"' && inQuotes && nextChar === '"') {
      current += '"';
      i += 1;
      continue;
    }

    if (char === '"') {
      inQuotes = !inQuotes;
      continue;
    }

    if (char === ',' && !inQuotes) {
      fields.push(current);
      current = '';
      continue;
    }

    current += char;
  }

  fields.push(current);
  return fields;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Local CSV file holding the full price history, header row first. */
export class CSVPriceStore implements PriceStore {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return `CSV file ${this.filePath}`;
  }

  async readTable(): Promise<StoredTable> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return EMPTY_TABLE;
      }
      throw error;
    }

    const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/).filter(line => line.trim() !== '');
    if (lines.length === 0) {
      return EMPTY_TABLE;
    }
    const [headerLine, ...rowLines] = lines;
    return {
      header: parseCsvLine(headerLine),
      rows: rowLines.map(line => parseCsvLine(line))
    };
  }

  async writeTable(table: StoredTable): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const writer = createArrayCsvWriter({
      path: this.filePath,
      header: table.header,
      append: false
    });
    await writer.writeRecords(table.rows);
  }
}
