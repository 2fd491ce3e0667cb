import fs from 'fs/promises';
import crypto from 'crypto';
import type { PriceStore } from './priceSync.js';
import { EMPTY_TABLE, type StoredTable } from './reconcile.js';

const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';
const SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ServiceAccountKey {
  client_email: string;
  private_key: string;
}

export interface GoogleSheetsStoreOptions {
  spreadsheetId: string;
  worksheet: string;
  getAccessToken: () => Promise<string>;
  fetchImpl?: FetchLike;
}

export interface CredentialSources {
  credentialsJson?: string;
  credentialsPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function base64UrlEncode(input: Buffer): string {
  return input
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

export function parseServiceAccountKey(raw: string, source: string): ServiceAccountKey {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Service account key in ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed) || typeof parsed.client_email !== 'string' || typeof parsed.private_key !== 'string') {
    throw new Error(`Service account key in ${source} is missing client_email/private_key`);
  }
  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

export async function loadServiceAccountKey(sources: CredentialSources): Promise<ServiceAccountKey> {
  if (sources.credentialsJson) {
    return parseServiceAccountKey(sources.credentialsJson, 'GOOGLE_SERVICE_ACCOUNT_JSON');
  }
  if (sources.credentialsPath) {
    const raw = await fs.readFile(sources.credentialsPath, 'utf8');
    return parseServiceAccountKey(raw, sources.credentialsPath);
  }
  throw new Error('No Google credentials: set GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_APPLICATION_CREDENTIALS');
}

export function buildServiceAccountAssertion(key: ServiceAccountKey, nowSeconds: number): string {
  const header = base64UrlEncode(Buffer.from(JSON.stringify({ alg: 'RS256', typ: 'JWT' })));
  const payload = base64UrlEncode(
    Buffer.from(
      JSON.stringify({
        iss: key.client_email,
        scope: SCOPE,
        aud: TOKEN_URL,
        iat: nowSeconds,
        exp: nowSeconds + 3600
      })
    )
  );
  const signature = crypto
    .createSign('RSA-SHA256')
    .update(`${header}.${payload}`)
    .sign(key.private_key);
  return `${header}.${payload}.${base64UrlEncode(signature)}`;
}

export async function getServiceAccountToken(
  key: ServiceAccountKey,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  const assertion = buildServiceAccountAssertion(key, Math.floor(Date.now() / 1000));
  const body = new URLSearchParams({
    grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
    assertion
  });

  const response = await fetchImpl(TOKEN_URL, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body
  });
  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Google OAuth error (${response.status}): ${text}`);
  }
  const json: unknown = await response.json();
  if (!isRecord(json) || typeof json.access_token !== 'string' || !json.access_token) {
    throw new Error('Google OAuth response did not include an access_token');
  }
  return json.access_token;
}

/** A1 sheet reference: the title in single quotes, embedded quotes doubled. */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function toCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

/** One worksheet tab of a Google spreadsheet, read and rewritten through the Sheets v4 REST API. */
export class GoogleSheetsStore implements PriceStore {
  private readonly fetchImpl: FetchLike;
  private token: string | null = null;

  constructor(private readonly options: GoogleSheetsStoreOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  describe(): string {
    return `Google Sheet ${this.options.spreadsheetId} (${this.options.worksheet})`;
  }

  async readTable(): Promise<StoredTable> {
    await this.ensureSheet();
    const range = encodeURIComponent(quoteSheetTitle(this.options.worksheet));
    const json = await this.fetchJson(`${SHEETS_API}/${this.options.spreadsheetId}/values/${range}`);
    const values: unknown[] = isRecord(json) && Array.isArray(json.values) ? json.values : [];
    const rows = values.map(row => (Array.isArray(row) ? row.map(toCell) : []));
    if (rows.length === 0) {
      return EMPTY_TABLE;
    }
    const [header, ...rest] = rows;
    return { header, rows: rest };
  }

  async writeTable(table: StoredTable): Promise<void> {
    await this.ensureSheet();
    const { spreadsheetId, worksheet } = this.options;
    await this.fetchJson(
      `${SHEETS_API}/${spreadsheetId}/values/${encodeURIComponent(quoteSheetTitle(worksheet))}:clear`,
      { method: 'POST', body: {} }
    );
    await this.fetchJson(
      `${SHEETS_API}/${spreadsheetId}/values/${encodeURIComponent(`${quoteSheetTitle(worksheet)}!A1`)}?valueInputOption=RAW`,
      { method: 'PUT', body: { values: [table.header, ...table.rows] } }
    );
  }

  private async ensureSheet(): Promise<void> {
    const { spreadsheetId, worksheet } = this.options;
    const metadata = await this.fetchJson(`${SHEETS_API}/${spreadsheetId}?fields=sheets.properties.title`);
    const sheets: unknown[] = isRecord(metadata) && Array.isArray(metadata.sheets) ? metadata.sheets : [];
    const exists = sheets.some(
      sheet => isRecord(sheet) && isRecord(sheet.properties) && sheet.properties.title === worksheet
    );
    if (exists) {
      return;
    }

    await this.fetchJson(`${SHEETS_API}/${spreadsheetId}:batchUpdate`, {
      method: 'POST',
      body: {
        requests: [{ addSheet: { properties: { title: worksheet } } }]
      }
    });
  }

  private async accessToken(): Promise<string> {
    if (!this.token) {
      this.token = await this.options.getAccessToken();
    }
    return this.token;
  }

  private async fetchJson(url: string, options: { method?: string; body?: unknown } = {}): Promise<unknown> {
    const { method = 'GET', body } = options;
    const token = await this.accessToken();
    const response = await this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json'
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Google Sheets API error (${response.status}): ${text}`);
    }

    if (response.status === 204) {
      return null;
    }

    return response.json();
  }
}
