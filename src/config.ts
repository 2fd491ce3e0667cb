import path from 'path';
import type { RenderMode, ScraperConfig } from './scrapers/mmtcpamp/types.js';

export type StoreKind = 'sheets' | 'csv';

export interface StoreConfig {
  readonly kind: StoreKind;
  readonly spreadsheetId?: string;
  readonly worksheet: string;
  readonly csvPath: string;
  readonly credentialsJson?: string;
  readonly credentialsPath?: string;
}

export interface AppConfig {
  readonly scraper: ScraperConfig;
  readonly store: StoreConfig;
  readonly runTimeZone?: string;
  readonly dryRun: boolean;
  readonly verbose: boolean;
}

type Env = Record<string, string | undefined>;

const RENDER_MODES: readonly RenderMode[] = ['headless', 'headed'];

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readFloat(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function isRenderMode(value: string): value is RenderMode {
  return RENDER_MODES.some(mode => mode === value);
}

export function parseRenderModes(value: string | undefined): RenderMode[] {
  if (!value || value.trim() === '') {
    return [...RENDER_MODES];
  }
  return value
    .split(',')
    .map(entry => entry.trim().toLowerCase())
    .filter(Boolean)
    .map(entry => {
      if (!isRenderMode(entry)) {
        throw new Error(`Unknown render mode "${entry}" (expected ${RENDER_MODES.join(' or ')})`);
      }
      return entry;
    });
}

function parseStoreKind(value: string | undefined): StoreKind {
  const kind = (value || 'sheets').trim().toLowerCase();
  if (kind !== 'sheets' && kind !== 'csv') {
    throw new Error(`Unknown store "${kind}" (expected sheets or csv)`);
  }
  return kind;
}

/** Folds `--flag value` arguments over the environment, using the same variable names. */
export function applyArgs(env: Env, argv: readonly string[]): Env {
  const merged: Env = { ...env };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === '--url' && next) {
      merged.GOLD_URL = next;
      i += 1;
    } else if (arg === '--modes' && next) {
      merged.GOLD_RENDER_MODES = next;
      i += 1;
    } else if (arg === '--headless-only') {
      merged.GOLD_RENDER_MODES = 'headless';
    } else if (arg === '--timeout' && next) {
      merged.GOLD_NAV_TIMEOUT_MS = next;
      i += 1;
    } else if (arg === '--ready-timeout' && next) {
      merged.GOLD_READY_TIMEOUT_MS = next;
      i += 1;
    } else if (arg === '--scroll-steps' && next) {
      merged.GOLD_SCROLL_STEPS = next;
      i += 1;
    } else if (arg === '--scroll-delay' && next) {
      merged.GOLD_SCROLL_DELAY_MS = next;
      i += 1;
    } else if (arg === '--retry-delay' && next) {
      merged.GOLD_RETRY_DELAY_MS = next;
      i += 1;
    } else if (arg === '--debug-dir' && next) {
      merged.GOLD_DEBUG_DIR = next;
      i += 1;
    } else if (arg === '--no-debug') {
      merged.GOLD_DEBUG_DIR = 'off';
    } else if (arg === '--csv' && next) {
      merged.GOLD_STORE = 'csv';
      merged.GOLD_CSV_PATH = next;
      i += 1;
    } else if (arg === '--sheet' && next) {
      merged.GOLD_STORE = 'sheets';
      merged.GOLD_SHEET_ID = next;
      i += 1;
    } else if (arg === '--worksheet' && next) {
      merged.GOLD_WORKSHEET = next;
      i += 1;
    } else if (arg === '--dry-run') {
      merged.GOLD_DRY_RUN = 'true';
    } else if (arg === '--verbose') {
      merged.GOLD_VERBOSE = 'true';
    }
  }
  return merged;
}

export function buildConfig(
  env: Env = process.env,
  argv: readonly string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): AppConfig {
  const vars = applyArgs(env, argv);
  const debugDir = vars.GOLD_DEBUG_DIR === 'off' ? null : vars.GOLD_DEBUG_DIR || path.join(cwd, 'data', 'debug');

  const scraper: ScraperConfig = Object.freeze({
    url: vars.GOLD_URL || 'https://www.mmtcpamp.com/shop/gold',
    currencyMarker: vars.GOLD_CURRENCY_MARKER || '₹',
    renderModes: Object.freeze(parseRenderModes(vars.GOLD_RENDER_MODES)),
    navigationTimeoutMs: readInt(vars.GOLD_NAV_TIMEOUT_MS, 90000),
    readyTimeoutMs: readInt(vars.GOLD_READY_TIMEOUT_MS, 30000),
    waitAfterLoadMs: readInt(vars.GOLD_WAIT_AFTER_LOAD_MS, 1500),
    scrollSteps: readInt(vars.GOLD_SCROLL_STEPS, 6),
    scrollDelayMs: readInt(vars.GOLD_SCROLL_DELAY_MS, 800),
    retryDelayMs: readInt(vars.GOLD_RETRY_DELAY_MS, 5000),
    userAgent: vars.GOLD_USER_AGENT || DEFAULT_USER_AGENT,
    locale: vars.GOLD_LOCALE || 'en-IN',
    timezoneId: vars.GOLD_TIMEZONE || 'Asia/Kolkata',
    geolocation: Object.freeze({
      latitude: readFloat(vars.GOLD_GEO_LAT, 19.076),
      longitude: readFloat(vars.GOLD_GEO_LON, 72.8777)
    }),
    viewport: Object.freeze({ width: 1440, height: 1024 }),
    maxCapturedPayloads: readInt(vars.GOLD_MAX_CAPTURED_PAYLOADS, 200),
    debugDir,
    maxDebugPayloads: 50
  });

  const store: StoreConfig = Object.freeze({
    kind: parseStoreKind(vars.GOLD_STORE),
    spreadsheetId: vars.GOLD_SHEET_ID || undefined,
    worksheet: vars.GOLD_WORKSHEET || 'Daily',
    csvPath: vars.GOLD_CSV_PATH || path.join(cwd, 'data', 'gold-prices.csv'),
    credentialsJson: vars.GOOGLE_SERVICE_ACCOUNT_JSON || undefined,
    credentialsPath: vars.GOOGLE_APPLICATION_CREDENTIALS || undefined
  });

  return Object.freeze({
    scraper,
    store,
    runTimeZone: vars.GOLD_RUN_TIMEZONE || undefined,
    dryRun: vars.GOLD_DRY_RUN === 'true',
    verbose: vars.GOLD_VERBOSE === 'true'
  });
}
