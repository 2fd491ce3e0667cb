import type { Logger } from '../../logger.js';
import { attempt, bestEffort, sleep as defaultSleep } from './attempt.js';
import { buildDebugPrefix, writeDebugArtifacts } from './debug.js';
import { extractFromDom } from './dom.js';
import { dismissOverlays, type OverlaySurface } from './overlay.js';
import { toDatedRecords } from './records.js';
import { extractEmbeddedPayloads, extractStructured } from './structured.js';
import type {
  AttemptReport,
  CapturedPayload,
  ExtractionStrategy,
  ProductPrice,
  RenderVariant,
  ScrapeOutcome,
  ScraperConfig
} from './types.js';

/** One rendered page in its own browser. Closed by the ladder after every attempt. */
export interface PageSession extends OverlaySurface {
  scroll(steps: number, delayMs: number): Promise<void>;
  /** Resolves false when the timeout elapses before prices appear. */
  waitForPriceContent(marker: string, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
  capturedPayloads(): Promise<CapturedPayload[]>;
  screenshot(): Promise<Buffer>;
  close(): Promise<void>;
}

export type SessionOpener = (variant: RenderVariant, config: ScraperConfig, logger: Logger) => Promise<PageSession>;

export interface LadderOptions {
  logger: Logger;
  date: string;
  sleep?: (ms: number) => Promise<void>;
}

interface ExtractionResult {
  strategy: ExtractionStrategy | null;
  products: ProductPrice[];
}

const EMPTY_EXTRACTION: ExtractionResult = { strategy: null, products: [] };

async function extractFromSession(
  session: PageSession,
  config: ScraperConfig,
  logger: Logger
): Promise<ExtractionResult> {
  const marker = config.currencyMarker;
  const html = await bestEffort('Reading page markup', () => session.content(), '', logger, 'warn');
  const captured = await bestEffort('Collecting captured responses', () => session.capturedPayloads(), [], logger);
  const embedded = extractEmbeddedPayloads(html, reason => logger.debug(reason));
  logger.debug(`Structured payloads: ${captured.length} captured, ${embedded.length} embedded`);

  const structured = extractStructured([...captured.map(payload => payload.body), ...embedded], marker);
  if (structured.length > 0) {
    return { strategy: 'structured', products: structured };
  }

  const ready = await bestEffort(
    'Waiting for price content',
    () => session.waitForPriceContent(marker, config.readyTimeoutMs),
    false,
    logger
  );
  if (!ready) {
    logger.warn(`No price content after ${config.readyTimeoutMs}ms; scanning whatever rendered`);
  }
  const settledHtml = await bestEffort('Reading page markup', () => session.content(), html, logger, 'warn');
  const dom = extractFromDom(settledHtml, marker);
  return dom.length > 0 ? { strategy: 'dom', products: dom } : EMPTY_EXTRACTION;
}

async function saveDiagnostics(
  session: PageSession,
  variant: RenderVariant,
  config: ScraperConfig,
  date: string,
  logger: Logger
): Promise<void> {
  if (!config.debugDir) {
    return;
  }
  const debugDir = config.debugDir;
  const written = await bestEffort(
    'Writing debug artifacts',
    async () => {
      const screenshot = await bestEffort('Capturing screenshot', () => session.screenshot(), null, logger);
      const html = await session.content();
      const payloads = await session.capturedPayloads();
      return writeDebugArtifacts(
        debugDir,
        buildDebugPrefix(date, variant.mode, variant.attempt),
        { screenshot, html, payloads },
        config.maxDebugPayloads
      );
    },
    [],
    logger,
    'warn'
  );
  if (written.length > 0) {
    logger.info(`Saved ${written.length} debug artifact(s) to ${debugDir}`);
  }
}

async function runAttempt(
  variant: RenderVariant,
  config: ScraperConfig,
  openSession: SessionOpener,
  date: string,
  logger: Logger
): Promise<ExtractionResult> {
  const session = await openSession(variant, config, logger);
  try {
    await dismissOverlays(session, logger);
    await bestEffort(
      'Scrolling page',
      () => session.scroll(config.scrollSteps, config.scrollDelayMs),
      undefined,
      logger
    );
    const result = await extractFromSession(session, config, logger);
    if (result.products.length === 0) {
      await saveDiagnostics(session, variant, config, date, logger);
    }
    return result;
  } finally {
    await bestEffort('Closing browser', () => session.close(), undefined, logger);
  }
}

/**
 * Tries each configured render mode in order, one fresh browser per attempt,
 * and stops at the first attempt that yields products. An exhausted ladder
 * returns an empty record set dated `date`.
 */
export async function scrapeWithEscalation(
  config: ScraperConfig,
  openSession: SessionOpener,
  options: LadderOptions
): Promise<ScrapeOutcome> {
  const { logger, date } = options;
  const sleep = options.sleep ?? defaultSleep;
  const attempts: AttemptReport[] = [];

  for (const [index, mode] of config.renderModes.entries()) {
    if (index > 0 && config.retryDelayMs > 0) {
      logger.info(`Waiting ${config.retryDelayMs}ms before the next attempt...`);
      await sleep(config.retryDelayMs);
    }

    const variant: RenderVariant = Object.freeze({ mode, attempt: index + 1 });
    logger.info(`Attempt ${variant.attempt}/${config.renderModes.length}: ${mode} browser`);
    const result = await attempt(
      `Attempt ${variant.attempt} (${mode})`,
      () => runAttempt(variant, config, openSession, date, logger),
      EMPTY_EXTRACTION
    );

    const report: AttemptReport = {
      mode,
      attempt: variant.attempt,
      strategy: result.value.strategy,
      count: result.value.products.length
    };
    if (!result.ok) {
      report.error = result.diagnostic;
      logger.warn(result.diagnostic);
    }
    attempts.push(report);

    if (result.value.products.length > 0) {
      logger.success(`Found ${result.value.products.length} products via ${result.value.strategy} data (${mode})`);
      return {
        date,
        records: toDatedRecords(result.value.products, date),
        strategy: result.value.strategy,
        mode,
        attempts
      };
    }
    logger.warn(`Attempt ${variant.attempt} (${mode}) found no products`);
  }

  return { date, records: [], strategy: null, mode: null, attempts };
}
