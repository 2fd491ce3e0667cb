import { chromium, type Browser, type BrowserContext, type Page, type Response } from 'playwright';
import type { Logger } from '../../logger.js';
import { bestEffort, describeError } from './attempt.js';
import type { PageSession, SessionOpener } from './ladder.js';
import type { ClickTarget } from './overlay.js';
import { isStructuredContentType } from './structured.js';
import type { CapturedPayload, RenderVariant, ScraperConfig } from './types.js';

const CLICKABLE_SELECTOR = 'button, [role="button"]';
const CLICK_TIMEOUT_MS = 2000;
const NETWORK_IDLE_TIMEOUT_MS = 20000;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function priceReadyExpression(marker: string): string {
  const hasMarker = `document.body.innerText.includes(${JSON.stringify(marker)})`;
  const hasPriceClass = `Boolean(document.querySelector('[class*="price" i]'))`;
  return `Boolean(document.body) && (${hasMarker} || ${hasPriceClass})`;
}

class ResponseRecorder {
  private readonly captured: CapturedPayload[] = [];
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly limit: number,
    private readonly logger: Logger
  ) {}

  handle(response: Response): void {
    const contentType = response.headers()['content-type'] ?? '';
    if (!isStructuredContentType(contentType) || this.captured.length + this.pending.size >= this.limit) {
      return;
    }
    const url = response.url();
    const task: Promise<void> = response
      .json()
      .then(
        (body: unknown) => {
          this.captured.push({ url, contentType, body });
        },
        (error: unknown) => {
          this.logger.debug(`Skipping response body from ${url}: ${describeError(error)}`);
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  async drain(): Promise<CapturedPayload[]> {
    await Promise.allSettled([...this.pending]);
    return [...this.captured];
  }
}

class PlaywrightSession implements PageSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly recorder: ResponseRecorder,
    private readonly viewportHeight: number
  ) {}

  async findClickTargets(phrase: string, limit: number): Promise<ClickTarget[]> {
    const locator = this.page
      .locator(CLICKABLE_SELECTOR)
      .filter({ hasText: new RegExp(escapeRegExp(phrase), 'i') });
    const count = Math.min(await locator.count(), limit);
    return Array.from({ length: count }, (_unused, index) => ({
      label: `${phrase} #${index + 1}`,
      click: async () => {
        await locator.nth(index).click({ timeout: CLICK_TIMEOUT_MS });
      }
    }));
  }

  async scroll(steps: number, delayMs: number): Promise<void> {
    for (let i = 0; i < steps; i += 1) {
      await this.page.mouse.wheel(0, this.viewportHeight);
      if (delayMs > 0) {
        await this.page.waitForTimeout(delayMs);
      }
    }
  }

  async waitForPriceContent(marker: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForFunction(priceReadyExpression(marker), undefined, { timeout: timeoutMs });
      return true;
    } catch {
      return false;
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }

  capturedPayloads(): Promise<CapturedPayload[]> {
    return this.recorder.drain();
  }

  screenshot(): Promise<Buffer> {
    return this.page.screenshot({ fullPage: true });
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

/** Launches Chromium with a regional visitor profile and loads the shop page. */
export const openBrowserSession: SessionOpener = async (
  variant: RenderVariant,
  config: ScraperConfig,
  logger: Logger
): Promise<PageSession> => {
  const browser = await chromium.launch({
    headless: variant.mode === 'headless',
    args: ['--no-sandbox', '--disable-gpu', '--disable-blink-features=AutomationControlled']
  });

  try {
    const context = await browser.newContext({
      userAgent: config.userAgent,
      locale: config.locale,
      timezoneId: config.timezoneId,
      geolocation: { ...config.geolocation },
      permissions: ['geolocation'],
      viewport: { ...config.viewport },
      extraHTTPHeaders: {
        'Accept-Language': `${config.locale},en;q=0.9`
      }
    });
    const page = await context.newPage();
    const recorder = new ResponseRecorder(config.maxCapturedPayloads, logger);
    page.on('response', response => recorder.handle(response));

    logger.debug(`Navigating to ${config.url}`);
    await bestEffort(
      'Navigation',
      () => page.goto(config.url, { waitUntil: 'domcontentloaded', timeout: config.navigationTimeoutMs }),
      null,
      logger,
      'warn'
    );
    await bestEffort(
      'Waiting for network idle',
      () => page.waitForLoadState('networkidle', { timeout: NETWORK_IDLE_TIMEOUT_MS }),
      undefined,
      logger
    );
    if (config.waitAfterLoadMs > 0) {
      await page.waitForTimeout(config.waitAfterLoadMs);
    }

    return new PlaywrightSession(browser, context, page, recorder, config.viewport.height);
  } catch (error) {
    await browser.close();
    throw error;
  }
};
