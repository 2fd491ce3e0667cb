import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../src/config.js';
import { silentLogger } from '../src/logger.js';
import { scrapeWithEscalation, type PageSession, type SessionOpener } from '../src/scrapers/mmtcpamp/ladder.js';
import type { ClickTarget } from '../src/scrapers/mmtcpamp/overlay.js';
import type { CapturedPayload, RenderVariant, ScraperConfig } from '../src/scrapers/mmtcpamp/types.js';

interface FakePage {
  html?: string;
  settledHtml?: string;
  payloads?: CapturedPayload[];
  ready?: boolean;
  buttons?: Record<string, string[]>;
}

class FakeSession implements PageSession {
  closed = false;
  waited = false;
  scrolledSteps = 0;
  readonly events: string[] = [];

  constructor(private readonly fake: FakePage) {}

  async findClickTargets(phrase: string, limit: number): Promise<ClickTarget[]> {
    const labels = this.fake.buttons?.[phrase] ?? [];
    return labels.slice(0, limit).map(label => ({
      label,
      click: async () => {
        this.events.push(`click:${label}`);
      }
    }));
  }

  async scroll(steps: number): Promise<void> {
    this.scrolledSteps += steps;
    this.events.push('scroll');
  }

  async waitForPriceContent(): Promise<boolean> {
    this.waited = true;
    return this.fake.ready ?? true;
  }

  async content(): Promise<string> {
    this.events.push('content');
    if (this.waited && this.fake.settledHtml !== undefined) {
      return this.fake.settledHtml;
    }
    return this.fake.html ?? '<html><body></body></html>';
  }

  async capturedPayloads(): Promise<CapturedPayload[]> {
    return this.fake.payloads ?? [];
  }

  async screenshot(): Promise<Buffer> {
    return Buffer.from('fake-png');
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const CARD_HTML = '<html><body><div class="product-card"><p>1g Gold Coin</p><span>₹6,500</span></div></body></html>';

function payload(body: unknown): CapturedPayload {
  return { url: 'https://shop.test/api/products', contentType: 'application/json', body };
}

function testConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return { ...buildConfig({}, ['--no-debug'], '/tmp').scraper, retryDelayMs: 10, ...overrides };
}

function openerFor(pages: Record<string, FakePage | Error>) {
  const sessions: FakeSession[] = [];
  const variants: RenderVariant[] = [];
  const opener: SessionOpener = async variant => {
    variants.push(variant);
    const fake = pages[variant.mode];
    if (fake instanceof Error) {
      throw fake;
    }
    const session = new FakeSession(fake ?? {});
    sessions.push(session);
    return session;
  };
  return { opener, sessions, variants };
}

describe('scrapeWithEscalation', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('falls through to the headed browser when headless finds nothing', async () => {
    const { opener, sessions, variants } = openerFor({
      headless: {},
      headed: { payloads: [payload({ title: '1g Gold Coin', price: 6500 })] }
    });
    const sleep = vi.fn(async (_ms: number) => undefined);

    const outcome = await scrapeWithEscalation(testConfig(), opener, { logger: silentLogger, date: '2024-05-07', sleep });

    expect(outcome.records).toEqual([{ date: '2024-05-07', productName: '1g Gold Coin', price: '₹6500' }]);
    expect(outcome.mode).toBe('headed');
    expect(outcome.strategy).toBe('structured');
    expect(variants).toEqual([
      { mode: 'headless', attempt: 1 },
      { mode: 'headed', attempt: 2 }
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(sessions.every(session => session.closed)).toBe(true);
    expect(outcome.attempts.map(report => report.count)).toEqual([0, 1]);
  });

  it('stops at the first attempt with products', async () => {
    const { opener, variants } = openerFor({ headless: { html: CARD_HTML } });
    const sleep = vi.fn(async (_ms: number) => undefined);

    const outcome = await scrapeWithEscalation(testConfig(), opener, { logger: silentLogger, date: '2024-05-07', sleep });

    expect(outcome.records).toHaveLength(1);
    expect(outcome.strategy).toBe('dom');
    expect(variants).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('prefers structured data and skips the readiness wait', async () => {
    const { opener, sessions } = openerFor({
      headless: {
        html: CARD_HTML,
        payloads: [payload({ products: [{ name: '2g Gold Coin', price: 13000 }] })]
      }
    });

    const outcome = await scrapeWithEscalation(testConfig(), opener, { logger: silentLogger, date: '2024-05-07' });

    expect(outcome.records).toEqual([{ date: '2024-05-07', productName: '2g Gold Coin', price: '₹13000' }]);
    expect(sessions[0].waited).toBe(false);
  });

  it('waits for prices before the DOM scan and reads the settled markup', async () => {
    const { opener, sessions } = openerFor({
      headless: { html: '<html><body><div class="loader"></div></body></html>', settledHtml: CARD_HTML }
    });

    const outcome = await scrapeWithEscalation(testConfig(), opener, { logger: silentLogger, date: '2024-05-07' });

    expect(sessions[0].waited).toBe(true);
    expect(outcome.strategy).toBe('dom');
    expect(outcome.records).toEqual([{ date: '2024-05-07', productName: '1g Gold Coin', price: '₹6,500' }]);
  });

  it('still scans the page when the readiness wait times out', async () => {
    const { opener } = openerFor({ headless: { html: CARD_HTML, ready: false } });

    const outcome = await scrapeWithEscalation(testConfig(), opener, { logger: silentLogger, date: '2024-05-07' });

    expect(outcome.records).toHaveLength(1);
  });

  it('dismisses overlays and scrolls before reading the page', async () => {
    const { opener, sessions } = openerFor({
      headless: { html: CARD_HTML, buttons: { accept: ['Accept all'], close: ['Close'] } }
    });
    const config = testConfig({ scrollSteps: 4 });

    await scrapeWithEscalation(config, opener, { logger: silentLogger, date: '2024-05-07' });

    expect(sessions[0].events.slice(0, 4)).toEqual(['click:Accept all', 'click:Close', 'scroll', 'content']);
    expect(sessions[0].scrolledSteps).toBe(4);
  });

  it('treats a failed browser launch as an empty attempt', async () => {
    const { opener } = openerFor({
      headless: new Error('browserType.launch: Executable does not exist'),
      headed: { html: CARD_HTML }
    });

    const outcome = await scrapeWithEscalation(testConfig(), opener, {
      logger: silentLogger,
      date: '2024-05-07',
      sleep: async () => undefined
    });

    expect(outcome.mode).toBe('headed');
    expect(outcome.attempts[0]).toEqual({
      mode: 'headless',
      attempt: 1,
      strategy: null,
      count: 0,
      error: 'Attempt 1 (headless) failed: browserType.launch: Executable does not exist'
    });
  });

  it('returns an empty record set dated today when every mode fails', async () => {
    const { opener, sessions } = openerFor({ headless: {}, headed: {} });

    const outcome = await scrapeWithEscalation(testConfig(), opener, {
      logger: silentLogger,
      date: '2024-05-07',
      sleep: async () => undefined
    });

    expect(outcome).toEqual({
      date: '2024-05-07',
      records: [],
      strategy: null,
      mode: null,
      attempts: [
        { mode: 'headless', attempt: 1, strategy: null, count: 0 },
        { mode: 'headed', attempt: 2, strategy: null, count: 0 }
      ]
    });
    expect(sessions).toHaveLength(2);
  });

  it('saves debug artifacts for empty attempts', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gold-ladder-'));
    const { opener } = openerFor({
      headless: { payloads: [payload({ status: 'ok' })] }
    });
    const config = testConfig({ renderModes: ['headless'], debugDir: tempDir });

    await scrapeWithEscalation(config, opener, { logger: silentLogger, date: '2024-05-07' });

    const files = (await fs.readdir(tempDir)).sort();
    expect(files).toEqual([
      '2024-05-07-headless-attempt1-payload-01.json',
      '2024-05-07-headless-attempt1.html',
      '2024-05-07-headless-attempt1.png'
    ]);
  });
});
