export type RenderMode = 'headless' | 'headed';

export interface ProductPrice {
  productName: string;
  price: string;
}

export interface PriceRecord extends ProductPrice {
  date: string;
}

export interface CapturedPayload {
  url: string;
  contentType: string;
  body: unknown;
}

export type ExtractionStrategy = 'structured' | 'dom';

export interface RenderVariant {
  readonly mode: RenderMode;
  readonly attempt: number;
}

export interface AttemptReport {
  mode: RenderMode;
  attempt: number;
  strategy: ExtractionStrategy | null;
  count: number;
  error?: string;
}

export interface ScrapeOutcome {
  date: string;
  records: PriceRecord[];
  strategy: ExtractionStrategy | null;
  mode: RenderMode | null;
  attempts: AttemptReport[];
}

export interface Geolocation {
  latitude: number;
  longitude: number;
}

export interface ScraperConfig {
  readonly url: string;
  readonly currencyMarker: string;
  readonly renderModes: readonly RenderMode[];
  readonly navigationTimeoutMs: number;
  readonly readyTimeoutMs: number;
  readonly waitAfterLoadMs: number;
  readonly scrollSteps: number;
  readonly scrollDelayMs: number;
  readonly retryDelayMs: number;
  readonly userAgent: string;
  readonly locale: string;
  readonly timezoneId: string;
  readonly geolocation: Readonly<Geolocation>;
  readonly viewport: Readonly<{ width: number; height: number }>;
  readonly maxCapturedPayloads: number;
  readonly debugDir: string | null;
  readonly maxDebugPayloads: number;
}
