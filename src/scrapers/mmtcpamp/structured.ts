import * as cheerio from 'cheerio';
import { dedupeByProduct, normalizeText } from './records.js';
import type { ProductPrice } from './types.js';

export type Scalar = string | number | boolean | null;

export type JsonNode =
  | { kind: 'object'; entries: Map<string, JsonNode> }
  | { kind: 'array'; items: JsonNode[] }
  | { kind: 'scalar'; value: Scalar };

// Compared after normalizeKey, in priority order.
const NAME_KEYS = ['name', 'title', 'productname', 'label', 'skuname'];
const PRICE_KEYS = ['price', 'saleprice', 'sellingprice', 'amount', 'value', 'mrp', 'offerprice'];

const MAX_DEPTH = 64;

const EMBEDDED_SELECTORS = [
  'script[type="application/ld+json"]',
  'script#__NEXT_DATA__',
  'script[type="application/json"]'
];

export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toJsonNode(value: unknown, depth = 0): JsonNode {
  if (Array.isArray(value)) {
    return {
      kind: 'array',
      items: depth >= MAX_DEPTH ? [] : value.map(item => toJsonNode(item, depth + 1))
    };
  }
  if (isPlainObject(value)) {
    const entries = new Map<string, JsonNode>();
    if (depth < MAX_DEPTH) {
      for (const [key, child] of Object.entries(value)) {
        entries.set(key, toJsonNode(child, depth + 1));
      }
    }
    return { kind: 'object', entries };
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return { kind: 'scalar', value };
  }
  return { kind: 'scalar', value: null };
}

function lookupScalar(entries: Map<string, JsonNode>, candidates: readonly string[]): Scalar | undefined {
  const byKey = new Map<string, Scalar>();
  for (const [key, node] of entries) {
    const normalized = normalizeKey(key);
    if (node.kind === 'scalar' && node.value !== null && !byKey.has(normalized)) {
      byKey.set(normalized, node.value);
    }
  }
  for (const candidate of candidates) {
    if (byKey.has(candidate)) {
      return byKey.get(candidate);
    }
  }
  return undefined;
}

export function formatPrice(value: Scalar, marker: string): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return `${marker}${value}`;
  }
  return String(value).trim();
}

function isAcceptablePrice(price: string, marker: string): boolean {
  return price.includes(marker) || /\d/.test(price);
}

export function findProductPrices(root: JsonNode, marker: string): ProductPrice[] {
  const found: ProductPrice[] = [];

  const visit = (node: JsonNode): void => {
    if (node.kind === 'array') {
      node.items.forEach(visit);
      return;
    }
    if (node.kind === 'scalar') {
      return;
    }

    const name = lookupScalar(node.entries, NAME_KEYS);
    const price = lookupScalar(node.entries, PRICE_KEYS);
    if (name !== undefined && price !== undefined) {
      const productName = normalizeText(String(name));
      const formatted = formatPrice(price, marker);
      if (productName && isAcceptablePrice(formatted, marker)) {
        found.push({ productName, price: formatted });
      }
    }

    node.entries.forEach(visit);
  };

  visit(root);
  return found;
}

/** Parsed bodies of product-schema and hydration script blocks. Unparseable blocks are skipped. */
export function extractEmbeddedPayloads(html: string, onSkip?: (reason: string) => void): unknown[] {
  const $ = cheerio.load(html);
  const payloads: unknown[] = [];
  const seen = new Set<string>();

  $(EMBEDDED_SELECTORS.join(', ')).each((_idx, element) => {
    const content = $(element).text().trim();
    if (!content || seen.has(content)) return;
    seen.add(content);
    try {
      payloads.push(JSON.parse(content));
    } catch (error) {
      onSkip?.(`Skipping embedded block: ${error instanceof Error ? error.message : String(error)}`);
    }
  });

  return payloads;
}

export function isStructuredContentType(contentType: string): boolean {
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return mediaType === 'application/json' || mediaType === 'text/json' || mediaType.endsWith('+json');
}

export function extractStructured(payloads: readonly unknown[], marker: string): ProductPrice[] {
  const candidates = payloads.flatMap(payload => findProductPrices(toJsonNode(payload), marker));
  return dedupeByProduct(candidates);
}
