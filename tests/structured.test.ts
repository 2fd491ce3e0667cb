import { describe, expect, it, vi } from 'vitest';
import {
  extractEmbeddedPayloads,
  extractStructured,
  findProductPrices,
  formatPrice,
  isStructuredContentType,
  toJsonNode
} from '../src/scrapers/mmtcpamp/structured.js';

describe('structured-data extraction', () => {
  it('pairs a title with a numeric price and adds the currency marker', () => {
    const products = extractStructured([{ title: '1g Gold Coin', price: 6500 }], '₹');
    expect(products.map(product => [product.productName, product.price])).toEqual([['1g Gold Coin', '₹6500']]);
  });

  it('walks nested objects and arrays', () => {
    const payload = {
      data: {
        products: [
          { name: '5g Gold Bar', sellingPrice: '₹32,500' },
          { name: '10g Gold Bar', price: 65000 },
          { name: 'Gift Wrap', price: 'N/A' }
        ]
      }
    };
    expect(extractStructured([payload], '₹')).toEqual([
      { productName: '5g Gold Bar', price: '₹32,500' },
      { productName: '10g Gold Bar', price: '₹65000' }
    ]);
  });

  it('uses the first candidate key in priority order', () => {
    expect(extractStructured([{ title: 'Title', name: 'Name', mrp: 100, price: 90 }], '₹')).toEqual([
      { productName: 'Name', price: '₹90' }
    ]);
  });

  it('matches keys regardless of case and separators', () => {
    expect(extractStructured([{ Product_Name: '2g Coin', 'sale-price': 13000 }], '₹')).toEqual([
      { productName: '2g Coin', price: '₹13000' }
    ]);
  });

  it('ignores objects whose name or price only appear at different levels', () => {
    const payload = { name: '1g Gold Coin', offers: { price: 6500 } };
    expect(extractStructured([payload], '₹')).toEqual([]);
  });

  it('rejects blank names', () => {
    expect(extractStructured([{ name: '   ', price: 5 }], '₹')).toEqual([]);
  });

  it('keeps the last price seen for a product across payloads', () => {
    const products = extractStructured(
      [
        [{ name: '1g Gold Coin', price: 6400 }, { name: '2g Gold Coin', price: 12800 }],
        { name: '1g Gold Coin', price: 6500 }
      ],
      '₹'
    );
    expect(products).toEqual([
      { productName: '2g Gold Coin', price: '₹12800' },
      { productName: '1g Gold Coin', price: '₹6500' }
    ]);
  });

  it('stringifies non-numeric prices as-is', () => {
    expect(formatPrice(' 6,500 INR ', '₹')).toBe('6,500 INR');
    expect(formatPrice(6500.5, '₹')).toBe('₹6500.5');
  });

  it('builds a tagged tree from plain JSON values', () => {
    const node = toJsonNode([1, { a: null }]);
    expect(node.kind).toBe('array');
    if (node.kind !== 'array') return;
    expect(node.items[0]).toEqual({ kind: 'scalar', value: 1 });
    const child = node.items[1];
    expect(child.kind).toBe('object');
    if (child.kind !== 'object') return;
    expect(child.entries.get('a')).toEqual({ kind: 'scalar', value: null });
  });

  it('finds matches inside objects that matched themselves', () => {
    const root = toJsonNode({ name: 'Gold', value: 24, variants: [{ label: '1g', amount: 6500 }] });
    expect(findProductPrices(root, '₹')).toEqual([
      { productName: 'Gold', price: '₹24' },
      { productName: '1g', price: '₹6500' }
    ]);
  });
});

describe('embedded payloads', () => {
  it('parses product schema and hydration blocks and skips broken ones', () => {
    const html = `
      <html><head>
        <script type="application/ld+json">{"name":"1g Gold Coin","price":6500}</script>
        <script type="application/ld+json">{not json</script>
      </head><body>
        <script id="__NEXT_DATA__" type="application/json">{"props":{"items":[{"title":"2g Coin","offerPrice":13000}]}}</script>
      </body></html>`;
    const onSkip = vi.fn();

    const payloads = extractEmbeddedPayloads(html, onSkip);

    expect(payloads).toHaveLength(2);
    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(extractStructured(payloads, '₹')).toEqual([
      { productName: '1g Gold Coin', price: '₹6500' },
      { productName: '2g Coin', price: '₹13000' }
    ]);
  });
});

describe('isStructuredContentType', () => {
  it('accepts JSON media types only', () => {
    expect(isStructuredContentType('application/json; charset=utf-8')).toBe(true);
    expect(isStructuredContentType('application/ld+json')).toBe(true);
    expect(isStructuredContentType('application/vnd.api+json')).toBe(true);
    expect(isStructuredContentType('text/html')).toBe(false);
    expect(isStructuredContentType('')).toBe(false);
  });
});
