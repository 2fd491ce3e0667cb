import type { PriceRecord, ProductPrice } from './types.js';

export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Collapses candidates sharing a product name. The last occurrence wins and
 * keeps its own position in the output.
 */
export function dedupeByProduct<T extends ProductPrice>(products: readonly T[]): T[] {
  const lastIndex = new Map<string, number>();
  products.forEach((product, index) => lastIndex.set(product.productName, index));
  return products.filter((product, index) => lastIndex.get(product.productName) === index);
}

export function toDatedRecords(products: readonly ProductPrice[], date: string): PriceRecord[] {
  return dedupeByProduct(products).map(product => ({
    date,
    productName: product.productName,
    price: product.price
  }));
}

/** Calendar date as YYYY-MM-DD, in `timeZone` when given, else process local time. */
export function formatRunDate(now: Date, timeZone?: string): string {
  if (timeZone) {
    return new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    }).format(now);
  }
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
