import * as cheerio from 'cheerio';
import { dedupeByProduct, normalizeText } from './records.js';
import type { ProductPrice } from './types.js';

const CARD_CLASS_HINTS = ['card', 'product', 'item', 'tile'];
const NAME_CLASS_HINTS = ['name', 'title'];
const NAME_TAGS = new Set(['p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6']);
const MAX_CARD_DEPTH = 6;
const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches the marker followed by a digit, e.g. `₹6,500` or `₹ 6,500`. */
function markedAmountPattern(marker: string): RegExp {
  return new RegExp(`${escapeRegExp(marker)}\\s*\\d`);
}

function hasClassHint(className: string | undefined, hints: readonly string[]): boolean {
  if (!className) {
    return false;
  }
  const lowered = className.toLowerCase();
  return hints.some(hint => lowered.includes(hint));
}

/**
 * Pairs each currency-marked price with the first paragraph-like element of
 * its product card. Cards are found by class-name hints, falling back to the
 * price element's parent.
 */
export function extractFromDom(html: string, marker: string): ProductPrice[] {
  const $ = cheerio.load(html);
  const found: ProductPrice[] = [];
  const markedAmount = markedAmountPattern(marker);

  $('body *').each((_idx, element) => {
    if (SKIPPED_TAGS.has(element.tagName)) return;
    const ownTextHolder = $(element).clone();
    ownTextHolder.children().remove();
    if (!ownTextHolder.text().includes(marker)) return;

    // A bare symbol element (`<i>₹</i>6,500`) hands the price to the ancestor holding the amount.
    let priceEl = $(element);
    for (let depth = 0; depth < MAX_CARD_DEPTH && !markedAmount.test(normalizeText(priceEl.text())); depth += 1) {
      const parent = priceEl.parent();
      if (parent.length === 0) break;
      priceEl = parent;
    }
    const priceNode = priceEl.get(0);
    const price = normalizeText(priceEl.text());
    let container = priceEl.parent();
    let ancestor = container;
    for (let depth = 0; depth < MAX_CARD_DEPTH && ancestor.length > 0; depth += 1) {
      if (hasClassHint(ancestor.attr('class'), CARD_CLASS_HINTS)) {
        container = ancestor;
        break;
      }
      ancestor = ancestor.parent();
    }
    if (container.length === 0) return;

    let productName = '';
    container.find('*').each((_i, candidate) => {
      if (candidate === element || candidate === priceNode) return;
      const isNameLike =
        NAME_TAGS.has(candidate.tagName) || hasClassHint($(candidate).attr('class'), NAME_CLASS_HINTS);
      if (!isNameLike) return;
      const text = normalizeText($(candidate).text());
      if (!text || text.includes(marker)) return;
      productName = text;
      return false;
    });

    if (productName && markedAmount.test(price)) {
      found.push({ productName, price });
    }
  });

  return dedupeByProduct(found);
}
