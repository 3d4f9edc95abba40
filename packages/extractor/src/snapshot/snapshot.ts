import type { ProductRule, Snapshot } from '@supplier-watch/shared';
import { extract } from '../extraction/extract';
import { loadDocument } from '../extraction/document';
import { normalizePrice, getPriceFormat } from '../normalization/price';
import { logger } from '../utils/logger';

/**
 * Build a snapshot of one product page.
 *
 * Missing fields are not errors: they come back as null. The raw price text
 * is kept even when it cannot be normalized, to make selector drift visible.
 */
export function takeSnapshot(html: string, rule: ProductRule): Snapshot {
  const doc = loadDocument(html);

  const price = extract(doc, rule.price);
  const stock = extract(doc, rule.stock);

  logger.debug(
    `${rule.url}: price via ${price.strategyUsed ?? 'none'}, stock via ${stock.strategyUsed ?? 'none'}`,
  );

  return {
    url: rule.url,
    name: rule.name,
    price: normalizePrice(price.value, getPriceFormat(rule.priceLocale)),
    rawPrice: price.value,
    stock: stock.value,
  };
}
