// Snapshot diffing

import type { ChangeEvent, Snapshot } from '@supplier-watch/shared';
import type { PriceChangedEvent, StockChangedEvent } from './types';

/**
 * Compare the stored snapshot of a product with the one just taken.
 *
 * A product seen for the first time yields a single `new_record` event and
 * its fields are not compared. Otherwise price and stock are compared by
 * value, in that order; null equals null.
 */
export function detectChanges(
  previous: Snapshot | null | undefined,
  current: Snapshot
): ChangeEvent[] {
  if (!previous) {
    return [{ kind: 'new_record' }];
  }

  const events: ChangeEvent[] = [];

  const price = detectPriceChange(previous.price, current.price);
  if (price) events.push(price);

  const stock = detectStockChange(previous.stock, current.stock);
  if (stock) events.push(stock);

  return events;
}

export function detectPriceChange(
  prev: number | null,
  curr: number | null
): PriceChangedEvent | null {
  if (prev === curr) {
    return null;
  }
  return { kind: 'price_changed', previous: prev, current: curr };
}

export function detectStockChange(
  prev: string | null,
  curr: string | null
): StockChangedEvent | null {
  if (prev === curr) {
    return null;
  }
  return { kind: 'stock_changed', previous: prev, current: curr };
}
