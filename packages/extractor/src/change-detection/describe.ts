// Human-readable change descriptions

import type { ChangeEvent } from '@supplier-watch/shared';

const MISSING = 'n/a';

/**
 * Render one change event, e.g. `price: 49.90 → 54.90`
 */
export function describeChange(event: ChangeEvent): string {
  switch (event.kind) {
    case 'new_record':
      return 'new record';
    case 'price_changed':
      return `price: ${formatPrice(event.previous)} → ${formatPrice(event.current)}`;
    case 'stock_changed':
      return `stock: ${event.previous ?? MISSING} → ${event.current ?? MISSING}`;
  }
}

export function formatPrice(value: number | null): string {
  return value === null ? MISSING : value.toFixed(2);
}
