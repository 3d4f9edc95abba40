// Local types for change detection module

import type { ChangeEvent } from '@supplier-watch/shared';

export type PriceChangedEvent = Extract<ChangeEvent, { kind: 'price_changed' }>;
export type StockChangedEvent = Extract<ChangeEvent, { kind: 'stock_changed' }>;
