// Change detection module exports

export { detectChanges, detectPriceChange, detectStockChange } from './detect';
export { describeChange, formatPrice } from './describe';
export type { PriceChangedEvent, StockChangedEvent } from './types';
