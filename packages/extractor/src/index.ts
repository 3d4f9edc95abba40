/**
 * Public API for @supplier-watch/extractor
 */

export * from './extraction';
export * from './change-detection';
export * from './snapshot';
export * from './fetcher';
export * from './auth';
export { normalizePrice, getPriceFormat } from './normalization/price';
export { logger } from './utils/logger';
export type { ExtractorLogger } from './utils/logger';
