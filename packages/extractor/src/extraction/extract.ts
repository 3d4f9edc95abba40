import type { ExtractionRule } from '@supplier-watch/shared';
import type { ExtractionResult, ParsedDocument } from './types';
import { firstMatch, strategiesFor } from './strategies';

/**
 * Main extraction function
 * Resolves one field of a product page through the selector → fallback chain
 */
export function extract(doc: ParsedDocument, rule: ExtractionRule): ExtractionResult {
  return firstMatch(strategiesFor(rule), doc);
}
