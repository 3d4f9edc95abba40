import type { CheerioAPI } from 'cheerio';

/**
 * A product page parsed once and shared by every field extraction
 */
export interface ParsedDocument {
  /** Raw HTML as received */
  html: string;
  $: CheerioAPI;
}

/**
 * Outcome of a single extraction strategy.
 *
 * `skipped` hands over to the next strategy; `resolved` ends the chain,
 * even when the resolved value is null.
 */
export type StrategyOutcome =
  | { status: 'skipped' }
  | { status: 'resolved'; value: string | null };

export interface ExtractionStrategy {
  name: string;
  apply(doc: ParsedDocument): StrategyOutcome;
}

/**
 * Result of an extraction operation
 */
export interface ExtractionResult {
  value: string | null;
  /** Name of the strategy that resolved the field, null when all skipped */
  strategyUsed: string | null;
}
