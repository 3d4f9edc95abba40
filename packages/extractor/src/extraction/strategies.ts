import type { ExtractionRule } from '@supplier-watch/shared';
import type { ExtractionStrategy, ExtractionResult, ParsedDocument } from './types';
import { selectFirstText } from './css';
import { searchPattern } from './regex';

const SKIPPED = { status: 'skipped' } as const;

/**
 * CSS selector, optionally refined by a regex over the node's text.
 *
 * Once a node is found the strategy resolves: a selector regex that does
 * not match yields null and the document fallback is not consulted.
 * A node with empty text and no regex counts as not found.
 */
export function selectorStrategy(rule: ExtractionRule): ExtractionStrategy {
  return {
    name: 'selector',
    apply(doc) {
      if (!rule.selector) {
        return SKIPPED;
      }

      const text = selectFirstText(doc.$, rule.selector);
      if (text === null) {
        return SKIPPED;
      }

      if (rule.selectorRegex) {
        return { status: 'resolved', value: nonEmpty(searchPattern(text, rule.selectorRegex)) };
      }

      return text === '' ? SKIPPED : { status: 'resolved', value: text };
    },
  };
}

/**
 * Regex over the whole raw HTML, case-insensitive, `.` spanning newlines
 */
export function documentRegexStrategy(rule: ExtractionRule): ExtractionStrategy {
  return {
    name: 'fallback_regex',
    apply(doc) {
      if (!rule.fallbackRegex) {
        return SKIPPED;
      }

      const value = nonEmpty(searchPattern(doc.html, rule.fallbackRegex, 'is'));
      return value === null ? SKIPPED : { status: 'resolved', value };
    },
  };
}

/**
 * Run strategies in order and keep the first that resolves
 */
export function firstMatch(
  strategies: ExtractionStrategy[],
  doc: ParsedDocument
): ExtractionResult {
  for (const strategy of strategies) {
    const outcome = strategy.apply(doc);
    if (outcome.status === 'resolved') {
      return { value: outcome.value, strategyUsed: strategy.name };
    }
  }

  return { value: null, strategyUsed: null };
}

/**
 * Strategy chain for one field: selector first, whole-document regex second
 */
export function strategiesFor(rule: ExtractionRule): ExtractionStrategy[] {
  return [selectorStrategy(rule), documentRegexStrategy(rule)];
}

function nonEmpty(value: string | null): string | null {
  return value === null || value === '' ? null : value;
}
