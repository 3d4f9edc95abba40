import type { CheerioAPI } from 'cheerio';
import { logger } from '../utils/logger';

/**
 * Trimmed text of the first node matching a CSS selector.
 * Returns null when nothing matches or the selector is invalid.
 */
export function selectFirstText($: CheerioAPI, selector: string): string | null {
  try {
    const element = $(selector).first();

    if (element.length === 0) {
      return null; // Element not found
    }

    return element.text().trim();
  } catch (error) {
    // cheerio throws on selectors it cannot parse
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Invalid CSS selector "${selector}": ${message}`);
    return null;
  }
}
