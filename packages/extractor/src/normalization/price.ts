import type { PriceFormat } from '@supplier-watch/shared';

const DEFAULT_LOCALE = 'pt-PT';
const CURRENCY_TOKENS = ['€', 'EUR', '$', 'USD', '£', 'GBP'];
const PLAIN_DECIMAL = /^-?\d+(?:\.\d+)?$/;

/**
 * Normalizes a raw price string into a numeric value rounded to 2 decimals.
 *
 * Dots are thousands separators in the default (Portuguese) format:
 * - "1.234,56" → 1234.56
 * - "49,90 €" → 49.9
 * - "1 299,00 €" → 1299
 *
 * @param rawValue - Raw price text extracted from the product page
 * @param format - Separators and currency tokens, see {@link getPriceFormat}
 * @returns The price, or null when the text is not a number
 */
export function normalizePrice(
  rawValue: string | null | undefined,
  format: PriceFormat = getPriceFormat(DEFAULT_LOCALE)
): number | null {
  if (!rawValue) {
    return null;
  }

  let processed = rawValue;

  // Step 1: Strip currency tokens
  for (const token of format.currencyTokens) {
    processed = processed.replace(new RegExp(escapeRegex(token), 'gi'), '');
  }

  // Step 2: Strip spaces and NBSP
  processed = processed.replace(/[ \u00A0]/g, '').trim();

  // Step 3: Remove thousand separators
  for (const separator of format.thousandSeparators) {
    processed = processed.replace(new RegExp(escapeRegex(separator), 'g'), '');
  }

  // Step 4: Convert decimal separator to "."
  if (format.decimalSeparator === ',') {
    processed = processed.replace(/,/g, '.');
  }

  // Step 5: Parse and round, refusing anything that is not a plain decimal
  if (!PLAIN_DECIMAL.test(processed)) {
    return null;
  }
  const numericValue = roundDecimal(processed, 2);
  if (!Number.isFinite(numericValue)) {
    return null;
  }

  return numericValue;
}

/**
 * Returns separators for common locales.
 * Comma-decimal locales are the default since supplier sites are European.
 */
export function getPriceFormat(locale: string = DEFAULT_LOCALE): PriceFormat {
  const normalizedLocale = locale.toLowerCase();

  // US, UK - dot decimal, comma thousand separator
  if (normalizedLocale.startsWith('en')) {
    return {
      decimalSeparator: '.',
      thousandSeparators: [','],
      currencyTokens: CURRENCY_TOKENS,
    };
  }

  // Portuguese, Spanish, German, ... - comma decimal, dot thousand separator
  return {
    decimalSeparator: ',',
    thousandSeparators: ['.'],
    currencyTokens: CURRENCY_TOKENS,
  };
}

/**
 * Round a plain decimal string half away from zero.
 * Works on the digits so that "1234,565" rounds up like "0,565" does.
 */
function roundDecimal(decimal: string, scale: number): number {
  const negative = decimal.startsWith('-');
  const [integerPart = '0', fractionPart = ''] = decimal.replace('-', '').split('.');

  const kept = fractionPart.slice(0, scale).padEnd(scale, '0');
  const roundUp = (fractionPart[scale] ?? '0') >= '5';

  const units = Number(integerPart + kept) + (roundUp ? 1 : 0);
  const rounded = units / Math.pow(10, scale);
  return negative && rounded !== 0 ? -rounded : rounded;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
