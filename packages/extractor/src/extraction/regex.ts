import { logger } from '../utils/logger';

/**
 * Search `input` for `pattern` and return the first capturing group,
 * or the full match when the pattern has no group at all.
 * Returns null when there is no match or the pattern is invalid.
 */
export function searchPattern(
  input: string,
  pattern: string,
  flags = ''
): string | null {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Invalid regex pattern "${pattern}": ${message}`);
    return null;
  }

  const match = input.match(regex);

  if (!match) {
    return null;
  }

  // A group that took no part in the match is no value
  if (match.length > 1) {
    return match[1] ?? null;
  }

  return match[0];
}

/**
 * Check a pattern compiles, used when loading configuration
 */
export function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
