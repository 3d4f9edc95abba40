import * as cheerio from 'cheerio';
import type { ParsedDocument } from './types';

/**
 * Parse HTML once so every field of a product reads the same tree
 */
export function loadDocument(html: string): ParsedDocument {
  return { html, $: cheerio.load(html) };
}
