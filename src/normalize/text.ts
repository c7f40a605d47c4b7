/**
 * Text Normalization
 *
 * Cleans scraped text before it becomes part of a startup record.
 * Every display field passes through cleanText once, at the record
 * boundary; later stages clean only the text they add.
 *
 * @module normalize/text
 */

import { decodeHTML } from 'entities';

/** Any run of whitespace, including newlines and tabs */
const WHITESPACE_RUN = /\s+/g;

/** Everything outside printable ASCII (0x20-0x7E) */
const NON_PRINTABLE = /[^\x20-\x7E]/g;

/**
 * One decode, collapse, strip and trim pass.
 */
function cleanPass(text: string): string {
  return decodeHTML(text)
    .replace(WHITESPACE_RUN, ' ')
    .replace(NON_PRINTABLE, '')
    .replace(/ {2,}/g, ' ')
    .trim();
}

/**
 * Clean scraped text.
 *
 * Each pass:
 * 1. Decodes HTML entities (named and numeric)
 * 2. Collapses whitespace runs to one space
 * 3. Strips characters outside printable ASCII
 * 4. Collapses again and trims
 *
 * Passes repeat until the text stops changing, so double-encoded input
 * (`&amp;lt;`) and entities formed by stripping (`&am\u00e9p;`) are fully
 * decoded and `cleanText(cleanText(x)) === cleanText(x)`. Every pass that
 * changes the text shortens it.
 *
 * @param text - Raw text, possibly empty or missing
 * @returns Cleaned text; empty string for empty input
 *
 * @example
 * ```typescript
 * cleanText('  Acme&nbsp;&amp; Co.\n\tPvt  Ltd ');
 * // Returns: 'Acme & Co. Pvt Ltd'
 * ```
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  let current = text;
  for (;;) {
    const next = cleanPass(current);
    if (next === current) {
      return next;
    }
    current = next;
  }
}

/**
 * Truncate cleaned text to a maximum length, dropping trailing space left
 * by the cut.
 *
 * @param text - Already cleaned text
 * @param maxLength - Maximum number of characters to keep
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength).trimEnd();
}
