/**
 * Name Keys for Deduplication
 *
 * Phase 2 compares company names through a punctuation-insensitive key.
 *
 * @module dedupe/normalize
 */

/**
 * Build the comparison key for a company name.
 *
 * Lower-cases and removes spaces, periods and commas. Nothing else is
 * stripped, so "Cure.fit" and "Curefit" share a key but "Cure-fit" does not.
 *
 * @example
 * ```typescript
 * nameKey('Razorpay Software Pvt. Ltd.'); // 'razorpaysoftwarepvtltd'
 * ```
 */
export function nameKey(name: string): string {
  return name.toLowerCase().replace(/[\s.,]/g, '');
}

/**
 * True when either key contains the other.
 */
export function keysOverlap(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}
