/**
 * Homepage Text Fetching
 *
 * Fetches a company homepage and extracts its visible text. Enrichment
 * takes a WebsiteFetcher so tests and callers can swap the transport.
 *
 * @module enrichment/website
 */

import * as cheerio from 'cheerio';
import { fetchText } from '../collectors/http.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Fetch a homepage and return its visible text.
 *
 * Implementations throw on any failure; the enricher logs and moves on.
 */
export type WebsiteFetcher = (url: string, options: { timeoutMs: number }) => Promise<string>;

// ============================================================================
// Constants
// ============================================================================

/** Default homepage fetch timeout (5 seconds) */
export const DEFAULT_FETCH_TIMEOUT_MS = 5000;

// ============================================================================
// Text Extraction
// ============================================================================

/**
 * Extract the visible body text of an HTML page.
 */
export function extractPageText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, meta, link, noscript').remove();
  const body = $('body');
  const text = body.length > 0 ? body.text() : $.root().text();
  return text.replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Default Fetcher
// ============================================================================

/**
 * The default fetcher: one GET, no retries, text extracted with cheerio.
 */
export const fetchWebsiteText: WebsiteFetcher = async (url, options) => {
  const html = await fetchText(url, { timeoutMs: options.timeoutMs });
  return extractPageText(html);
};
