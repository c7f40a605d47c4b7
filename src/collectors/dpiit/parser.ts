/**
 * Startup India Response Parsers
 *
 * Two shapes come back from the portal: the search JSON API and the
 * server-rendered directory page. Both are parsed into raw candidates.
 *
 * @module collectors/dpiit/parser
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { RawCandidate } from '../../schemas/startup.js';
import { ensureScheme } from '../http.js';

// ============================================================================
// Constants
// ============================================================================

export const DPIIT_BASE_URL = 'https://www.startupindia.gov.in';

/** Card selectors, tried in order until one matches */
const CARD_SELECTORS = ['.search-result-card', "[data-testid='startup-card']", '.startup-card', '.card'];

const NAME_SELECTOR = "h4, h3, h2, .title, [class*='name']";
const DESCRIPTION_SELECTOR = ".description, p, [class*='desc']";

// ============================================================================
// Search API
// ============================================================================

/**
 * One search hit. Field names vary between portal releases.
 */
export const DPIITItemSchema = z
  .object({
    name: z.string().nullish(),
    startupName: z.string().nullish(),
    companyName: z.string().nullish(),
    website: z.string().nullish(),
    url: z.string().nullish(),
    city: z.string().nullish(),
    state: z.string().nullish(),
    description: z.string().nullish(),
    about: z.string().nullish(),
    industry: z.string().nullish(),
    stage: z.string().nullish(),
  })
  .passthrough();

export type DPIITItem = z.infer<typeof DPIITItemSchema>;

const SearchResponseSchema = z
  .object({
    results: z.array(z.unknown()).nullish(),
    data: z.array(z.unknown()).nullish(),
    searchResults: z.array(z.unknown()).nullish(),
  })
  .passthrough();

/**
 * Pull the hit list out of a search response.
 *
 * The list sits under `results`, `data` or `searchResults`; the first
 * non-empty one wins.
 */
export function extractSearchResults(body: unknown): unknown[] {
  const parsed = SearchResponseSchema.safeParse(body);
  if (!parsed.success) {
    return [];
  }
  const { results, data, searchResults } = parsed.data;
  for (const list of [results, data, searchResults]) {
    if (list && list.length > 0) {
      return list;
    }
  }
  return [];
}

/**
 * Format "city, state" with the state defaulting to India.
 */
export function formatLocation(item: DPIITItem): string {
  const location = `${item.city ?? ''}, ${item.state ?? 'India'}`;
  return location.replace(/^[, ]+|[, ]+$/g, '');
}

/**
 * Map one search hit to a raw candidate.
 *
 * @returns null for malformed hits and hits without a name
 */
export function mapSearchItem(item: unknown): RawCandidate | null {
  const parsed = DPIITItemSchema.safeParse(item);
  if (!parsed.success) {
    return null;
  }
  const hit = parsed.data;
  const name = hit.name || hit.startupName || hit.companyName || '';
  if (!name) {
    return null;
  }

  return {
    name,
    source: 'dpiit_api',
    website: ensureScheme(hit.website || hit.url || ''),
    description: hit.description || hit.about || '',
    location: formatLocation(hit),
    industry: hit.industry ?? '',
    fundingStage: hit.stage ?? '',
    confidence: 'high',
  };
}

// ============================================================================
// HTML Directory
// ============================================================================

/**
 * Resolve a card link: absolute links are kept, root-relative links are
 * joined to the portal, anything else is dropped.
 */
export function resolveCardLink(href: string | undefined): string {
  if (!href) {
    return '';
  }
  if (href.startsWith('http')) {
    return href;
  }
  if (href.startsWith('/')) {
    return `${DPIIT_BASE_URL}${href}`;
  }
  return '';
}

/**
 * Parse the startup cards on one directory page.
 */
export function parseDirectoryCards(html: string): RawCandidate[] {
  const $ = cheerio.load(html);

  let cards = $(CARD_SELECTORS[0]);
  for (const selector of CARD_SELECTORS.slice(1)) {
    if (cards.length > 0) {
      break;
    }
    cards = $(selector);
  }

  const candidates: RawCandidate[] = [];
  cards.each((_, element) => {
    const card = $(element);
    const name = card.find(NAME_SELECTOR).first().text().trim();
    if (!name) {
      return;
    }
    candidates.push({
      name,
      source: 'dpiit_html',
      website: resolveCardLink(card.find('a[href]').first().attr('href')),
      description: card.find(DESCRIPTION_SELECTOR).first().text(),
      confidence: 'high',
    });
  });

  return candidates;
}
