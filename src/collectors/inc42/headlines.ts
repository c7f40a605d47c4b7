/**
 * Funding Headline Parsing
 *
 * Pulls company names out of funding-news headlines such as
 * "Zepto Raises $200 Mn To Expand Dark Stores".
 *
 * @module collectors/inc42/headlines
 */

import * as cheerio from 'cheerio';

// ============================================================================
// Constants
// ============================================================================

/** Headline patterns, tried in order; group 1 is the company name */
const HEADLINE_PATTERNS: readonly RegExp[] = [
  /([A-Z][\w\s&]+)\s+(?:Raises|Secures|Gets|Closes)/,
  /([A-Z][\w\s&]+)\s+(?:Funding|Investment)/,
  /([A-Z][\w\s&]+)\s+(?:Announces|Launches)/,
];

const MIN_NAME_LENGTH = 3;
const MAX_NAME_LENGTH = 49;

/** Articles read from the listing page */
export const MAX_ARTICLES = 10;

// ============================================================================
// Types
// ============================================================================

/**
 * A funding article found on the listing page.
 */
export interface FundingHeadline {
  title: string;
  companyName: string;
  /** Article link as written in the page, possibly relative */
  href?: string;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Extract a company name from a headline.
 *
 * @returns The first name of plausible length, or null
 */
export function extractCompanyName(title: string): string | null {
  for (const pattern of HEADLINE_PATTERNS) {
    const match = pattern.exec(title);
    if (!match) {
      continue;
    }
    const name = match[1].trim();
    if (name.length >= MIN_NAME_LENGTH && name.length <= MAX_NAME_LENGTH) {
      return name;
    }
  }
  return null;
}

/**
 * Parse the first articles of the funding listing page.
 */
export function parseFundingHeadlines(html: string): FundingHeadline[] {
  const $ = cheerio.load(html);
  const headlines: FundingHeadline[] = [];

  $('article')
    .slice(0, MAX_ARTICLES)
    .each((_, element) => {
      const article = $(element);
      const title = article.find('h2, h3, .entry-title').first().text().replace(/\s+/g, ' ').trim();
      if (!title) {
        return;
      }
      const companyName = extractCompanyName(title);
      if (!companyName) {
        return;
      }
      const href = article.find('a').first().attr('href');
      headlines.push(href ? { title, companyName, href } : { title, companyName });
    });

  return headlines;
}

/**
 * First outbound http(s) link in an article body, ignoring links back to Inc42.
 */
export function findExternalWebsite(html: string): string {
  const $ = cheerio.load(html);
  let website = '';

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    if (href.startsWith('http') && !href.includes('inc42.com')) {
      website = href;
      return false;
    }
    return undefined;
  });

  return website;
}
