/**
 * Inc42 Article Parsing
 *
 * Listing pages link to profile and feature articles. A feature article
 * names a single company in its title ("How Kisanmitra Is Rewiring ...",
 * "Zepto's Dark Store Playbook"); anything else is skipped.
 *
 * @module collectors/inc42/articles
 */

import * as cheerio from 'cheerio';
import type { RawCandidate } from '../../schemas/startup.js';
import { SectorTableSchema, detectSector, type SectorRule } from '../../enrichment/sectors.js';
import rawArticleSectors from './article-sectors.json';

// ============================================================================
// Constants
// ============================================================================

/** Articles followed per listing page */
export const MAX_ARTICLES_PER_PAGE = 20;

const LINK_SELECTOR = [
  'article h2 a',
  'article h3 a',
  '.post-title a',
  '.entry-title a',
  '.startup-card a',
  "a[href*='/startups/']",
  "a[href*='/features/']",
  'h2 a[href]',
  'h3 a[href]',
].join(', ');

/** Path segments of article sections worth following */
const ARTICLE_SECTIONS = ['/startups/', '/features/', '/news/'];

/** Title shapes, tried in order; the first that matches decides */
const TITLE_PATTERNS: readonly RegExp[] = [
  /^How\s+(.+?)\s+Is\s+/i,
  /^How\s+(.+?)\s+Has\s+/i,
  /^How\s+(.+?)\s+Uses\s+/i,
  /^How\s+(.+?)\s+Helps\s+/i,
  /^Why\s+(.+?)\s+/i,
  /^(.+?)’s\s+/i,
  /^(.+?)'s\s+/i,
  /^Inside\s+([A-Z][A-Za-z0-9&.-]{2,20})$/i,
];

const MAX_NAME_WORDS = 3;

/** Whole names that are topics or places, not companies */
const TOPIC_NAMES = new Set([
  'gig economy',
  'startup',
  'startups',
  'guide',
  'funding',
  'economy',
  'features',
  'decoding',
  'understanding',
  'india',
  'bharat',
  'indian',
  'usa',
  'china',
  'europe',
]);

/** Words that mark a name as a phrase wherever they appear */
const PHRASE_WORDS = ['guide', 'understanding', 'funding', 'startup', 'founders', 'economy'];

const WEBSITE_MARKERS = ['.com', '.in', '.io', '.ai', '.tech'];

const MAX_DESCRIPTION_LENGTH = 300;

/** Used when no sector keyword matches */
const FALLBACK_SECTOR = 'technology';

export const ARTICLE_SECTOR_RULES: readonly SectorRule[] = SectorTableSchema.parse(rawArticleSectors).sectors;

// ============================================================================
// Listing Pages
// ============================================================================

function isInc42Host(hostname: string): boolean {
  return hostname === 'inc42.com' || hostname.endsWith('.inc42.com');
}

function resolveLink(href: string, pageUrl: string): URL | null {
  try {
    return new URL(href, pageUrl);
  } catch {
    return null;
  }
}

/**
 * Article links on a listing page, absolute, in page order and without
 * repeats. Links leaving Inc42 and links back to the page itself are dropped.
 */
export function findArticleLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $(LINK_SELECTOR).each((_, element) => {
    const url = resolveLink($(element).attr('href') ?? '', pageUrl);
    if (!url || !isInc42Host(url.hostname)) {
      return;
    }
    url.hash = '';
    const link = url.toString();
    if (link !== pageUrl && ARTICLE_SECTIONS.some((section) => url.pathname.includes(section))) {
      links.add(link);
    }
  });

  return [...links].slice(0, MAX_ARTICLES_PER_PAGE);
}

// ============================================================================
// Articles
// ============================================================================

/**
 * Company named by a feature title.
 *
 * @example
 * extractFeatureCompany('How Kisanmitra Is Rewiring Rural Supply Chains'); // 'Kisanmitra'
 * extractFeatureCompany('Decoding The Gig Economy');                      // null
 */
export function extractFeatureCompany(title: string): string | null {
  const trimmed = title.trim();
  for (const pattern of TITLE_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (!match) {
      continue;
    }
    const name = match[1].trim();
    const lower = name.toLowerCase();
    if (
      name.split(/\s+/).length > MAX_NAME_WORDS ||
      TOPIC_NAMES.has(lower) ||
      PHRASE_WORDS.some((word) => lower.includes(word))
    ) {
      return null;
    }
    return name;
  }
  return null;
}

/**
 * "inc42_<section>" from the first path segment of the article URL.
 *
 * @example articleSource('https://inc42.com/features/zepto-dark-stores/') // 'inc42_features'
 */
export function articleSource(articleUrl: string): string {
  const section = new URL(articleUrl).pathname.split('/')[1] ?? '';
  return `inc42_${section}`;
}

/**
 * Turn one article into a candidate.
 *
 * Description comes from the meta description, else the first paragraph.
 * It is prefixed with the detected sector, e.g. "AGRITECH: ...".
 *
 * @returns null when the title does not name a company
 */
export function parseFeatureArticle(html: string, articleUrl: string): RawCandidate | null {
  const $ = cheerio.load(html);

  const title = $('h1, h2, .entry-title').first().text().replace(/\s+/g, ' ').trim();
  const name = title ? extractFeatureCompany(title) : null;
  if (!name) {
    return null;
  }

  let description = ($('meta[name="description"]').attr('content') ?? '').trim();
  if (!description) {
    description = $('p').first().text().replace(/\s+/g, ' ').trim().slice(0, MAX_DESCRIPTION_LENGTH);
  }

  let website = '';
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    const lower = href.toLowerCase();
    if (href.startsWith('http') && !href.includes('inc42.com') && WEBSITE_MARKERS.some((m) => lower.includes(m))) {
      website = href;
      return false;
    }
    return undefined;
  });

  const sector = (detectSector(name, description, ARTICLE_SECTOR_RULES) ?? FALLBACK_SECTOR).toUpperCase();

  return {
    name,
    source: articleSource(articleUrl),
    website,
    description: description ? `${sector}: ${description}` : sector,
    location: 'India',
    confidence: website ? 'high' : 'medium',
  };
}
