/**
 * Tier-2 Ecosystem Site Parsers
 *
 * City ecosystem sites answer either with a JSON member list or with an
 * HTML page of member cards.
 *
 * @module collectors/tier2/parser
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { RawCandidate } from '../../schemas/startup.js';
import { ensureScheme } from '../http.js';
import rawEcosystems from './ecosystems.json';

// ============================================================================
// Ecosystem Table
// ============================================================================

const CityEcosystemSchema = z.object({
  city: z.string().min(1),
  sites: z.array(z.string().min(1)),
});

export const EcosystemTableSchema = z.object({
  cities: z.array(CityEcosystemSchema),
});

export type CityEcosystem = z.infer<typeof CityEcosystemSchema>;

export const TIER2_ECOSYSTEMS: readonly CityEcosystem[] = EcosystemTableSchema.parse(rawEcosystems).cities;

// ============================================================================
// Candidates
// ============================================================================

const CARD_SELECTOR = '.startup-card, .company-item, .member';
const CARD_NAME_SELECTOR = 'h3, h4, .name, a';

/**
 * "tier2_<city>", lower-cased.
 */
export function tier2Source(city: string): string {
  return `tier2_${city.toLowerCase()}`;
}

function candidateFor(city: string, name: string, website: string, description: string): RawCandidate {
  return {
    name,
    source: tier2Source(city),
    website,
    description,
    location: `${city}, India`,
    confidence: 'medium',
  };
}

const MemberSchema = z
  .object({
    name: z.string().nullish(),
    website: z.string().nullish(),
    description: z.string().nullish(),
  })
  .passthrough();

const MemberListSchema = z
  .object({
    startups: z.array(z.unknown()).nullish(),
    companies: z.array(z.unknown()).nullish(),
  })
  .passthrough();

/**
 * Members of a JSON listing, read from `startups` or else `companies`.
 * Malformed and nameless members are skipped.
 */
export function parseMemberJson(body: unknown, city: string): RawCandidate[] {
  const list = MemberListSchema.safeParse(body);
  if (!list.success) {
    return [];
  }
  const members = list.data.startups?.length ? list.data.startups : (list.data.companies ?? []);

  const candidates: RawCandidate[] = [];
  for (const member of members) {
    const parsed = MemberSchema.safeParse(member);
    if (parsed.success && parsed.data.name) {
      candidates.push(
        candidateFor(city, parsed.data.name, ensureScheme(parsed.data.website ?? ''), parsed.data.description ?? '')
      );
    }
  }
  return candidates;
}

/**
 * Member cards of an HTML listing. When the name element is itself a link
 * with an absolute URL, that URL is the website.
 */
export function parseMemberCards(html: string, city: string): RawCandidate[] {
  const $ = cheerio.load(html);
  const candidates: RawCandidate[] = [];

  $(CARD_SELECTOR).each((_, element) => {
    const nameElement = $(element).find(CARD_NAME_SELECTOR).first();
    const name = nameElement.text().trim();
    if (!name) {
      return;
    }
    const href = nameElement.is('a') ? (nameElement.attr('href') ?? '') : '';
    candidates.push(candidateFor(city, name, href.startsWith('http') ? href : '', ''));
  });

  return candidates;
}
