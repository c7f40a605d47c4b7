/**
 * Tier-2 City Collector
 *
 * Reads startup member lists from city ecosystem sites (Indore, Jaipur,
 * Coimbatore, ...). Most of these sites are small and often down, so a
 * site that fails is skipped and an empty result is a normal outcome.
 *
 * @module collectors/tier2/collector
 */

import type { Collector, CollectOptions } from '../types.js';
import type { RawCandidate, StartupRecord } from '../../schemas/startup.js';
import { normalizeStartups } from '../../normalize/record.js';
import { fetchWithTimeout } from '../http.js';
import { TIER2_ECOSYSTEMS, parseMemberCards, parseMemberJson, type CityEcosystem } from './parser.js';

const DEFAULT_LIMIT = 50;

/** Records kept per city */
export const PER_CITY_LIMIT = 5;

/** Per-site timeout when the plan gives none */
const SITE_TIMEOUT_MS = 10000;

interface SitePage {
  contentType: string;
  body: string;
}

export class Tier2Collector implements Collector {
  readonly id = 'tier2';
  readonly name = 'Tier-2 City Ecosystems';
  readonly defaultLimit = DEFAULT_LIMIT;

  constructor(private readonly ecosystems: readonly CityEcosystem[] = TIER2_ECOSYSTEMS) {}

  async collect(options: CollectOptions): Promise<StartupRecord[]> {
    const limit = options.limit ?? this.defaultLimit;
    const records: StartupRecord[] = [];

    for (const { city, sites } of this.ecosystems) {
      if (records.length >= limit) {
        break;
      }
      const candidates = await this.collectCity(city, sites, options);
      const accepted = normalizeStartups(candidates, { logger: options.logger }).slice(0, PER_CITY_LIMIT);
      options.logger?.debug(`[${this.id}] ${city}: ${accepted.length} startups`);
      records.push(...accepted);
    }

    return records.slice(0, limit);
  }

  private async collectCity(city: string, sites: readonly string[], options: CollectOptions): Promise<RawCandidate[]> {
    const candidates: RawCandidate[] = [];
    for (const site of sites) {
      const url = `https://${site}`;
      try {
        const page = await this.fetchSite(url, options);
        if (page) {
          candidates.push(...this.parsePage(page, city));
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        options.logger?.debug(`[${this.id}] ${url} failed: ${message}`);
      }
    }
    return candidates;
  }

  /**
   * @returns null for a non-2xx answer
   */
  private fetchSite(url: string, options: CollectOptions): Promise<SitePage | null> {
    return fetchWithTimeout(url, { timeoutMs: options.timeoutMs ?? SITE_TIMEOUT_MS }, async (response) => {
      if (!response.ok) {
        return null;
      }
      return { contentType: response.headers.get('content-type') ?? '', body: await response.text() };
    });
  }

  /**
   * @throws SyntaxError when a JSON answer does not parse
   */
  private parsePage(page: SitePage, city: string): RawCandidate[] {
    if (page.contentType.includes('json')) {
      const body: unknown = JSON.parse(page.body);
      return parseMemberJson(body, city);
    }
    return parseMemberCards(page.body, city);
  }
}
