/**
 * Startup India (DPIIT) Collector
 *
 * Reads DPIIT-recognised startups from the portal's search API and tops
 * the batch up from the HTML directory when the API comes back short.
 *
 * @module collectors/dpiit/collector
 */

import type { Collector, CollectOptions } from '../types.js';
import type { RawCandidate, StartupRecord } from '../../schemas/startup.js';
import { normalizeStartups } from '../../normalize/record.js';
import { fetchJson, fetchText } from '../http.js';
import { isHttpError } from '../errors.js';
import {
  DPIIT_BASE_URL,
  extractSearchResults,
  mapSearchItem,
  parseDirectoryCards,
} from './parser.js';

// ============================================================================
// Constants
// ============================================================================

export const DPIIT_API_URL = `${DPIIT_BASE_URL}/content/sih/en/search/jcr:content/root/responsivegrid/generic_search.search.json`;

export const DPIIT_PAGE_SIZE = 20;

/** Directory pages read before giving up on the HTML fallback */
const MAX_HTML_PAGES = 5;

const DEFAULT_LIMIT = 50;

const SEARCH_FILTERS = JSON.stringify({
  stages: [],
  industries: [],
  sectors: [],
  states: [],
  cities: [],
  dpiitRecognised: true,
});

// ============================================================================
// Collector
// ============================================================================

export class DPIITCollector implements Collector {
  readonly id = 'dpiit';
  readonly name = 'Startup India (DPIIT)';
  readonly defaultLimit = DEFAULT_LIMIT;

  async collect(options: CollectOptions): Promise<StartupRecord[]> {
    const limit = options.limit ?? this.defaultLimit;
    const logger = options.logger;

    const records = normalizeStartups(await this.fetchFromApi(limit, options), { logger });
    logger?.debug(`[${this.id}] Search API returned ${records.length} valid startups`);

    if (records.length < limit) {
      try {
        const html = await this.fetchFromDirectory(limit - records.length, options);
        const seen = new Set(records.map((record) => record.identity));
        for (const record of normalizeStartups(html, { logger })) {
          if (!seen.has(record.identity)) {
            records.push(record);
            seen.add(record.identity);
          }
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger?.warn(`[${this.id}] Directory fallback failed: ${message}`);
      }
    }

    return records.slice(0, limit);
  }

  /**
   * Page through the search API.
   *
   * A non-JSON body (the portal serves HTML error pages with status 200)
   * ends the source with whatever was read so far.
   */
  private async fetchFromApi(limit: number, options: CollectOptions): Promise<RawCandidate[]> {
    const candidates: RawCandidate[] = [];
    let page = 0;

    while (candidates.length < limit) {
      let body: unknown;
      try {
        body = await fetchJson(DPIIT_API_URL, {
          timeoutMs: options.timeoutMs,
          headers: {
            'X-Requested-With': 'XMLHttpRequest',
            Referer: `${DPIIT_BASE_URL}/content/sih/en/search.html`,
          },
          params: { page, results: DPIIT_PAGE_SIZE, sort: 'relevance', filters: SEARCH_FILTERS },
        });
      } catch (error) {
        if (isHttpError(error)) {
          options.logger?.warn(`[${this.id}] Search API stopped: ${error.message}`);
          break;
        }
        throw error;
      }

      const items = extractSearchResults(body);
      if (items.length === 0) {
        break;
      }

      for (const item of items) {
        const candidate = mapSearchItem(item);
        if (candidate) {
          candidates.push(candidate);
        }
      }

      page++;
      if (items.length < DPIIT_PAGE_SIZE) {
        break;
      }
    }

    return candidates.slice(0, limit);
  }

  private async fetchFromDirectory(limit: number, options: CollectOptions): Promise<RawCandidate[]> {
    const candidates: RawCandidate[] = [];

    for (let page = 1; page <= MAX_HTML_PAGES && candidates.length < limit; page++) {
      const html = await fetchText(`${DPIIT_BASE_URL}/content/sih/en/search.html`, {
        timeoutMs: options.timeoutMs,
        params: { page },
      });
      const cards = parseDirectoryCards(html);
      if (cards.length === 0) {
        break;
      }
      candidates.push(...cards);
    }

    return candidates;
  }
}
