/**
 * Y Combinator India Collector
 *
 * Pages through the public YC companies API filtered to India.
 *
 * @module collectors/yc/collector
 */

import type { Collector, CollectOptions } from '../types.js';
import type { RawCandidate, StartupRecord } from '../../schemas/startup.js';
import { normalizeStartups } from '../../normalize/record.js';
import { fetchJson } from '../http.js';
import { parseCompanyPage, YCPageSchema } from './mapper.js';

// ============================================================================
// Constants
// ============================================================================

export const YC_API_URL = 'https://api.ycombinator.com/v0.1/companies';

/** Companies requested per page */
export const YC_PAGE_SIZE = 50;

const DEFAULT_LIMIT = 100;

// ============================================================================
// Collector
// ============================================================================

export class YCombinatorCollector implements Collector {
  readonly id = 'yc';
  readonly name = 'Y Combinator India';
  readonly defaultLimit = DEFAULT_LIMIT;

  async collect(options: CollectOptions): Promise<StartupRecord[]> {
    const limit = options.limit ?? this.defaultLimit;
    const candidates: RawCandidate[] = [];
    let offset = 0;

    while (candidates.length < limit) {
      const body = await fetchJson(YC_API_URL, {
        timeoutMs: options.timeoutMs,
        params: { location: 'india', offset, limit: YC_PAGE_SIZE },
        retries: 1,
      });

      const page = YCPageSchema.safeParse(body);
      if (!page.success) {
        options.logger?.warn(`[${this.id}] Unexpected response shape at offset ${offset}`);
        break;
      }

      const { candidates: pageCandidates, malformed } = parseCompanyPage(page.data.companies);
      if (malformed > 0) {
        options.logger?.debug(`[${this.id}] Skipped ${malformed} malformed companies at offset ${offset}`);
      }
      candidates.push(...pageCandidates);

      const returned = page.data.companies.length;
      offset += returned;
      if (returned < YC_PAGE_SIZE) {
        break;
      }
    }

    options.logger?.debug(`[${this.id}] Fetched ${candidates.length} Indian companies`);
    return normalizeStartups(candidates.slice(0, limit), { logger: options.logger });
  }
}
