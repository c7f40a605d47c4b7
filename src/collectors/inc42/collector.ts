/**
 * Inc42 Funding News Collector
 *
 * Reads company names from the Inc42 funding-news listing and, when
 * allowed, follows each article to find the company's own website.
 *
 * @module collectors/inc42/collector
 */

import type { Collector, CollectOptions } from '../types.js';
import type { RawCandidate, StartupRecord } from '../../schemas/startup.js';
import { normalizeStartups } from '../../normalize/record.js';
import { fetchText } from '../http.js';
import { findExternalWebsite, parseFundingHeadlines, type FundingHeadline } from './headlines.js';

// ============================================================================
// Constants
// ============================================================================

export const INC42_BASE_URL = 'https://inc42.com';
export const INC42_FUNDING_URL = `${INC42_BASE_URL}/news/funding/`;

const DEFAULT_LIMIT = 30;

// ============================================================================
// Collector
// ============================================================================

/**
 * Options for the Inc42 collector.
 */
export interface Inc42CollectorOptions {
  /** Fetch each article to look for the company website (default: true) */
  followArticles?: boolean;
}

export class Inc42Collector implements Collector {
  readonly id = 'inc42';
  readonly name = 'Inc42 Funding News';
  readonly defaultLimit = DEFAULT_LIMIT;

  private readonly followArticles: boolean;

  constructor(options: Inc42CollectorOptions = {}) {
    this.followArticles = options.followArticles ?? true;
  }

  async collect(options: CollectOptions): Promise<StartupRecord[]> {
    const limit = options.limit ?? this.defaultLimit;
    const html = await fetchText(INC42_FUNDING_URL, { timeoutMs: options.timeoutMs, retries: 2 });
    const headlines = parseFundingHeadlines(html).slice(0, limit);

    options.logger?.debug(`[${this.id}] Found ${headlines.length} funding headlines`);

    const candidates: RawCandidate[] = [];
    for (const headline of headlines) {
      const website = await this.findWebsite(headline, options);
      candidates.push({
        name: headline.companyName,
        source: 'inc42_funding_news',
        website,
        description: `Featured in funding news: ${headline.title.slice(0, 100)}`,
        location: 'India',
        confidence: website ? 'high' : 'medium',
      });
    }

    return normalizeStartups(candidates, { logger: options.logger });
  }

  /**
   * Follow the article link; a failed article fetch leaves the website empty.
   */
  private async findWebsite(headline: FundingHeadline, options: CollectOptions): Promise<string> {
    if (!this.followArticles || !headline.href) {
      return '';
    }
    const articleUrl = new URL(headline.href, INC42_BASE_URL).toString();
    try {
      return findExternalWebsite(await fetchText(articleUrl, { timeoutMs: options.timeoutMs }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      options.logger?.debug(`[${this.id}] Article fetch failed for ${articleUrl}: ${message}`);
      return '';
    }
  }
}
