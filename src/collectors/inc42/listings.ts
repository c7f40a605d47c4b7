/**
 * Inc42 Listings Collector
 *
 * Walks the Inc42 startup and feature listings, following each article
 * link and keeping the articles whose title names a company. Records are
 * tagged with the article's section, e.g. "inc42_features".
 *
 * @module collectors/inc42/listings
 */

import type { Collector, CollectOptions } from '../types.js';
import type { RawCandidate, StartupRecord } from '../../schemas/startup.js';
import { normalizeStartup } from '../../normalize/record.js';
import { fetchText } from '../http.js';
import { INC42_BASE_URL } from './collector.js';
import { findArticleLinks, parseFeatureArticle } from './articles.js';

export const INC42_LISTING_PAGES: readonly string[] = [
  `${INC42_BASE_URL}/startups/`,
  `${INC42_BASE_URL}/startups/30-startups-to-watch/`,
  `${INC42_BASE_URL}/features/`,
  `${INC42_BASE_URL}/startups/page/2/`,
  `${INC42_BASE_URL}/startups/page/3/`,
];

const DEFAULT_LIMIT = 30;

export interface Inc42ListingsCollectorOptions {
  /** Listing pages, read in order until the limit is reached */
  pages?: readonly string[];
}

export class Inc42ListingsCollector implements Collector {
  readonly id = 'inc42-listings';
  readonly name = 'Inc42 Startup Listings';
  readonly defaultLimit = DEFAULT_LIMIT;

  private readonly pages: readonly string[];

  constructor(options: Inc42ListingsCollectorOptions = {}) {
    this.pages = options.pages ?? INC42_LISTING_PAGES;
  }

  /**
   * @throws The last listing error when no listing page could be read
   */
  async collect(options: CollectOptions): Promise<StartupRecord[]> {
    const limit = options.limit ?? this.defaultLimit;
    const visited = new Set<string>();
    const records: StartupRecord[] = [];
    let pagesRead = 0;
    let lastError: Error | null = null;

    for (const pageUrl of this.pages) {
      if (records.length >= limit) {
        break;
      }

      let html: string;
      try {
        html = await fetchText(pageUrl, { timeoutMs: options.timeoutMs, retries: 2 });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        options.logger?.warn(`[${this.id}] Listing ${pageUrl} failed: ${lastError.message}`);
        continue;
      }
      pagesRead++;

      const links = findArticleLinks(html, pageUrl).filter((link) => !visited.has(link));
      options.logger?.debug(`[${this.id}] ${links.length} new articles on ${pageUrl}`);

      for (const link of links) {
        if (records.length >= limit) {
          break;
        }
        visited.add(link);
        const candidate = await this.readArticle(link, options);
        const record = candidate ? normalizeStartup(candidate, { logger: options.logger }) : null;
        if (record) {
          records.push(record);
        }
      }
    }

    if (pagesRead === 0 && lastError) {
      throw lastError;
    }
    return records;
  }

  /**
   * A failed article fetch skips the article.
   */
  private async readArticle(articleUrl: string, options: CollectOptions): Promise<RawCandidate | null> {
    try {
      const html = await fetchText(articleUrl, { timeoutMs: options.timeoutMs });
      return parseFeatureArticle(html, articleUrl);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      options.logger?.debug(`[${this.id}] Article fetch failed for ${articleUrl}: ${message}`);
      return null;
    }
  }
}
