/**
 * Record Enrichment
 *
 * Three sequential passes over the deduplicated records:
 * 1. Sector tagging from the keyword table
 * 2. Homepage text for records still without a description
 * 3. Confidence re-scoring
 *
 * Records are updated in place; only description and confidenceTier change.
 *
 * @module enrichment/enricher
 */

import type { Logger } from '../pipeline/types.js';
import type { StartupRecord } from '../schemas/startup.js';
import type { ConfidenceTier } from '../schemas/common.js';
import { cleanText, truncateText } from '../normalize/text.js';
import { applySector, detectSector, SECTOR_RULES, type SectorRule } from './sectors.js';
import { DEFAULT_FETCH_TIMEOUT_MS, fetchWebsiteText, type WebsiteFetcher } from './website.js';
import { assessConfidence } from './confidence.js';

// ============================================================================
// Constants
// ============================================================================

/** Homepage text kept as a description */
export const MAX_WEBSITE_DESCRIPTION_LENGTH = 300;

// ============================================================================
// Types
// ============================================================================

export interface EnrichOptions {
  /** Fetch homepages for records without a description (default: true) */
  websiteFetch?: boolean;

  /** Homepage fetcher (default: fetchWebsiteText) */
  fetcher?: WebsiteFetcher;

  /** Per-homepage timeout (default: 5000ms) */
  fetchTimeoutMs?: number;

  /** Sector table (default: the bundled table) */
  sectorRules?: readonly SectorRule[];

  logger?: Logger;
}

export interface EnrichmentStats {
  /** Records whose description was set or prefixed by a sector */
  sectorTagged: number;
  /** Records whose description came from their homepage */
  websiteEnriched: number;
  /** Homepage fetches that failed or returned no text */
  websiteFailures: number;
  /** Tier counts after re-scoring */
  tiers: Record<ConfidenceTier, number>;
}

export interface EnrichmentResult {
  records: StartupRecord[];
  stats: EnrichmentStats;
}

// ============================================================================
// Passes
// ============================================================================

/**
 * Tag one record with its first matching sector.
 *
 * @returns true when the description changed
 */
export function tagSector(record: StartupRecord, rules: readonly SectorRule[] = SECTOR_RULES): boolean {
  const sector = detectSector(record.name, record.description, rules);
  if (!sector) {
    return false;
  }
  // The description is already clean; only the label is new text
  record.description = applySector(record.description, cleanText(sector));
  return true;
}

/**
 * Fill an empty description from the homepage.
 *
 * Failures are logged at debug level and leave the description empty.
 *
 * @returns 'enriched', 'failed', or 'skipped' when no fetch was attempted
 */
export async function enrichFromWebsite(
  record: StartupRecord,
  fetcher: WebsiteFetcher,
  options: { timeoutMs: number; logger?: Logger }
): Promise<'enriched' | 'failed' | 'skipped'> {
  if (record.description || !record.website) {
    return 'skipped';
  }

  try {
    const pageText = await fetcher(record.website, { timeoutMs: options.timeoutMs });
    const text = truncateText(cleanText(pageText), MAX_WEBSITE_DESCRIPTION_LENGTH);
    if (!text) {
      options.logger?.debug(`Homepage for "${record.name}" had no text: ${record.website}`);
      return 'failed';
    }
    record.description = text;
    return 'enriched';
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    options.logger?.debug(`Homepage fetch failed for "${record.name}" (${record.website}): ${message}`);
    return 'failed';
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Enrich records in place and report what changed.
 *
 * Homepage fetches run one at a time.
 *
 * @example
 * ```typescript
 * const { stats } = await enrichStartups(records, { fetchTimeoutMs: 5000, logger });
 * logger.info(`${stats.websiteEnriched} descriptions filled from homepages`);
 * ```
 */
export async function enrichStartups(
  records: StartupRecord[],
  options: EnrichOptions = {}
): Promise<EnrichmentResult> {
  const {
    websiteFetch = true,
    fetcher = fetchWebsiteText,
    fetchTimeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
    sectorRules = SECTOR_RULES,
    logger,
  } = options;

  let sectorTagged = 0;
  for (const record of records) {
    if (tagSector(record, sectorRules)) {
      sectorTagged++;
    }
  }

  let websiteEnriched = 0;
  let websiteFailures = 0;
  if (websiteFetch) {
    for (const record of records) {
      const outcome = await enrichFromWebsite(record, fetcher, { timeoutMs: fetchTimeoutMs, logger });
      if (outcome === 'enriched') {
        websiteEnriched++;
      } else if (outcome === 'failed') {
        websiteFailures++;
      }
    }
  }

  const tiers: Record<ConfidenceTier, number> = { high: 0, medium: 0, low: 0 };
  for (const record of records) {
    record.confidenceTier = assessConfidence(record);
    tiers[record.confidenceTier]++;
  }

  return {
    records,
    stats: { sectorTagged, websiteEnriched, websiteFailures, tiers },
  };
}
