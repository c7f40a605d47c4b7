/**
 * Stage Output Types
 *
 * Data contracts between the five pipeline stages. Each stage passes the
 * collector summaries forward so the results stage can report them.
 *
 * @module stages/types
 */

import type { StartupRecord } from '../schemas/startup.js';
import type { CollectorSummary, DiscoveryResults } from '../schemas/discovery-results.js';
import type { ConfidenceTier } from '../schemas/common.js';
import type { DedupeStats } from '../dedupe/index.js';
import type { EnrichmentStats } from '../enrichment/index.js';

/** Output of 01_collect */
export interface CollectStageOutput {
  records: StartupRecord[];
  collectors: CollectorSummary[];
}

/** Output of 02_dedupe */
export interface DedupeStageOutput {
  records: StartupRecord[];
  collectors: CollectorSummary[];
  stats: DedupeStats;
}

/** Output of 03_enrich */
export interface EnrichStageOutput {
  records: StartupRecord[];
  collectors: CollectorSummary[];
  stats: EnrichmentStats;
}

/** Output of 04_rank */
export interface RankStageOutput {
  records: StartupRecord[];
  collectors: CollectorSummary[];
  stats: {
    inputCount: number;
    outputCount: number;
    targetCount: number;
    tiers: Record<ConfidenceTier, number>;
  };
}

/** Output of 05_results */
export interface ResultsStageOutput {
  results: DiscoveryResults;
  /** Where the results file was written */
  resultsPath: string;
  /** Where the latest-results copy was written */
  latestPath: string;
}
