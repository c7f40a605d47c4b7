/**
 * Results Stage (Stage 05)
 *
 * Builds the DiscoveryResults document, validates it and writes it to the
 * run directory (or the configured output path), then refreshes
 * `latest.json` in the data directory.
 *
 * A write failure fails the stage and therefore the run.
 *
 * @module stages/results
 */

import * as path from 'node:path';
import type { Stage, StageContext, StageOutcome } from '../pipeline/types.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import {
  DiscoveryResultsSchema,
  type CollectorSummary,
  type DiscoveryResults,
} from '../schemas/discovery-results.js';
import type { StartupRecord } from '../schemas/startup.js';
import { countByTier } from '../ranking/index.js';
import { atomicWriteJson, getResultsPath, getLatestResultsPath } from '../storage/index.js';
import type { RankStageOutput, ResultsStageOutput } from './types.js';

// ============================================================================
// Results Building
// ============================================================================

/**
 * Build and validate the results document.
 *
 * `sourcesUsed` lists the distinct source tags of the kept records, sorted.
 *
 * @throws ZodError if a record or the metadata fails validation
 */
export function buildDiscoveryResults(
  records: StartupRecord[],
  collectors: CollectorSummary[],
  params: { runId: string; targetCount: number; generatedAt?: string }
): DiscoveryResults {
  const tiers = countByTier(records);
  const sourcesUsed = [...new Set(records.map((r) => r.source))].sort();

  return DiscoveryResultsSchema.parse({
    metadata: {
      schemaVersion: SCHEMA_VERSIONS.discoveryResults,
      runId: params.runId,
      generatedAt: params.generatedAt ?? new Date().toISOString(),
      totalCount: records.length,
      targetCount: params.targetCount,
      sourcesUsed,
      highConfidence: tiers.high,
      mediumConfidence: tiers.medium,
      lowConfidence: tiers.low,
      collectors,
    },
    startups: records,
  });
}

/**
 * Resolve where the results file goes for this run.
 */
export function resolveResultsPath(context: StageContext): string {
  const configured = context.config.outputPath;
  if (configured) {
    return path.resolve(configured);
  }
  return getResultsPath(context.dataDir, context.runId);
}

// ============================================================================
// Stage Implementation
// ============================================================================

export const resultsStage: Stage<RankStageOutput, ResultsStageOutput> = {
  name: 'results',

  async run(context: StageContext, input: RankStageOutput): Promise<StageOutcome<ResultsStageOutput>> {
    const results = buildDiscoveryResults(input.records, input.collectors, {
      runId: context.runId,
      targetCount: context.config.targetCount,
    });

    const resultsPath = resolveResultsPath(context);
    const latestPath = getLatestResultsPath(context.dataDir);

    await atomicWriteJson(resultsPath, results);
    await atomicWriteJson(latestPath, results);

    context.logger?.info(`[results] Wrote ${results.metadata.totalCount} startups to ${resultsPath}`);

    return {
      data: { results, resultsPath, latestPath },
      details: {
        totalCount: results.metadata.totalCount,
        sourcesUsed: results.metadata.sourcesUsed,
        resultsPath,
      },
    };
  },
};

export default resultsStage;
