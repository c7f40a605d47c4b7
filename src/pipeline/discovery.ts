/**
 * Discovery Run
 *
 * Wires configuration, the collector registry and the five stages into one
 * pipeline run.
 *
 * @module pipeline/discovery
 */

import { z } from 'zod';
import { config } from '../config/index.js';
import { RunConfigSchema, type RunConfig } from '../schemas/run-config.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { DiscoveryResultsSchema, type DiscoveryResults } from '../schemas/discovery-results.js';
import { CollectorRegistry, createDefaultRegistry } from '../collectors/registry.js';
import type { WebsiteFetcher } from '../enrichment/website.js';
import { getDataDir, getRunDir } from '../storage/index.js';
import { ALL_STAGES } from '../stages/index.js';
import { PipelineExecutor, type PipelineResult } from './executor.js';
import { generateRunId } from './run-id.js';
import type { Logger, StageContext, StageEvents } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for a discovery run. Unset values fall back to environment config.
 */
export interface DiscoveryOptions {
  targetCount?: number;
  concurrency?: number;
  /** Collector IDs to run; empty or unset runs every registered collector */
  sources?: string[];
  websiteFetch?: boolean;
  saveCheckpoints?: boolean;
  outputPath?: string;
  dataDir?: string;
  collectorTimeoutMs?: number;
  httpTimeoutMs?: number;
  fetchTimeoutMs?: number;

  /** Collector registry (default: createDefaultRegistry()) */
  registry?: CollectorRegistry;
  websiteFetcher?: WebsiteFetcher;
  logger?: Logger;
  /** Stage progress hooks, e.g. the CLI's progress display */
  events?: StageEvents;

  /** Clock for the run ID and start time */
  now?: () => Date;
}

/**
 * Outcome of a discovery run.
 */
export interface DiscoveryRunResult {
  runId: string;
  runConfig: RunConfig;
  /** Directory holding this run's output */
  runDir: string;
  pipeline: PipelineResult;
  /** Final results; null when the pipeline failed */
  results: DiscoveryResults | null;
  /** Where the results were written; null when the pipeline failed */
  resultsPath: string | null;
}

const ResultsOutputSchema = z.object({
  results: DiscoveryResultsSchema,
  resultsPath: z.string(),
});

// ============================================================================
// Run Configuration
// ============================================================================

/**
 * Build the validated RunConfig snapshot for one run.
 *
 * @throws ZodError if an override is out of range (e.g. targetCount 0)
 */
export function buildRunConfig(
  runId: string,
  options: DiscoveryOptions = {},
  startedAt: Date = new Date()
): RunConfig {
  return RunConfigSchema.parse({
    schemaVersion: SCHEMA_VERSIONS.runConfig,
    runId,
    startedAt: startedAt.toISOString(),
    targetCount: options.targetCount ?? config.defaults.targetCount,
    concurrency: options.concurrency ?? config.defaults.concurrency,
    collectorTimeoutMs: options.collectorTimeoutMs ?? config.timeouts.collectorMs,
    httpTimeoutMs: options.httpTimeoutMs ?? config.timeouts.httpMs,
    fetchTimeoutMs: options.fetchTimeoutMs ?? config.timeouts.fetchMs,
    websiteFetch: options.websiteFetch ?? true,
    sources: options.sources ?? [],
    saveCheckpoints: options.saveCheckpoints ?? false,
    outputPath: options.outputPath,
  });
}

// ============================================================================
// Run
// ============================================================================

/**
 * Run the full discovery pipeline.
 *
 * Stage failures do not throw: they come back as a failed
 * `pipeline` result with `results` set to null.
 *
 * @example
 * ```typescript
 * const run = await runDiscovery({ targetCount: 20, sources: ['yc', 'dpiit'] });
 * if (run.pipeline.success) {
 *   console.log(run.results?.metadata.totalCount);
 * }
 * ```
 */
export async function runDiscovery(options: DiscoveryOptions = {}): Promise<DiscoveryRunResult> {
  const startedAt = (options.now ?? (() => new Date()))();
  const runId = generateRunId(startedAt);
  const runConfig = buildRunConfig(runId, options, startedAt);
  const dataDir = options.dataDir ? getDataDir(options.dataDir) : config.dataDir;

  const context: StageContext = {
    runId,
    config: runConfig,
    dataDir,
    registry: options.registry ?? createDefaultRegistry(),
    websiteFetcher: options.websiteFetcher,
    logger: options.logger,
  };

  const executor = new PipelineExecutor(ALL_STAGES, options.events);

  options.logger?.debug(`Starting run ${runId}`, runConfig);
  const pipeline = await executor.run(context);

  let results: DiscoveryResults | null = null;
  let resultsPath: string | null = null;

  if (pipeline.success) {
    const output = ResultsOutputSchema.parse(pipeline.output);
    results = output.results;
    resultsPath = output.resultsPath;
  }

  return {
    runId,
    runConfig,
    runDir: getRunDir(dataDir, runId),
    pipeline,
    results,
    resultsPath,
  };
}
