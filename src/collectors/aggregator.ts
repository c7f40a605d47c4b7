/**
 * Collector Aggregator
 *
 * Runs a collector plan with bounded concurrency. Each collector gets its
 * own wall-clock bound and failure isolation; whatever it returns is
 * filtered against the record schema before being merged.
 *
 * @module collectors/aggregator
 */

import type { Logger } from '../pipeline/types.js';
import { isValidStartupRecord, type StartupRecord } from '../schemas/startup.js';
import type { CollectorSummary } from '../schemas/discovery-results.js';
import type { Collector, CollectorAssignment, CollectorPlan } from './types.js';
import type { CollectorRegistry } from './registry.js';
import { CollectorTimeoutError } from './errors.js';
import { ConcurrencyLimiter } from './concurrency.js';

// ============================================================================
// Constants
// ============================================================================

/** Default wall-clock bound for one collector (60 seconds) */
export const DEFAULT_COLLECTOR_TIMEOUT_MS = 60000;

/** Default number of collectors running at once */
export const DEFAULT_CONCURRENCY = 4;

// ============================================================================
// Timeout Helper
// ============================================================================

/**
 * Race a collector call against its time bound.
 *
 * The timer is cleared whichever side settles first. The losing collector
 * promise is left to settle on its own; its result is discarded.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  collectorId: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new CollectorTimeoutError(collectorId, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

// ============================================================================
// Types
// ============================================================================

/**
 * Options for aggregateCollectors.
 */
export interface AggregateOptions {
  /** Maximum collectors running at once (default: 4) */
  concurrency?: number;

  /** Wall-clock bound per collector unless the assignment sets one (default: 60s) */
  timeoutMs?: number;

  /** Per-request timeout handed to each collector */
  httpTimeoutMs?: number;

  logger?: Logger;
}

/**
 * Merged output of one collect stage.
 */
export interface AggregationResult {
  /** Valid records in completion order */
  records: StartupRecord[];

  /** One summary per plan assignment, in plan order */
  summaries: CollectorSummary[];
}

// ============================================================================
// Output Filtering
// ============================================================================

/**
 * Keep the records that match the schema and are marked valid.
 *
 * Collectors are external code; a record that slipped past normalization
 * or was built by hand is dropped here.
 */
export function filterValidRecords(output: unknown[]): { records: StartupRecord[]; rejected: number } {
  const records: StartupRecord[] = [];
  let rejected = 0;

  for (const item of output) {
    if (isValidStartupRecord(item)) {
      records.push(item);
    } else {
      rejected++;
    }
  }

  return { records, rejected };
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Run one collector and describe the outcome.
 *
 * Never throws: errors and timeouts become the summary's status.
 */
async function runCollector(
  collector: Collector,
  assignment: CollectorAssignment,
  options: AggregateOptions,
  merge: (records: StartupRecord[]) => void
): Promise<CollectorSummary> {
  const startTime = Date.now();
  const timeoutMs = assignment.timeoutMs ?? options.timeoutMs ?? DEFAULT_COLLECTOR_TIMEOUT_MS;
  const logger = options.logger;

  try {
    const output: unknown = await withTimeout(
      collector.collect({
        limit: assignment.limit ?? collector.defaultLimit,
        logger,
        timeoutMs: options.httpTimeoutMs,
      }),
      timeoutMs,
      collector.id
    );

    if (!Array.isArray(output)) {
      throw new Error(`Collector ${collector.id} returned ${typeof output} instead of a record list`);
    }
    const { records, rejected } = filterValidRecords(output);
    if (rejected > 0) {
      logger?.warn(`[${collector.id}] Dropped ${rejected} malformed or invalid records`);
    }
    merge(records);
    logger?.info(`[${collector.id}] ${collector.name}: ${records.length} startups`);

    return {
      collectorId: collector.id,
      name: collector.name,
      status: 'ok',
      recordCount: records.length,
      rejectedCount: rejected,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const status = error instanceof CollectorTimeoutError ? 'timeout' : 'error';
    logger?.error(`[${collector.id}] ${collector.name} failed: ${message}`);

    return {
      collectorId: collector.id,
      name: collector.name,
      status,
      recordCount: 0,
      rejectedCount: 0,
      durationMs: Date.now() - startTime,
      error: message,
    };
  }
}

/**
 * Execute every collector in a plan and merge their records.
 *
 * Uses Promise.allSettled with a ConcurrencyLimiter; one collector failing
 * or hanging never affects the others. Records are appended as each
 * collector finishes, so the merged order is completion order.
 *
 * @example
 * ```typescript
 * const { records, summaries } = await aggregateCollectors(
 *   { collectors: [{ collectorId: 'yc' }, { collectorId: 'dpiit', limit: 20 }] },
 *   registry,
 *   { concurrency: 4, timeoutMs: 60000, logger }
 * );
 * ```
 */
export async function aggregateCollectors(
  plan: CollectorPlan,
  registry: CollectorRegistry,
  options: AggregateOptions = {}
): Promise<AggregationResult> {
  const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);
  const records: StartupRecord[] = [];
  const merge = (batch: StartupRecord[]): void => {
    records.push(...batch);
  };

  const results = await Promise.allSettled(
    plan.collectors.map(async (assignment) => {
      return limiter.run(async (): Promise<CollectorSummary> => {
        const collector = lookupCollector(registry, assignment.collectorId, options.logger);

        if (!collector) {
          options.logger?.warn(`[${assignment.collectorId}] Collector not found in registry`);
          return {
            collectorId: assignment.collectorId,
            name: assignment.collectorId,
            status: 'missing',
            recordCount: 0,
            rejectedCount: 0,
            durationMs: 0,
            error: `Collector '${assignment.collectorId}' not found in registry`,
          };
        }

        return runCollector(collector, assignment, options, merge);
      });
    })
  );

  const summaries = results.map((result, index): CollectorSummary => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    const collectorId = plan.collectors[index]?.collectorId ?? 'unknown';
    return {
      collectorId,
      name: collectorId,
      status: 'error',
      recordCount: 0,
      rejectedCount: 0,
      durationMs: 0,
      error: result.reason instanceof Error ? result.reason.message : String(result.reason),
    };
  });

  return { records, summaries };
}

/**
 * Registry lookup where a throwing factory counts as a missing collector.
 */
function lookupCollector(
  registry: CollectorRegistry,
  collectorId: string,
  logger?: Logger
): Collector | undefined {
  try {
    return registry.get(collectorId);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.error(`[${collectorId}] Collector could not be created: ${message}`);
    return undefined;
  }
}

// ============================================================================
// Collection Summary
// ============================================================================

/**
 * Counts describing one collect stage.
 */
export interface CollectionSummary {
  total: number;
  successful: number;
  failed: number;
  timedOut: number;
  missing: number;
  totalRecords: number;
  totalRejected: number;
  /** Collector IDs that errored, timed out or were missing */
  failedCollectors: string[];
}

/**
 * Summarize collector outcomes for logging and the CLI report.
 *
 * @example
 * ```typescript
 * const summary = summarizeCollection(result.summaries);
 * logger.info(`${summary.successful}/${summary.total} collectors succeeded`);
 * ```
 */
export function summarizeCollection(summaries: CollectorSummary[]): CollectionSummary {
  let successful = 0;
  let failed = 0;
  let timedOut = 0;
  let missing = 0;
  let totalRecords = 0;
  let totalRejected = 0;
  const failedCollectors: string[] = [];

  for (const summary of summaries) {
    totalRecords += summary.recordCount;
    totalRejected += summary.rejectedCount;

    switch (summary.status) {
      case 'ok':
        successful++;
        break;
      case 'error':
        failed++;
        failedCollectors.push(summary.collectorId);
        break;
      case 'timeout':
        timedOut++;
        failedCollectors.push(summary.collectorId);
        break;
      case 'missing':
        missing++;
        failedCollectors.push(summary.collectorId);
        break;
    }
  }

  return {
    total: summaries.length,
    successful,
    failed,
    timedOut,
    missing,
    totalRecords,
    totalRejected,
    failedCollectors,
  };
}
