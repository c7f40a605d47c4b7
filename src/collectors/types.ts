/**
 * Collector Framework Types
 *
 * Collectors are pluggable startup sources (Y Combinator, Startup India,
 * Inc42, Tier-2 city ecosystems, the bundled last-resort list) that
 * return records already passed through the record normalizer.
 *
 * @module collectors/types
 */

import type { Logger } from '../pipeline/types.js';
import type { StartupRecord } from '../schemas/startup.js';

export type { StartupRecord } from '../schemas/startup.js';
export type { CollectorSummary, CollectorStatus } from '../schemas/discovery-results.js';

// ============================================================================
// Collector Interface
// ============================================================================

/**
 * Options passed to a collector invocation.
 */
export interface CollectOptions {
  /** Maximum number of records to return */
  limit?: number;

  /** Logger for progress and rejection entries */
  logger?: Logger;

  /** Per-request timeout for the collector's own HTTP calls */
  timeoutMs?: number;
}

/**
 * A startup source.
 *
 * Collectors may throw or hang; the aggregator isolates each invocation.
 * Calling collect again with the same options is a plain retry, so a
 * collector keeps no state between calls.
 *
 * @example
 * ```typescript
 * const collector: Collector = {
 *   id: 'static',
 *   name: 'Static list',
 *   async collect() {
 *     return normalizeStartups([{ name: 'Razorpay', source: 'static' }]);
 *   },
 * };
 * ```
 */
export interface Collector {
  /** Registry key, e.g. "yc" */
  readonly id: string;

  /** Display name, e.g. "Y Combinator India" */
  readonly name: string;

  /** Limit used when the plan gives none */
  readonly defaultLimit?: number;

  /**
   * Collect startup records.
   *
   * @param options - Limit, logger and request timeout
   * @returns Records that passed normalization
   */
  collect(options: CollectOptions): Promise<StartupRecord[]>;
}

/**
 * Factory function for lazily creating collectors.
 */
export type CollectorFactory = () => Collector;

/**
 * Map of collector ID to collector instance.
 */
export type CollectorMap = Map<string, Collector>;

// ============================================================================
// Collection Plan
// ============================================================================

/**
 * One collector invocation in a plan.
 */
export interface CollectorAssignment {
  collectorId: string;

  /** Overrides the collector's default limit */
  limit?: number;

  /** Overrides the aggregator's per-collector wall-clock bound */
  timeoutMs?: number;
}

/**
 * The set of collectors to run in one collect stage.
 */
export interface CollectorPlan {
  collectors: CollectorAssignment[];
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check whether a value implements the Collector interface.
 */
export function isCollector(value: unknown): value is Collector {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'collect' in value &&
    typeof value.collect === 'function'
  );
}
