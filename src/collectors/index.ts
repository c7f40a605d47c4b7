/**
 * Collectors Module
 *
 * Startup sources, their registry and the aggregator that runs them.
 *
 * @module collectors
 */

export {
  type CollectOptions,
  type Collector,
  type CollectorFactory,
  type CollectorMap,
  type CollectorAssignment,
  type CollectorPlan,
  isCollector,
} from './types.js';

export { HttpError, isHttpError, isRetryableError, CollectorTimeoutError } from './errors.js';

export {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_HEADERS,
  buildUrl,
  ensureScheme,
  fetchWithTimeout,
  fetchText,
  fetchJson,
  withRetry,
  type RequestOptions,
} from './http.js';

export { ConcurrencyLimiter } from './concurrency.js';

export { CollectorRegistry, createDefaultRegistry } from './registry.js';

export {
  aggregateCollectors,
  filterValidRecords,
  summarizeCollection,
  withTimeout,
  DEFAULT_COLLECTOR_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  type AggregateOptions,
  type AggregationResult,
  type CollectionSummary,
} from './aggregator.js';

export * from './yc/index.js';
export * from './dpiit/index.js';
export * from './inc42/index.js';
export * from './tier2/index.js';
export * from './last-resort/index.js';
