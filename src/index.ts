/**
 * Startup Discovery
 *
 * Library entry point. The CLI lives in ./cli.
 *
 * @example
 * ```typescript
 * import { runDiscovery } from 'startup-discovery';
 *
 * const run = await runDiscovery({ targetCount: 25, sources: ['yc', 'dpiit'] });
 * console.log(run.results?.metadata.totalCount);
 * ```
 *
 * @module startup-discovery
 */

export { config, type Config } from './config/index.js';
export * from './schemas/index.js';
export * from './storage/index.js';
export * from './validation/index.js';
export * from './normalize/index.js';
export * from './collectors/index.js';
export * from './dedupe/index.js';
export * from './enrichment/index.js';
export * from './ranking/index.js';
export * from './stages/index.js';
export * from './pipeline/index.js';
