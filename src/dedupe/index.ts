/**
 * Deduplication Module
 *
 * Identity collapse followed by greedy name-variant collapse.
 *
 * @module dedupe
 */

export { nameKey, keysOverlap } from './normalize.js';

export {
  deduplicate,
  collapseByIdentity,
  collapseSimilarNames,
  MIN_VARIANT_KEY_LENGTH,
  type DedupeStats,
  type DedupeResult,
} from './dedupe.js';
