/**
 * Two-Phase Deduplication
 *
 * Phase 1 collapses exact duplicates by identity. Phase 2 collapses name
 * variants ("Razorpay" / "Razorpay Software") with a greedy containment
 * rule over name keys. Both phases keep the first occurrence, so the
 * result depends on input order.
 *
 * @module dedupe/dedupe
 */

import type { StartupRecord } from '../schemas/startup.js';
import { generateIdentity } from '../normalize/id-generator.js';
import { keysOverlap, nameKey } from './normalize.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * A candidate key must be longer than this to be dropped as a name variant.
 * Short names are too likely to appear inside unrelated names.
 */
export const MIN_VARIANT_KEY_LENGTH = 5;

// ============================================================================
// Types
// ============================================================================

/**
 * Counters describing one deduplication pass.
 */
export interface DedupeStats {
  inputCount: number;
  afterIdentityCount: number;
  outputCount: number;
  identityDuplicates: number;
  nameDuplicates: number;
}

export interface DedupeResult {
  records: StartupRecord[];
  stats: DedupeStats;
}

// ============================================================================
// Phase 1: Identity
// ============================================================================

/**
 * Keep the first record per identity.
 *
 * Identity is recomputed from name and website for every record; whatever
 * a collector attached is overwritten.
 */
export function collapseByIdentity(records: StartupRecord[]): StartupRecord[] {
  const seen = new Set<string>();
  const kept: StartupRecord[] = [];

  for (const record of records) {
    const identity = generateIdentity(record.name, record.website);
    if (seen.has(identity)) {
      continue;
    }
    seen.add(identity);
    kept.push(record.identity === identity ? record : { ...record, identity });
  }

  return kept;
}

// ============================================================================
// Phase 2: Name Variants
// ============================================================================

/**
 * Drop records whose name key contains, or is contained in, an accepted key.
 *
 * The rule only fires when the candidate's key is longer than
 * MIN_VARIANT_KEY_LENGTH. It is greedy: a short name accepted early
 * ("Pay") removes a later, longer one ("RazorPay").
 */
export function collapseSimilarNames(records: StartupRecord[]): StartupRecord[] {
  const acceptedKeys: string[] = [];
  const kept: StartupRecord[] = [];

  for (const record of records) {
    const key = nameKey(record.name);
    const isVariant =
      key.length > MIN_VARIANT_KEY_LENGTH && acceptedKeys.some((accepted) => keysOverlap(key, accepted));

    if (isVariant) {
      continue;
    }
    acceptedKeys.push(key);
    kept.push(record);
  }

  return kept;
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Run both phases.
 *
 * Idempotent: deduplicating the output again returns it unchanged.
 *
 * @example
 * ```typescript
 * const { records, stats } = deduplicate(collected);
 * logger.info(`${stats.inputCount} -> ${stats.outputCount} startups`);
 * ```
 */
export function deduplicate(records: StartupRecord[]): DedupeResult {
  const byIdentity = collapseByIdentity(records);
  const byName = collapseSimilarNames(byIdentity);

  return {
    records: byName,
    stats: {
      inputCount: records.length,
      afterIdentityCount: byIdentity.length,
      outputCount: byName.length,
      identityDuplicates: records.length - byIdentity.length,
      nameDuplicates: byIdentity.length - byName.length,
    },
  };
}
