/**
 * Confidence Ranking
 *
 * Orders records by confidence tier and keeps the top N. Within a tier
 * the incoming order is preserved.
 *
 * @module ranking/ranker
 */

import type { StartupRecord } from '../schemas/startup.js';
import { CONFIDENCE_TIERS, type ConfidenceTier } from '../schemas/common.js';

// ============================================================================
// Ranking
// ============================================================================

/**
 * Stable sort: high, then medium, then low.
 *
 * Returns a new array; the input is not reordered.
 *
 * @example
 * ```typescript
 * rankByConfidence([low1, high2, high3, medium4]); // [high2, high3, medium4, low1]
 * ```
 */
export function rankByConfidence(records: readonly StartupRecord[]): StartupRecord[] {
  const rank = (tier: ConfidenceTier): number => CONFIDENCE_TIERS.indexOf(tier);
  return [...records].sort((a, b) => rank(a.confidenceTier) - rank(b.confidenceTier));
}

/**
 * Rank, then keep the first targetCount records.
 *
 * @throws Error if targetCount is not a positive integer
 */
export function selectTop(records: readonly StartupRecord[], targetCount: number): StartupRecord[] {
  if (!Number.isInteger(targetCount) || targetCount < 1) {
    throw new Error(`Target count must be a positive integer, got ${targetCount}`);
  }
  return rankByConfidence(records).slice(0, targetCount);
}

/**
 * Count records per tier.
 */
export function countByTier(records: readonly StartupRecord[]): Record<ConfidenceTier, number> {
  const counts: Record<ConfidenceTier, number> = { high: 0, medium: 0, low: 0 };
  for (const record of records) {
    counts[record.confidenceTier]++;
  }
  return counts;
}
