/**
 * Discovery Results Schema
 *
 * Zod schemas for the final discovery results output.
 * This is the file a completed run leaves behind.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema } from './common.js';
import { StartupRecordSchema } from './startup.js';

// ============================================================================
// Collector Summary
// ============================================================================

/**
 * CollectorStatus: Outcome of one collector invocation
 */
export const CollectorStatusSchema = z.enum([
  'ok', // Collector returned
  'error', // Collector threw
  'timeout', // Collector exceeded its wall-clock bound
  'missing', // Collector ID not registered
]);

export type CollectorStatus = z.infer<typeof CollectorStatusSchema>;

/**
 * CollectorSummary: Summary of a single collector's execution
 */
export const CollectorSummarySchema = z.object({
  collectorId: z.string().min(1),
  name: z.string(),
  status: CollectorStatusSchema,
  /** Records kept after the aggregator's validity filter */
  recordCount: z.number().nonnegative().int(),
  /** Records the aggregator filtered out */
  rejectedCount: z.number().nonnegative().int(),
  durationMs: z.number().nonnegative(),
  error: z.string().optional(),
});

export type CollectorSummary = z.infer<typeof CollectorSummarySchema>;

// ============================================================================
// Main Discovery Results Schema
// ============================================================================

export const DiscoveryResultsMetadataSchema = z.object({
  schemaVersion: z.number().int().positive(),
  runId: z.string().min(1),
  generatedAt: ISO8601TimestampSchema,
  totalCount: z.number().nonnegative().int(),
  targetCount: z.number().positive().int(),
  /** Distinct source tags in the output, sorted */
  sourcesUsed: z.array(z.string()),
  highConfidence: z.number().nonnegative().int(),
  mediumConfidence: z.number().nonnegative().int(),
  lowConfidence: z.number().nonnegative().int(),
  collectors: z.array(CollectorSummarySchema),
});

export type DiscoveryResultsMetadata = z.infer<typeof DiscoveryResultsMetadataSchema>;

/**
 * DiscoveryResults: Complete output of a discovery run
 */
export const DiscoveryResultsSchema = z.object({
  metadata: DiscoveryResultsMetadataSchema,
  startups: z.array(StartupRecordSchema),
});

export type DiscoveryResults = z.infer<typeof DiscoveryResultsSchema>;
