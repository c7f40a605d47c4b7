/**
 * Run Configuration Schema
 *
 * Every discovery run snapshots the settings it ran with. The snapshot is
 * built from environment config plus CLI flags and stored with the run.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Run Config Schema
// ============================================================================

export const RunConfigSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.runConfig),

  /** Run identifier (format: YYYYMMDD-HHMMSS) */
  runId: z.string().min(1),

  startedAt: ISO8601TimestampSchema,

  /** Number of records kept after ranking */
  targetCount: z.number().int().positive(),

  /** Maximum collectors running at once */
  concurrency: z.number().int().positive(),

  /** Wall-clock bound for a single collector */
  collectorTimeoutMs: z.number().int().positive(),

  /** Per-request timeout inside collectors */
  httpTimeoutMs: z.number().int().positive(),

  /** Homepage fetch timeout used by enrichment */
  fetchTimeoutMs: z.number().int().positive(),

  /** Whether enrichment may fetch homepages for empty descriptions */
  websiteFetch: z.boolean(),

  /** Collector IDs to run; empty means every registered collector */
  sources: z.array(z.string().min(1)),

  /** Write a checkpoint file after each stage */
  saveCheckpoints: z.boolean(),

  /** Explicit results path; defaults to the run directory */
  outputPath: z.string().optional(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Input accepted by RunConfigSchema, with defaults still optional.
 */
export type RunConfigInput = z.input<typeof RunConfigSchema>;
