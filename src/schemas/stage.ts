/**
 * Stage Names and Checkpoint Headers
 *
 * The stages always run in one fixed order. A stage's number, its ID and
 * the stage that feeds it all follow from its name.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Stage Order
// ============================================================================

export const STAGE_SEQUENCE = ['collect', 'dedupe', 'enrich', 'rank', 'results'] as const;

export const StageNameSchema = z.enum(STAGE_SEQUENCE);

export type StageName = z.infer<typeof StageNameSchema>;

/** Two-digit position, underscore, name: "01_collect" ... "05_results" */
export const STAGE_ID_PATTERN = /^\d{2}_[a-z]+$/;

export const StageIdSchema = z
  .string()
  .regex(STAGE_ID_PATTERN, 'Stage ID must look like "02_dedupe"');

/**
 * 1-based position of a stage in the run.
 */
export function stageNumberOf(name: StageName): number {
  return STAGE_SEQUENCE.indexOf(name) + 1;
}

/**
 * Checkpoint file stem and timing key.
 *
 * @example stageIdOf('enrich') // '03_enrich'
 */
export function stageIdOf(name: StageName): string {
  return `${String(stageNumberOf(name)).padStart(2, '0')}_${name}`;
}

/**
 * The stage whose output `name` consumes; undefined for the first stage.
 */
export function upstreamOf(name: StageName): StageName | undefined {
  const position = STAGE_SEQUENCE.indexOf(name);
  return position > 0 ? STAGE_SEQUENCE[position - 1] : undefined;
}

// ============================================================================
// Checkpoint Header
// ============================================================================

/**
 * `_meta` of a checkpoint file. ID and number must agree with the name.
 */
export const StageMetadataSchema = z
  .object({
    stageId: StageIdSchema,
    stageNumber: z.number().int().min(1).max(STAGE_SEQUENCE.length),
    stageName: StageNameSchema,
    schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.stage),
    runId: z.string().min(1),
    /** When the stage finished */
    createdAt: ISO8601TimestampSchema,
    upstreamStage: StageIdSchema.optional(),
    /** Counts and settings the stage reported */
    details: z.record(z.string(), z.unknown()).optional(),
  })
  .refine(
    (meta) =>
      meta.stageId === stageIdOf(meta.stageName) && meta.stageNumber === stageNumberOf(meta.stageName),
    { message: 'Stage ID and number do not match the stage name', path: ['stageId'] }
  );

export type StageMetadata = z.infer<typeof StageMetadataSchema>;

/**
 * Header for a stage that just finished.
 */
export function createStageMetadata(
  name: StageName,
  runId: string,
  details?: Record<string, unknown>
): StageMetadata {
  const upstream = upstreamOf(name);
  const metadata: StageMetadata = {
    stageId: stageIdOf(name),
    stageNumber: stageNumberOf(name),
    stageName: name,
    schemaVersion: SCHEMA_VERSIONS.stage,
    runId,
    createdAt: new Date().toISOString(),
  };
  if (upstream) {
    metadata.upstreamStage = stageIdOf(upstream);
  }
  if (details) {
    metadata.details = details;
  }
  return metadata;
}
