/**
 * Checkpoint Writing Module
 *
 * Wraps stage output with metadata and writes checkpoints atomically.
 * All checkpoints follow the structure: { _meta: StageMetadata, data: <stage output> }
 *
 * @module pipeline/checkpoint
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { StageMetadataSchema, type StageMetadata } from '../schemas/stage.js';
import { atomicWriteJson, readJson, getStageFilePath } from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of writing a checkpoint
 */
export interface CheckpointResult {
  /** Full path where checkpoint was written */
  filePath: string;
  /** File size in bytes */
  sizeBytes: number;
}

/**
 * Structure of a checkpoint file
 */
export interface Checkpoint<T = unknown> {
  _meta: StageMetadata;
  data: T;
}

const CheckpointSchema = z.object({
  _meta: StageMetadataSchema,
  data: z.unknown(),
});

// ============================================================================
// Write Functions
// ============================================================================

/**
 * Write a stage checkpoint to `<runDir>/<stageId>.json`.
 *
 * Uses atomic write (temp file + rename) to prevent corruption.
 *
 * @example
 * const result = await writeCheckpoint(runDir, stageResult.metadata, stageResult.data);
 * result.filePath; // '<runDir>/02_dedupe.json'
 */
export async function writeCheckpoint(
  runDir: string,
  metadata: StageMetadata,
  data: unknown
): Promise<CheckpointResult> {
  const checkpoint: Checkpoint = {
    _meta: metadata,
    data,
  };

  const filePath = getStageFilePath(runDir, metadata.stageId);
  await atomicWriteJson(filePath, checkpoint);
  const stats = await fs.stat(filePath);

  return {
    filePath,
    sizeBytes: stats.size,
  };
}

// ============================================================================
// Read Functions
// ============================================================================

/**
 * Read a full checkpoint including both metadata and data.
 *
 * The data field is returned unvalidated; callers parse it with the
 * schema of the stage that wrote it.
 *
 * @throws Error if the file doesn't exist or has invalid structure
 */
export async function readCheckpoint(
  runDir: string,
  stageId: string
): Promise<Checkpoint> {
  const raw = await readJson(getStageFilePath(runDir, stageId));
  const errors = getCheckpointValidationErrors(raw);

  if (errors.length > 0) {
    throw new Error(`Invalid checkpoint structure for ${stageId}: ${errors.join('; ')}`);
  }

  const parsed = CheckpointSchema.parse(raw);
  return { _meta: parsed._meta, data: parsed.data };
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate that a checkpoint has correct structure.
 */
export function validateCheckpointStructure(checkpoint: unknown): checkpoint is Checkpoint {
  return getCheckpointValidationErrors(checkpoint).length === 0;
}

/**
 * Get detailed validation errors for a checkpoint structure.
 *
 * @returns Array of validation error messages, empty if valid
 */
export function getCheckpointValidationErrors(checkpoint: unknown): string[] {
  if (typeof checkpoint !== 'object' || checkpoint === null) {
    return ['Checkpoint must be a non-null object'];
  }

  const errors: string[] = [];

  if (!('_meta' in checkpoint) || checkpoint._meta === undefined) {
    errors.push('Missing required field: _meta');
  } else {
    const metaResult = StageMetadataSchema.safeParse(checkpoint._meta);
    if (!metaResult.success) {
      for (const issue of metaResult.error.issues) {
        errors.push(`_meta.${issue.path.join('.')}: ${issue.message}`);
      }
    }
  }

  if (!('data' in checkpoint)) {
    errors.push('Missing required field: data');
  }

  return errors;
}
