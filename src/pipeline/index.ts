/**
 * Pipeline Infrastructure
 *
 * Stage execution framework for the five-stage discovery pipeline.
 *
 * @module pipeline
 */

// Type definitions and constants
export type {
  Logger,
  StageContext,
  StageOutcome,
  Stage,
  CompletedStage,
  StageEvents,
} from './types.js';

// Checkpoint writing
export {
  writeCheckpoint,
  readCheckpoint,
  validateCheckpointStructure,
  getCheckpointValidationErrors,
  type CheckpointResult,
  type Checkpoint,
} from './checkpoint.js';

// Run IDs
export { generateRunId, isValidRunId, RUN_ID_PATTERN } from './run-id.js';

// Pipeline executor
export { PipelineExecutor, type PipelineResult, type StageFailure } from './executor.js';

// Discovery run
export {
  runDiscovery,
  buildRunConfig,
  type DiscoveryOptions,
  type DiscoveryRunResult,
} from './discovery.js';
