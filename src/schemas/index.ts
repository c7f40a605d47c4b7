/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used in the pipeline.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  ConfidenceTierSchema,
  CONFIDENCE_TIERS,
  IdentitySchema,
  type ISO8601Timestamp,
  type ConfidenceTier,
  type Identity,
} from './common.js';

// ============================================================================
// Startup Records
// ============================================================================

export {
  ValidationReasonSchema,
  RawCandidateSchema,
  StartupRecordSchema,
  isValidStartupRecord,
  type ValidationReason,
  type RawCandidate,
  type StartupRecord,
} from './startup.js';

// ============================================================================
// Stage Metadata
// ============================================================================

export {
  STAGE_SEQUENCE,
  STAGE_ID_PATTERN,
  StageNameSchema,
  StageIdSchema,
  StageMetadataSchema,
  stageNumberOf,
  stageIdOf,
  upstreamOf,
  createStageMetadata,
  type StageName,
  type StageMetadata,
} from './stage.js';

// ============================================================================
// Run Config
// ============================================================================

export { RunConfigSchema, type RunConfig, type RunConfigInput } from './run-config.js';

// ============================================================================
// Discovery Results
// ============================================================================

export {
  CollectorStatusSchema,
  CollectorSummarySchema,
  DiscoveryResultsMetadataSchema,
  DiscoveryResultsSchema,
  type CollectorStatus,
  type CollectorSummary,
  type DiscoveryResultsMetadata,
  type DiscoveryResults,
} from './discovery-results.js';
