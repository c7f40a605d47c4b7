/**
 * Startup Record Schemas
 *
 * Two shapes flow through the pipeline:
 * - RawCandidate: whatever a collector scraped, before cleaning and validation
 * - StartupRecord: the canonical, cleaned and validated record every stage works on
 *
 * @module schemas/startup
 */

import { z } from 'zod';
import { ConfidenceTierSchema, IdentitySchema, ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Validation Reasons
// ============================================================================

/**
 * Machine-readable tags explaining a validity decision.
 * Only `passed_validation` marks an accepted record.
 */
export const ValidationReasonSchema = z.enum([
  'empty_or_too_short_name',
  'article_title_detected',
  'fake_placeholder_detected',
  'government_initiative_detected',
  'stealth_mode_not_verifiable',
  'likely_article_no_company_indicators',
  'no_company_indicators_found',
  'passed_validation',
]);

export type ValidationReason = z.infer<typeof ValidationReasonSchema>;

// ============================================================================
// Raw Candidate
// ============================================================================

/**
 * RawCandidate: producer-supplied fields, transient and never persisted.
 */
export const RawCandidateSchema = z.object({
  name: z.string(),
  source: z.string(),
  website: z.string().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
  industry: z.string().optional(),
  fundingStage: z.string().optional(),
  employeeCount: z.string().optional(),
  /** Collector's confidence hint; replaced later by enrichment */
  confidence: ConfidenceTierSchema.optional(),
  discoveredAt: ISO8601TimestampSchema.optional(),
});

export type RawCandidate = z.infer<typeof RawCandidateSchema>;

// ============================================================================
// Startup Record
// ============================================================================

/**
 * StartupRecord: the unit of the whole pipeline.
 *
 * Optional text fields are always present and default to the empty string,
 * so every persisted record carries every field.
 */
export const StartupRecordSchema = z.object({
  /** sha256(lower(name) | lower(website)), first 16 hex chars */
  identity: IdentitySchema,

  /** Cleaned, printable-ASCII company name */
  name: z.string().min(1),

  /** Provenance tag, e.g. "yc_W24" or "dpiit_api" */
  source: z.string(),

  website: z.string(),
  description: z.string(),
  location: z.string(),
  industry: z.string(),
  fundingStage: z.string(),
  employeeCount: z.string(),

  discoveredAt: ISO8601TimestampSchema,

  confidenceTier: ConfidenceTierSchema,

  /** Set once at normalization */
  isValidCompany: z.boolean(),

  validationReason: ValidationReasonSchema,
});

export type StartupRecord = z.infer<typeof StartupRecordSchema>;

/**
 * Type guard for records that passed validation.
 */
export function isValidStartupRecord(value: unknown): value is StartupRecord {
  const parsed = StartupRecordSchema.safeParse(value);
  return parsed.success && parsed.data.isValidCompany;
}
