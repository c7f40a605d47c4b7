/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Confidence Tier Schema
// ============================================

/**
 * Confidence tier of a startup record.
 *
 * Collectors attach an initial hint; the enrichment step replaces it with a
 * tier computed from field completeness.
 */
export const ConfidenceTierSchema = z.enum(['high', 'medium', 'low']);

export type ConfidenceTier = z.infer<typeof ConfidenceTierSchema>;

/**
 * Tiers in ranking order, best first.
 */
export const CONFIDENCE_TIERS: readonly ConfidenceTier[] = ConfidenceTierSchema.options;

// ============================================
// Identity Schema
// ============================================

/**
 * Content-addressed startup identity: 16 lowercase hex characters.
 */
export const IdentitySchema = z
  .string()
  .regex(/^[0-9a-f]{16}$/, 'Identity must be 16 lowercase hex characters');

export type Identity = z.infer<typeof IdentitySchema>;
