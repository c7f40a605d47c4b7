/**
 * Record Normalization
 *
 * Builds the canonical StartupRecord from collector-supplied fields.
 * This is the validity boundary: a candidate that fails validation never
 * becomes a record. Rejections are logged and dropped, never thrown.
 *
 * @module normalize/record
 */

import type { Logger } from '../pipeline/types.js';
import { RawCandidateSchema, type RawCandidate, type StartupRecord } from '../schemas/startup.js';
import { validateCompany } from '../validation/validator.js';
import { cleanText } from './text.js';
import { generateIdentity } from './id-generator.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for record normalization.
 */
export interface NormalizeOptions {
  /** Receives one structured entry per rejected candidate */
  logger?: Logger;

  /** Clock used for discoveredAt when the candidate carries none */
  now?: () => Date;
}

/**
 * Structured payload attached to a rejection log entry.
 */
export interface RejectionLogEntry {
  name: string;
  source: string;
  reason: string;
  pattern?: string;
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalize one raw candidate.
 *
 * 1. Check the candidate's shape; scraped and bundled data is not trusted
 * 2. Clean every display field
 * 3. Validate the cleaned name, description and source
 * 4. On rejection: log `Rejected "<name>" from <source>: <reason>` and return null
 * 5. On acceptance: attach identity, timestamp and confidence hint
 *
 * @param raw - Collector-supplied candidate
 * @param options - Logger and clock
 * @returns The canonical record, or null if the candidate was rejected
 *
 * @example
 * ```typescript
 * const record = normalizeStartup({ name: 'Razorpay', source: 'dpiit_api', website: 'https://razorpay.com' });
 * record?.identity; // 16 hex chars
 * ```
 */
export function normalizeStartup(
  candidate: RawCandidate,
  options: NormalizeOptions = {}
): StartupRecord | null {
  const parsed = RawCandidateSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    options.logger?.debug(`Rejected malformed candidate from ${candidate.source}: ${issues.join('; ')}`);
    return null;
  }
  const raw = parsed.data;

  const name = cleanText(raw.name);
  const source = cleanText(raw.source);
  const website = cleanText(raw.website);
  const description = cleanText(raw.description);

  const validation = validateCompany(name, description, source);

  if (!validation.isValid) {
    const entry: RejectionLogEntry = { name, source, reason: validation.reason };
    if (validation.pattern !== undefined) {
      entry.pattern = validation.pattern;
    }
    options.logger?.debug(`Rejected "${name}" from ${source}: ${validation.reason}`, entry);
    return null;
  }

  const now = options.now ?? (() => new Date());

  return {
    identity: generateIdentity(name, website),
    name,
    source,
    website,
    description,
    location: cleanText(raw.location),
    industry: cleanText(raw.industry),
    fundingStage: cleanText(raw.fundingStage),
    employeeCount: cleanText(raw.employeeCount),
    discoveredAt: raw.discoveredAt ?? now().toISOString(),
    confidenceTier: raw.confidence ?? 'medium',
    isValidCompany: true,
    validationReason: validation.reason,
  };
}

/**
 * Normalize a batch of raw candidates, dropping rejections.
 *
 * @returns Accepted records, in input order
 */
export function normalizeStartups(
  raws: RawCandidate[],
  options: NormalizeOptions = {}
): StartupRecord[] {
  const records: StartupRecord[] = [];
  for (const raw of raws) {
    const record = normalizeStartup(raw, options);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
