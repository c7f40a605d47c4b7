/**
 * Company Validator
 *
 * Classifies a scraped name as a plausible company or as noise (article
 * title, placeholder, government programme, unverifiable stealth listing).
 *
 * Checks run in a fixed order and the first match wins. The strict
 * negatives (article, placeholder, government) must fire before the
 * permissive "looks like a company" fallback.
 *
 * @module validation/validator
 */

import type { ValidationReason } from '../schemas/startup.js';
import { PATTERNS, findMatch, type CompiledPatterns } from './patterns.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of validating one candidate.
 */
export interface ValidationResult {
  /** Whether the candidate looks like a real company */
  isValid: boolean;

  /** Reason tag; `passed_validation` when valid */
  reason: ValidationReason;

  /** Source of the pattern that decided the outcome, for logging */
  pattern?: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Names shorter than this are rejected outright */
const MIN_NAME_LENGTH = 2;

/** Short capitalized names (up to this many words) pass without other signals */
const MAX_CAPITALIZED_WORDS = 4;

// ============================================================================
// Helpers
// ============================================================================

function reject(reason: ValidationReason, pattern?: RegExp): ValidationResult {
  return pattern ? { isValid: false, reason, pattern: pattern.source } : { isValid: false, reason };
}

/**
 * True if the name has at most four words and every word starts with an
 * upper-case letter, e.g. "Acme Robotics".
 */
export function looksLikeCompanyName(name: string): boolean {
  const words = name.split(/\s+/).filter((word) => word.length > 0);
  return words.length <= MAX_CAPITALIZED_WORDS && words.every((word) => /^[A-Z]/.test(word));
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate that a candidate is a real company.
 *
 * Order of checks:
 * 1. Empty or too-short name
 * 2. Article title in name
 * 3. Fake or placeholder name
 * 4. Government programme in name or description
 * 5. Stealth-signal source
 * 6. Editorial ("features") source without company indicators in description
 * 7. No positive signal at all: no indicator in description, no company
 *    suffix or CamelCase in name, not a short capitalized name
 *
 * @param name - Cleaned company name
 * @param description - Cleaned description
 * @param source - Source tag of the collector
 * @param patterns - Pattern tables (defaults to the bundled tables)
 *
 * @example
 * ```typescript
 * validateCompany('The Future of Fintech');
 * // { isValid: false, reason: 'article_title_detected', pattern: 'the\\s+future\\s+of' }
 * ```
 */
export function validateCompany(
  name: string,
  description: string = '',
  source: string = '',
  patterns: CompiledPatterns = PATTERNS
): ValidationResult {
  if (!name || name.length < MIN_NAME_LENGTH) {
    return reject('empty_or_too_short_name');
  }

  const nameLower = name.toLowerCase().trim();
  const descLower = description.toLowerCase();
  const sourceLower = source.toLowerCase();

  const article = findMatch(patterns.article, nameLower);
  if (article) {
    return reject('article_title_detected', article);
  }

  const fake = findMatch(patterns.fake, nameLower);
  if (fake) {
    return reject('fake_placeholder_detected', fake);
  }

  const government = patterns.government.find(
    (pattern) => pattern.test(nameLower) || pattern.test(descLower)
  );
  if (government) {
    return reject('government_initiative_detected', government);
  }

  if (sourceLower.includes(patterns.stealthSourceMarker)) {
    return reject('stealth_mode_not_verifiable');
  }

  const hasCompanyIndicators = findMatch(patterns.companyIndicators, descLower) !== undefined;

  if (sourceLower.includes(patterns.editorialSourceMarker) && !hasCompanyIndicators) {
    return reject('likely_article_no_company_indicators');
  }

  const hasValidSuffix =
    findMatch(patterns.companySuffixes, nameLower) !== undefined ||
    findMatch(patterns.casedName, name) !== undefined;

  if (!hasCompanyIndicators && !hasValidSuffix && !looksLikeCompanyName(name)) {
    return reject('no_company_indicators_found');
  }

  return { isValid: true, reason: 'passed_validation' };
}
