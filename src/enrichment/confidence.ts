/**
 * Confidence Scoring
 *
 * One point each for a non-government website, a substantive description
 * and a location. Three points is high, two medium, anything less low.
 *
 * @module enrichment/confidence
 */

import type { ConfidenceTier } from '../schemas/common.js';

/** Government domains do not count as a company website */
export const GOVERNMENT_DOMAINS: readonly string[] = ['.gov.in', '.nic.in'];

/** Descriptions must be longer than this to score */
export const MIN_DESCRIPTION_LENGTH = 20;

export interface ConfidenceInput {
  website: string;
  description: string;
  location: string;
}

export function isGovernmentWebsite(website: string): boolean {
  const lower = website.toLowerCase();
  return GOVERNMENT_DOMAINS.some((domain) => lower.includes(domain));
}

/**
 * Score a record from 0 to 3.
 */
export function scoreConfidence(record: ConfidenceInput): number {
  let score = 0;
  if (record.website && !isGovernmentWebsite(record.website)) {
    score++;
  }
  if (record.description.length > MIN_DESCRIPTION_LENGTH) {
    score++;
  }
  if (record.location) {
    score++;
  }
  return score;
}

export function tierForScore(score: number): ConfidenceTier {
  if (score >= 3) {
    return 'high';
  }
  if (score >= 2) {
    return 'medium';
  }
  return 'low';
}

/**
 * @example
 * ```typescript
 * assessConfidence({ website: 'https://razorpay.com', description: 'Payments platform for businesses', location: 'Bengaluru' });
 * // 'high'
 * ```
 */
export function assessConfidence(record: ConfidenceInput): ConfidenceTier {
  return tierForScore(scoreConfidence(record));
}
