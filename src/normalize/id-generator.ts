/**
 * Startup Identity Generation
 *
 * Generates stable, deterministic identities based on content hash.
 * The same (name, website) pair yields the same identity in every run
 * and every process.
 *
 * Identity Format: first 16 hex chars of SHA-256
 *
 * @module normalize/id-generator
 */

import * as crypto from 'node:crypto';

// ============================================================================
// Constants
// ============================================================================

/**
 * Length of identity in hex chars (16 hex chars = 64 bits)
 */
const IDENTITY_LENGTH = 16;

/** Separator between name and website in the hash seed */
const SEED_SEPARATOR = '|';

// ============================================================================
// Hash Generation
// ============================================================================

/**
 * Generate SHA-256 hash of content and return first N hex characters.
 *
 * @param content - Content to hash
 * @param length - Number of hex characters to return (default: 16)
 * @returns Truncated hex hash
 */
export function hashContent(content: string, length: number = IDENTITY_LENGTH): string {
  const hash = crypto.createHash('sha256').update(content, 'utf8').digest('hex');
  return hash.substring(0, length);
}

// ============================================================================
// Identity Generation
// ============================================================================

/**
 * Build the hash seed for a (name, website) pair.
 *
 * Both parts are lower-cased and trimmed so that case and surrounding
 * whitespace never change the identity.
 */
export function identitySeed(name: string, website: string = ''): string {
  return `${name.toLowerCase().trim()}${SEED_SEPARATOR}${website.toLowerCase().trim()}`;
}

/**
 * Generate the content-addressed identity of a startup.
 *
 * @param name - Company name
 * @param website - Company website (may be empty)
 * @returns 16 lowercase hex characters
 *
 * @example
 * ```typescript
 * generateIdentity('Acme', 'http://A.com') === generateIdentity('acme', 'http://a.com ');
 * // true
 * ```
 */
export function generateIdentity(name: string, website: string = ''): string {
  return hashContent(identitySeed(name, website));
}
