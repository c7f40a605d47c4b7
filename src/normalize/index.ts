/**
 * Normalization Module
 *
 * Text cleaning, identity generation and the record boundary.
 *
 * @module normalize
 */

export { cleanText, truncateText } from './text.js';
export { generateIdentity, identitySeed, hashContent } from './id-generator.js';
export {
  normalizeStartup,
  normalizeStartups,
  type NormalizeOptions,
  type RejectionLogEntry,
} from './record.js';
