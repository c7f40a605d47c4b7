/**
 * Validation Module Exports
 *
 * Central export point for company validation functionality.
 *
 * @module validation
 */

export {
  PATTERNS,
  PatternTableSchema,
  compilePatterns,
  findMatch,
  type PatternTable,
  type CompiledPatterns,
} from './patterns.js';

export { validateCompany, looksLikeCompanyName, type ValidationResult } from './validator.js';
