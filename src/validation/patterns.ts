/**
 * Company Validation Pattern Tables
 *
 * Heuristic regex tables used to tell real companies apart from article
 * titles, placeholders and government programmes. The tables live in
 * patterns.json and are parsed and compiled once, at module load.
 *
 * @module validation/patterns
 */

import { z } from 'zod';
import rawPatterns from './patterns.json';

// ============================================================================
// Table Schema
// ============================================================================

const PatternListSchema = z.array(z.string().min(1)).min(1);

export const PatternTableSchema = z.object({
  /** Matched against the lower-cased name */
  articlePatterns: PatternListSchema,
  /** Matched against the lower-cased name */
  fakePatterns: PatternListSchema,
  /** Matched against the lower-cased name and description */
  governmentPatterns: PatternListSchema,
  /** Matched against the lower-cased description */
  companyIndicators: PatternListSchema,
  /** Matched against the lower-cased name */
  companySuffixes: PatternListSchema,
  /** Matched against the name as written (CamelCase detection) */
  casedNamePatterns: PatternListSchema,
  stealthSourceMarker: z.string().min(1),
  editorialSourceMarker: z.string().min(1),
});

export type PatternTable = z.infer<typeof PatternTableSchema>;

// ============================================================================
// Compiled Patterns
// ============================================================================

/**
 * Patterns compiled to RegExp. No `g` flag, so `test()` is stateless.
 */
export interface CompiledPatterns {
  article: readonly RegExp[];
  fake: readonly RegExp[];
  government: readonly RegExp[];
  companyIndicators: readonly RegExp[];
  companySuffixes: readonly RegExp[];
  casedName: readonly RegExp[];
  stealthSourceMarker: string;
  editorialSourceMarker: string;
}

/**
 * Compile a validated pattern table.
 *
 * @throws Error naming the offending pattern if one is not a valid regex
 */
export function compilePatterns(table: PatternTable): CompiledPatterns {
  const compile = (sources: string[]): RegExp[] =>
    sources.map((source) => {
      try {
        return new RegExp(source);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid validation pattern "${source}": ${message}`, { cause: error });
      }
    });

  return Object.freeze({
    article: compile(table.articlePatterns),
    fake: compile(table.fakePatterns),
    government: compile(table.governmentPatterns),
    companyIndicators: compile(table.companyIndicators),
    companySuffixes: compile(table.companySuffixes),
    casedName: compile(table.casedNamePatterns),
    stealthSourceMarker: table.stealthSourceMarker,
    editorialSourceMarker: table.editorialSourceMarker,
  });
}

/**
 * Process-wide pattern tables, loaded from patterns.json.
 */
export const PATTERNS: CompiledPatterns = compilePatterns(PatternTableSchema.parse(rawPatterns));

/**
 * Find the first pattern matching the text.
 *
 * @returns The matching pattern, or undefined
 */
export function findMatch(patterns: readonly RegExp[], text: string): RegExp | undefined {
  return patterns.find((pattern) => pattern.test(text));
}
