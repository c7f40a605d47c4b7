/**
 * Sector Tagging
 *
 * Keyword table loaded from sectors.json. Keywords are plain substrings of
 * the lower-cased "name description" text; table order decides ties.
 *
 * @module enrichment/sectors
 */

import { z } from 'zod';
import rawSectors from './sectors.json';

// ============================================================================
// Sector Table
// ============================================================================

const SectorRuleSchema = z.object({
  sector: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

export const SectorTableSchema = z.object({
  sectors: z.array(SectorRuleSchema).min(1),
});

export type SectorRule = z.infer<typeof SectorRuleSchema>;

/** Ordered sector rules; the first matching rule wins */
export const SECTOR_RULES: readonly SectorRule[] = SectorTableSchema.parse(rawSectors).sectors;

// ============================================================================
// Matching
// ============================================================================

/**
 * Find the first sector whose keyword appears in the name or description.
 *
 * @returns The sector tag, or null when nothing matches
 *
 * @example
 * ```typescript
 * detectSector('Razorpay', 'Payments platform'); // 'fintech'
 * ```
 */
export function detectSector(
  name: string,
  description: string,
  rules: readonly SectorRule[] = SECTOR_RULES
): string | null {
  const text = `${name} ${description}`.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return rule.sector;
    }
  }
  return null;
}

/**
 * "fintech" -> "Fintech"
 */
export function formatSectorLabel(sector: string): string {
  return sector.charAt(0).toUpperCase() + sector.slice(1).toLowerCase();
}

/**
 * Apply a sector to a description.
 *
 * An empty description becomes "<Sector> startup operating in India";
 * otherwise the description gets a "[SECTOR] " prefix.
 */
export function applySector(description: string, sector: string): string {
  if (!description) {
    return `${formatSectorLabel(sector)} startup operating in India`;
  }
  return `[${sector.toUpperCase()}] ${description}`;
}
