/**
 * Y Combinator Company Mapper
 *
 * Parses items from the YC companies API and maps Indian companies to
 * raw candidates for the record normalizer.
 *
 * @module collectors/yc/mapper
 */

import { z } from 'zod';
import type { RawCandidate } from '../../schemas/startup.js';
import { ensureScheme } from '../http.js';

// ============================================================================
// API Schemas
// ============================================================================

const YCLocationSchema = z.object({
  city: z.string().nullish(),
  country: z.string().nullish(),
});

/**
 * One company in the API's `companies` array. Unknown fields pass through.
 */
export const YCCompanySchema = z
  .object({
    name: z.string().min(1),
    website: z.string().nullish(),
    url: z.string().nullish(),
    description: z.string().nullish(),
    one_liner: z.string().nullish(),
    batch: z.string().nullish(),
    locations: z.array(YCLocationSchema).nullish(),
    industries: z.array(z.string()).nullish(),
    team_size: z.union([z.number(), z.string()]).nullish(),
  })
  .passthrough();

export type YCCompany = z.infer<typeof YCCompanySchema>;

/**
 * Page envelope. Items stay unknown so one bad company never fails the page.
 */
export const YCPageSchema = z.object({
  companies: z.array(z.unknown()).default([]),
});

// ============================================================================
// Mapping
// ============================================================================

/**
 * True when any listed location names India as country or city.
 */
export function isIndianCompany(company: YCCompany): boolean {
  return (company.locations ?? []).some((location) => {
    const country = (location.country ?? '').toLowerCase();
    const city = (location.city ?? '').toLowerCase();
    return country.includes('india') || city.includes('india');
  });
}

/**
 * Join location pairs as "city, country", skipping empty parts.
 */
export function formatLocations(company: YCCompany): string {
  return (company.locations ?? [])
    .map((location) => [location.city, location.country].filter(Boolean).join(', '))
    .filter((text) => text.length > 0)
    .join(', ');
}

/**
 * Summer batches ("S21") are treated as seed, everything else as series A.
 */
export function inferFundingStage(batch: string | null | undefined): string {
  if (!batch) {
    return '';
  }
  return batch.includes('S') ? 'seed' : 'series_a';
}

/**
 * Map a YC company to a raw candidate.
 */
export function mapCompanyToCandidate(company: YCCompany): RawCandidate {
  return {
    name: company.name,
    source: `yc_${company.batch || 'unknown'}`,
    website: ensureScheme(company.website || company.url || ''),
    description: company.description || company.one_liner || '',
    location: formatLocations(company),
    industry: (company.industries ?? []).join(', '),
    fundingStage: inferFundingStage(company.batch),
    employeeCount: company.team_size == null ? '' : String(company.team_size),
    confidence: 'high',
  };
}

/**
 * Parse one page of API items, keeping well-formed Indian companies.
 *
 * @returns Candidates plus the number of malformed items skipped
 */
export function parseCompanyPage(items: unknown[]): { candidates: RawCandidate[]; malformed: number } {
  const candidates: RawCandidate[] = [];
  let malformed = 0;

  for (const item of items) {
    const parsed = YCCompanySchema.safeParse(item);
    if (!parsed.success) {
      malformed++;
      continue;
    }
    if (isIndianCompany(parsed.data)) {
      candidates.push(mapCompanyToCandidate(parsed.data));
    }
  }

  return { candidates, malformed };
}
