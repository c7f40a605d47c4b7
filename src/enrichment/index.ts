/**
 * Enrichment Module
 *
 * @module enrichment
 */

export {
  SECTOR_RULES,
  SectorTableSchema,
  detectSector,
  formatSectorLabel,
  applySector,
  type SectorRule,
} from './sectors.js';

export {
  DEFAULT_FETCH_TIMEOUT_MS,
  extractPageText,
  fetchWebsiteText,
  type WebsiteFetcher,
} from './website.js';

export {
  GOVERNMENT_DOMAINS,
  MIN_DESCRIPTION_LENGTH,
  isGovernmentWebsite,
  scoreConfidence,
  tierForScore,
  assessConfidence,
  type ConfidenceInput,
} from './confidence.js';

export {
  enrichStartups,
  enrichFromWebsite,
  tagSector,
  MAX_WEBSITE_DESCRIPTION_LENGTH,
  type EnrichOptions,
  type EnrichmentStats,
  type EnrichmentResult,
} from './enricher.js';
