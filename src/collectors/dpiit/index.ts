/**
 * Startup India (DPIIT) Collector
 *
 * @module collectors/dpiit
 */

export { DPIITCollector, DPIIT_API_URL, DPIIT_PAGE_SIZE } from './collector.js';
export {
  DPIIT_BASE_URL,
  DPIITItemSchema,
  extractSearchResults,
  formatLocation,
  mapSearchItem,
  resolveCardLink,
  parseDirectoryCards,
  type DPIITItem,
} from './parser.js';
