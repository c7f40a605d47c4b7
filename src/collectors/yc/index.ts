/**
 * Y Combinator Collector
 *
 * @module collectors/yc
 */

export { YCombinatorCollector, YC_API_URL, YC_PAGE_SIZE } from './collector.js';
export {
  YCCompanySchema,
  YCPageSchema,
  isIndianCompany,
  formatLocations,
  inferFundingStage,
  mapCompanyToCandidate,
  parseCompanyPage,
  type YCCompany,
} from './mapper.js';
