/**
 * Inc42 Collectors
 *
 * @module collectors/inc42
 */

export {
  Inc42Collector,
  INC42_BASE_URL,
  INC42_FUNDING_URL,
  type Inc42CollectorOptions,
} from './collector.js';
export {
  extractCompanyName,
  parseFundingHeadlines,
  findExternalWebsite,
  MAX_ARTICLES,
  type FundingHeadline,
} from './headlines.js';
export {
  Inc42ListingsCollector,
  INC42_LISTING_PAGES,
  type Inc42ListingsCollectorOptions,
} from './listings.js';
export {
  findArticleLinks,
  extractFeatureCompany,
  articleSource,
  parseFeatureArticle,
  ARTICLE_SECTOR_RULES,
  MAX_ARTICLES_PER_PAGE,
} from './articles.js';
