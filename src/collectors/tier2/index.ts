/**
 * Tier-2 City Collector
 *
 * @module collectors/tier2
 */

export { Tier2Collector, PER_CITY_LIMIT } from './collector.js';
export {
  TIER2_ECOSYSTEMS,
  EcosystemTableSchema,
  tier2Source,
  parseMemberJson,
  parseMemberCards,
  type CityEcosystem,
} from './parser.js';
