/**
 * Last-Resort Collector
 *
 * @module collectors/last-resort
 */

export {
  LastResortCollector,
  LastResortDatasetSchema,
  LAST_RESORT_STARTUPS,
  type LastResortEntry,
} from './collector.js';
