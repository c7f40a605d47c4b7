/**
 * Pipeline Stages
 *
 * The five discovery stages in execution order.
 *
 * @module stages
 */

import type { Stage } from '../pipeline/types.js';
import { collectStage } from './collect.js';
import { dedupeStage } from './dedupe.js';
import { enrichStage } from './enrich.js';
import { rankStage } from './rank.js';
import { resultsStage } from './results.js';

export { collectStage, buildCollectorPlan } from './collect.js';
export { dedupeStage } from './dedupe.js';
export { enrichStage } from './enrich.js';
export { rankStage } from './rank.js';
export { resultsStage, buildDiscoveryResults, resolveResultsPath } from './results.js';

export type {
  CollectStageOutput,
  DedupeStageOutput,
  EnrichStageOutput,
  RankStageOutput,
  ResultsStageOutput,
} from './types.js';

/**
 * All stages, ordered by stage number.
 */
export const ALL_STAGES: readonly Stage[] = [
  collectStage,
  dedupeStage,
  enrichStage,
  rankStage,
  resultsStage,
];
