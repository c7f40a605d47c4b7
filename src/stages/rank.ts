/**
 * Rank Stage (Stage 04)
 *
 * Orders records by confidence tier and keeps the top N.
 *
 * @module stages/rank
 */

import type { Stage, StageContext, StageOutcome } from '../pipeline/types.js';
import { selectTop, countByTier } from '../ranking/index.js';
import type { EnrichStageOutput, RankStageOutput } from './types.js';

export const rankStage: Stage<EnrichStageOutput, RankStageOutput> = {
  name: 'rank',

  async run(context: StageContext, input: EnrichStageOutput): Promise<StageOutcome<RankStageOutput>> {
    const targetCount = context.config.targetCount;
    const records = selectTop(input.records, targetCount);
    const stats = {
      inputCount: input.records.length,
      outputCount: records.length,
      targetCount,
      tiers: countByTier(records),
    };

    context.logger?.info(
      `[rank] Selected ${stats.outputCount} of ${stats.inputCount} records (target ${targetCount})`
    );

    return {
      data: { records, collectors: input.collectors, stats },
      details: {
        inputCount: stats.inputCount,
        outputCount: stats.outputCount,
        targetCount,
      },
    };
  },
};

export default rankStage;
