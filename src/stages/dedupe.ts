/**
 * Dedupe Stage (Stage 02)
 *
 * @module stages/dedupe
 */

import type { Stage, StageContext, StageOutcome } from '../pipeline/types.js';
import { deduplicate } from '../dedupe/index.js';
import type { CollectStageOutput, DedupeStageOutput } from './types.js';

export const dedupeStage: Stage<CollectStageOutput, DedupeStageOutput> = {
  name: 'dedupe',

  async run(context: StageContext, input: CollectStageOutput): Promise<StageOutcome<DedupeStageOutput>> {
    const { records, stats } = deduplicate(input.records);

    context.logger?.info(
      `[dedupe] ${stats.inputCount} → ${stats.outputCount} records ` +
        `(${stats.identityDuplicates} identity, ${stats.nameDuplicates} name variants removed)`
    );

    return {
      data: { records, collectors: input.collectors, stats },
      details: { ...stats },
    };
  },
};

export default dedupeStage;
