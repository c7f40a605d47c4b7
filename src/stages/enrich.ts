/**
 * Enrich Stage (Stage 03)
 *
 * Sector tagging, optional homepage descriptions and confidence re-scoring.
 * Homepage fetches use the context's fetcher when one is injected.
 *
 * @module stages/enrich
 */

import type { Stage, StageContext, StageOutcome } from '../pipeline/types.js';
import { enrichStartups } from '../enrichment/index.js';
import type { DedupeStageOutput, EnrichStageOutput } from './types.js';

export const enrichStage: Stage<DedupeStageOutput, EnrichStageOutput> = {
  name: 'enrich',

  async run(context: StageContext, input: DedupeStageOutput): Promise<StageOutcome<EnrichStageOutput>> {
    const { records, stats } = await enrichStartups(input.records, {
      websiteFetch: context.config.websiteFetch,
      fetcher: context.websiteFetcher,
      fetchTimeoutMs: context.config.fetchTimeoutMs,
      logger: context.logger,
    });

    context.logger?.info(
      `[enrich] ${stats.sectorTagged} sector-tagged, ${stats.websiteEnriched} from homepages ` +
        `(${stats.websiteFailures} fetches failed)`
    );
    context.logger?.debug(
      `  Tiers: high ${stats.tiers.high}, medium ${stats.tiers.medium}, low ${stats.tiers.low}`
    );

    return {
      data: { records, collectors: input.collectors, stats },
      details: {
        websiteFetch: context.config.websiteFetch,
        sectorTagged: stats.sectorTagged,
        websiteEnriched: stats.websiteEnriched,
        websiteFailures: stats.websiteFailures,
      },
    };
  },
};

export default enrichStage;
