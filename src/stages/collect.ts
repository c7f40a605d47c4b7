/**
 * Collect Stage (Stage 01)
 *
 * Fans the run's collector plan out through the aggregator and merges the
 * valid records in completion order. Collector failures never fail this
 * stage; they show up in the collector summaries instead.
 *
 * @module stages/collect
 */

import type { Stage, StageContext, StageOutcome } from '../pipeline/types.js';
import { aggregateCollectors, summarizeCollection } from '../collectors/aggregator.js';
import type { CollectorPlan } from '../collectors/types.js';
import type { CollectStageOutput } from './types.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Build the collector plan for this run.
 *
 * An empty `sources` list means every registered collector.
 */
export function buildCollectorPlan(context: StageContext): CollectorPlan {
  const ids =
    context.config.sources.length > 0
      ? context.config.sources
      : context.registry.getAvailableCollectors();

  return {
    collectors: ids.map((collectorId) => ({ collectorId })),
  };
}

// ============================================================================
// Stage Implementation
// ============================================================================

export const collectStage: Stage<unknown, CollectStageOutput> = {
  name: 'collect',

  async run(context: StageContext): Promise<StageOutcome<CollectStageOutput>> {
    const plan = buildCollectorPlan(context);
    context.logger?.info(`[collect] Running ${plan.collectors.length} collectors`);

    const { records, summaries } = await aggregateCollectors(plan, context.registry, {
      concurrency: context.config.concurrency,
      timeoutMs: context.config.collectorTimeoutMs,
      httpTimeoutMs: context.config.httpTimeoutMs,
      logger: context.logger,
    });

    const summary = summarizeCollection(summaries);
    context.logger?.info(
      `[collect] ${summary.totalRecords} records from ${summary.successful}/${summary.total} collectors`
    );
    if (summary.failedCollectors.length > 0) {
      context.logger?.warn(`[collect] Failed collectors: ${summary.failedCollectors.join(', ')}`);
    }

    return {
      data: { records, collectors: summaries },
      details: {
        collectors: plan.collectors.map((c) => c.collectorId),
        concurrency: context.config.concurrency,
        recordCount: summary.totalRecords,
        rejectedCount: summary.totalRejected,
      },
    };
  },
};

export default collectStage;
