/**
 * Pipeline Executor
 *
 * Runs collect → dedupe → enrich → rank → results, feeding each stage the
 * previous stage's data. The first stage error ends the run and is reported
 * in the result, not thrown.
 *
 * @module pipeline/executor
 */

import type { CompletedStage, Stage, StageContext, StageEvents } from './types.js';
import { writeCheckpoint } from './checkpoint.js';
import { STAGE_SEQUENCE, createStageMetadata, stageIdOf } from '../schemas/stage.js';
import { getRunDir } from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

export interface StageFailure {
  stageId: string;
  message: string;
}

/**
 * Outcome of one pipeline run.
 */
export interface PipelineResult {
  success: boolean;
  /** Stage IDs that finished, in order */
  completed: string[];
  /** Data of the last finished stage; null when none finished */
  output: unknown;
  /** Checkpoint paths by stage ID; empty unless checkpoints are enabled */
  checkpoints: Record<string, string>;
  startedAt: string;
  durationMs: number;
  /** Milliseconds per stage ID, the failed stage included */
  stageDurations: Record<string, number>;
  failure: StageFailure | null;
}

// ============================================================================
// Executor
// ============================================================================

/**
 * @example
 * ```typescript
 * const executor = new PipelineExecutor(ALL_STAGES, { stageFailed: (name, err) => log(name, err) });
 * const result = await executor.run(context);
 * ```
 */
export class PipelineExecutor {
  private readonly stages: readonly Stage[];

  /**
   * @throws Error unless `stages` are exactly the five stages in run order
   */
  constructor(stages: readonly Stage[], private readonly events: StageEvents = {}) {
    const given = stages.map((stage) => stage.name).join(' → ');
    const expected = STAGE_SEQUENCE.join(' → ');
    if (given !== expected) {
      throw new Error(`Pipeline needs stages ${expected}, got ${given || 'none'}`);
    }
    this.stages = stages;
  }

  async run(context: StageContext): Promise<PipelineResult> {
    const startTime = Date.now();
    const result: PipelineResult = {
      success: true,
      completed: [],
      output: null,
      checkpoints: {},
      startedAt: new Date(startTime).toISOString(),
      durationMs: 0,
      stageDurations: {},
      failure: null,
    };

    let input: unknown = null;

    for (const stage of this.stages) {
      const stageId = stageIdOf(stage.name);
      const stageStart = Date.now();
      this.events.stageStarted?.(stage.name);

      try {
        const completed = await this.runStage(stage, context, input);

        result.stageDurations[stageId] = completed.durationMs;
        result.completed.push(stageId);
        if (completed.checkpointPath !== undefined) {
          result.checkpoints[stageId] = completed.checkpointPath;
        }
        input = completed.data;
        result.output = completed.data;

        this.events.stageFinished?.(stage.name, completed);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        result.stageDurations[stageId] = Date.now() - stageStart;
        result.success = false;
        result.failure = { stageId, message: err.message };

        this.events.stageFailed?.(stage.name, err);
        break;
      }
    }

    result.durationMs = Date.now() - startTime;
    return result;
  }

  /**
   * Run one stage, stamp its header and write its checkpoint when enabled.
   * A failed checkpoint write fails the stage.
   */
  private async runStage(stage: Stage, context: StageContext, input: unknown): Promise<CompletedStage> {
    const stageStart = Date.now();
    const { data, details } = await stage.run(context, input);
    const metadata = createStageMetadata(stage.name, context.runId, details);

    const completed: CompletedStage = { data, metadata, durationMs: Date.now() - stageStart };

    if (context.config.saveCheckpoints) {
      const runDir = getRunDir(context.dataDir, context.runId);
      completed.checkpointPath = (await writeCheckpoint(runDir, metadata, data)).filePath;
    }

    return completed;
  }
}
