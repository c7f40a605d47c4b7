/**
 * Pipeline Contracts
 *
 * What a stage receives, what it hands back, and the logger library code
 * writes through.
 *
 * @module pipeline/types
 */

import type { RunConfig } from '../schemas/run-config.js';
import type { StageMetadata, StageName } from '../schemas/stage.js';
import type { CollectorRegistry } from '../collectors/registry.js';
import type { WebsiteFetcher } from '../enrichment/website.js';

// ============================================================================
// Logger
// ============================================================================

/**
 * Leveled logger injected into stages, collectors and enrichment.
 * Library code never prints on its own.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Contract
// ============================================================================

/**
 * Everything a stage may read besides its input.
 */
export interface StageContext {
  /** YYYYMMDD-HHMMSS, UTC */
  runId: string;
  config: RunConfig;
  dataDir: string;
  registry: CollectorRegistry;
  /** Replaces the default homepage fetcher */
  websiteFetcher?: WebsiteFetcher;
  logger?: Logger;
}

/**
 * What a stage returns. The executor adds the checkpoint header and timing.
 */
export interface StageOutcome<T> {
  data: T;
  /** Recorded under `_meta.details` in the checkpoint */
  details?: Record<string, unknown>;
}

/**
 * One step of a run. `input` is the previous stage's data, or null for the
 * first stage.
 *
 * `run` uses method syntax so that stages typed against their own input can
 * share one `Stage[]`.
 */
export interface Stage<TInput = unknown, TOutput = unknown> {
  readonly name: StageName;
  run(context: StageContext, input: TInput): Promise<StageOutcome<TOutput>>;
}

/**
 * A finished stage as the executor reports it.
 */
export interface CompletedStage<T = unknown> {
  data: T;
  metadata: StageMetadata;
  durationMs: number;
  /** Set when checkpoints are enabled */
  checkpointPath?: string;
}

/**
 * Progress hooks. All are optional and called synchronously.
 */
export interface StageEvents {
  stageStarted?(stage: StageName): void;
  stageFinished?(stage: StageName, completed: CompletedStage): void;
  stageFailed?(stage: StageName, error: Error): void;
}
