/**
 * Stage Progress
 *
 * Follows a run stage by stage. A terminal gets an ora spinner per stage;
 * piped output gets one plain line per event.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { CompletedStage, StageEvents } from '../../pipeline/types.js';
import { STAGE_SEQUENCE, stageNumberOf, type StageName } from '../../schemas/stage.js';

/**
 * @example
 * formatDuration(450);   // '450ms'
 * formatDuration(1500);  // '1.5s'
 * formatDuration(72000); // '1m 12s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const seconds = Math.round(ms / 1000);
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

function stageLabel(name: StageName): string {
  return `Stage ${stageNumberOf(name)}/${STAGE_SEQUENCE.length}: ${name}`;
}

/**
 * Executor events rendered to stdout.
 *
 * ```
 * [*] Stage 1/5: collect
 * [+] Stage 1/5: collect (3.2s)
 * [X] Stage 5/5: results - EACCES: permission denied
 * ```
 */
export class StageProgress implements StageEvents {
  private spinner: Ora | null = null;

  constructor(private readonly interactive: boolean = process.stdout.isTTY === true) {}

  stageStarted(name: StageName): void {
    if (this.interactive) {
      this.spinner = ora({ text: stageLabel(name), stream: process.stdout }).start();
    } else {
      console.log(`[*] ${stageLabel(name)}`);
    }
  }

  stageFinished(name: StageName, completed: Pick<CompletedStage, 'durationMs'>): void {
    const line = `${stageLabel(name)} ${chalk.dim(`(${formatDuration(completed.durationMs)})`)}`;
    if (this.spinner) {
      this.spinner.succeed(line);
      this.spinner = null;
    } else {
      console.log(`[+] ${line}`);
    }
  }

  stageFailed(name: StageName, error: Error): void {
    const line = `${stageLabel(name)} - ${chalk.red(error.message)}`;
    if (this.spinner) {
      this.spinner.fail(line);
      this.spinner = null;
    } else {
      console.log(`[X] ${line}`);
    }
  }
}
