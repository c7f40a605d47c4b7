/**
 * Run Summary Formatters
 *
 * CLI output formatters for discovery run summaries including:
 * - Totals and per-tier counts
 * - Per-source breakdown of the kept startups
 * - Per-collector status
 * - The failed stage and the per-stage timing
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { PipelineResult, StageFailure } from '../../pipeline/executor.js';
import type { CollectorSummary, DiscoveryResults } from '../../schemas/discovery-results.js';
import type { StartupRecord } from '../../schemas/startup.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Run summary data for formatting.
 */
export interface RunSummary {
  /** Run ID */
  runId: string;
  /** Pipeline execution result */
  result: PipelineResult;
  /** Final results, when the run succeeded */
  results: DiscoveryResults | null;
  /** Where the results were written */
  resultsPath: string | null;
}

// ============================================================================
// Sections
// ============================================================================

/**
 * Count startups per source tag, most frequent first (ties by tag).
 */
export function countBySource(startups: StartupRecord[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const startup of startups) {
    counts.set(startup.source, (counts.get(startup.source) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

/**
 * Format one line per collector.
 *
 * @example
 * ```
 *   ✔ yc          Y Combinator India: 42 startups (1.2s)
 *   ✘ dpiit       Startup India (DPIIT): HTTP 503 from https://...
 *   ⏱ inc42       Inc42 Funding News: timed out after 1m 0s
 * ```
 */
export function formatCollectorStatus(collectors: CollectorSummary[]): string {
  const lines: string[] = [chalk.bold('Collectors:')];

  if (collectors.length === 0) {
    lines.push(chalk.dim('  (none run)'));
    return lines.join('\n');
  }

  for (const c of collectors) {
    const id = c.collectorId.padEnd(12);
    switch (c.status) {
      case 'ok': {
        const rejected = c.rejectedCount > 0 ? chalk.dim(`, ${c.rejectedCount} dropped`) : '';
        lines.push(
          `  ${chalk.green('✔')} ${id}${c.name}: ${c.recordCount} startups${rejected} ` +
            chalk.dim(`(${formatDuration(c.durationMs)})`)
        );
        break;
      }
      case 'timeout':
        lines.push(
          `  ${chalk.yellow('⏱')} ${id}${c.name}: timed out after ${formatDuration(c.durationMs)}`
        );
        break;
      case 'missing':
        lines.push(`  ${chalk.yellow('?')} ${id}${c.error ?? 'not registered'}`);
        break;
      case 'error':
        lines.push(`  ${chalk.red('✘')} ${id}${c.name}: ${c.error ?? 'failed'}`);
        break;
    }
  }

  return lines.join('\n');
}

/**
 * Format the per-source breakdown.
 */
export function formatSourceBreakdown(startups: StartupRecord[]): string {
  const lines: string[] = [chalk.bold('By source:')];
  const counts = countBySource(startups);

  if (counts.length === 0) {
    lines.push(chalk.dim('  (no startups)'));
  }
  for (const [source, count] of counts) {
    lines.push(`  ${source.padEnd(20)} ${count}`);
  }

  return lines.join('\n');
}

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Run:      20260301-093000
 * Pipeline: SUCCESS
 * Duration: 1m 12s
 *
 * Startups: 50 (target 50)
 *   High:   31
 *   Medium: 15
 *   Low:    4
 * ```
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];
  const { result, results } = summary;

  lines.push(chalk.bold('=== Run Complete ==='));
  lines.push(`Run:      ${chalk.cyan(summary.runId)}`);

  const status = result.success ? chalk.green('SUCCESS') : chalk.red('FAILED');
  lines.push(`Pipeline: ${status}`);
  lines.push(`Duration: ${formatDuration(result.durationMs)}`);
  lines.push('');

  if (results) {
    const meta = results.metadata;
    lines.push(`Startups: ${meta.totalCount} (target ${meta.targetCount})`);
    lines.push(`  High:   ${meta.highConfidence}`);
    lines.push(`  Medium: ${meta.mediumConfidence}`);
    lines.push(`  Low:    ${meta.lowConfidence}`);
    lines.push('');
    lines.push(formatSourceBreakdown(results.startups));
    lines.push('');
    lines.push(formatCollectorStatus(meta.collectors));
    lines.push('');
  }

  if (summary.resultsPath) {
    lines.push(`Results:  ${summary.resultsPath}`);
  }

  return lines.join('\n');
}

/**
 * Describe the stage that ended a failed run.
 *
 * @example
 * ```
 * === Failed at 05_results ===
 *   EACCES: permission denied
 * ```
 */
export function formatStageFailure(failure: StageFailure): string {
  return [chalk.bold.red(`=== Failed at ${failure.stageId} ===`), `  ${chalk.dim(failure.message)}`].join('\n');
}

/**
 * One bar per stage, scaled to the slowest stage, in run order.
 */
export function formatTimingBreakdown(
  result: Pick<PipelineResult, 'stageDurations' | 'durationMs'>
): string {
  const lines: string[] = [chalk.bold('=== Timing Breakdown ==='), ''];

  const stages = Object.entries(result.stageDurations).sort(([a], [b]) => a.localeCompare(b));
  const slowest = Math.max(...stages.map(([, ms]) => ms), 1);
  const total = Math.max(result.durationMs, 1);
  const barWidth = 30;

  for (const [stageId, ms] of stages) {
    const bar = chalk.green('█'.repeat(Math.round((ms / slowest) * barWidth)));
    const share = Math.round((ms / total) * 100);
    lines.push(`${stageId.padEnd(12)} ${bar} ${formatDuration(ms).padStart(8)} (${share}%)`);
  }

  lines.push('');
  lines.push(`${'Total'.padEnd(12)} ${formatDuration(result.durationMs)}`);

  return lines.join('\n');
}
