/**
 * Discover Command
 *
 * Runs the full discovery pipeline and prints a run summary.
 *
 * @module cli/commands/discover
 */

import { Command, InvalidArgumentError } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import {
  StageProgress,
  formatRunSummary,
  formatStageFailure,
  formatTimingBreakdown,
} from '../formatters/index.js';
import { runDiscovery } from '../../pipeline/discovery.js';
import { CollectorRegistry, createDefaultRegistry } from '../../collectors/registry.js';
import type { WebsiteFetcher } from '../../enrichment/website.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the discover command, as parsed by commander.
 */
export interface DiscoverCommandOptions {
  /** Number of startups to keep */
  target?: number;
  /** Collectors running at once */
  concurrency?: number;
  /** Collector IDs to run */
  sources?: string[];
  /** false when --no-website-fetch is given */
  websiteFetch: boolean;
  /** Write per-stage checkpoint files */
  checkpoints?: boolean;
  /** Explicit results path */
  output?: string;
}

/**
 * Collaborators the command builds by default; tests replace them.
 */
export interface DiscoverDependencies {
  registry?: CollectorRegistry;
  websiteFetcher?: WebsiteFetcher;
}

// ============================================================================
// Argument Parsers
// ============================================================================

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Commander argument parser for a comma-separated collector list.
 *
 * @example
 * parseSourceList('yc, dpiit,,inc42'); // ['yc', 'dpiit', 'inc42']
 */
export function parseSourceList(value: string): string[] {
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);

  if (ids.length === 0) {
    throw new InvalidArgumentError('Expected at least one collector ID.');
  }
  return [...new Set(ids)];
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Run discovery and report the outcome.
 *
 * @returns Exit code for the process
 */
export async function handleDiscover(
  options: DiscoverCommandOptions,
  base: BaseCommand,
  deps: DiscoverDependencies = {}
): Promise<ExitCode> {
  const registry = deps.registry ?? createDefaultRegistry();
  const sources = options.sources ?? [];

  const unknown = sources.filter((id) => !registry.has(id));
  if (unknown.length > 0) {
    base.logError(
      `Unknown source(s): ${unknown.join(', ')}. Available: ${registry.getAvailableCollectors().join(', ')}`
    );
    return EXIT_CODES.USAGE_ERROR;
  }

  base.debug(`Data directory: ${base.dataDir}`);

  const run = await runDiscovery({
    targetCount: options.target,
    concurrency: options.concurrency,
    sources,
    websiteFetch: options.websiteFetch,
    saveCheckpoints: options.checkpoints === true,
    outputPath: options.output,
    dataDir: base.dataDir,
    registry,
    websiteFetcher: deps.websiteFetcher,
    logger: base.createLogger(),
    events: base.isQuiet() ? undefined : new StageProgress(),
  });

  if (run.pipeline.failure) {
    console.error(formatStageFailure(run.pipeline.failure));
    base.fail(`Run ${run.runId} failed`);
    return EXIT_CODES.ERROR;
  }

  base.blank();
  base.info(
    formatRunSummary({
      runId: run.runId,
      result: run.pipeline,
      results: run.results,
      resultsPath: run.resultsPath,
    })
  );
  if (base.isVerbose()) {
    base.blank();
    base.info(formatTimingBreakdown(run.pipeline));
  }
  base.success(`Discovered ${run.results?.metadata.totalCount ?? 0} startups`);

  return EXIT_CODES.SUCCESS;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the discover command.
 */
export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover')
    .description('Collect, clean, rank and save startup records')
    .option('-n, --target <count>', 'Number of startups to keep', parsePositiveInt)
    .option('-c, --concurrency <n>', 'Collectors running at once', parsePositiveInt)
    .option('--sources <ids>', 'Comma-separated collector IDs (default: all)', parseSourceList)
    .option('--no-website-fetch', 'Do not fetch homepages for empty descriptions')
    .option('--checkpoints', 'Write a checkpoint file after each stage')
    .option('-o, --output <path>', 'Results file path (default: run directory)')
    .action(async (options: DiscoverCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      process.exitCode = await handleDiscover(options, base);
    });
}
