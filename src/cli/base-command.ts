/**
 * Command Context
 *
 * The global flags resolved once per invocation, with the console output
 * every command shares. `createLogger()` hands the same output to library
 * code.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { getDataDir } from '../storage/paths.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Options and Exit Codes
// ============================================================================

/**
 * Options declared on the root program.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** false after --no-color */
  color?: boolean;
  dataDir?: string;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  /** The run failed */
  ERROR: 1,
  /** Bad flags, values or collector IDs */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Option key the preAction hook stores the context under */
export const BASE_COMMAND_KEY = '_baseCommand';

// ============================================================================
// BaseCommand
// ============================================================================

/**
 * @example
 * ```typescript
 * const base = getBaseCommand(cmd.parent ?? cmd);
 * const run = await runDiscovery({ dataDir: base.dataDir, logger: base.createLogger() });
 * base.success(`Discovered ${run.results?.metadata.totalCount ?? 0} startups`);
 * ```
 */
export class BaseCommand {
  readonly dataDir: string;

  private readonly verbose: boolean;
  private readonly quiet: boolean;
  /** No colour and ASCII markers: --no-color or not a terminal */
  private readonly plain: boolean;

  constructor(options: GlobalOptions) {
    this.verbose = options.verbose === true;
    this.quiet = options.quiet === true;
    this.plain = options.color === false || process.stdout.isTTY !== true;
    this.dataDir = getDataDir(options.dataDir);

    if (this.plain) {
      chalk.level = 0;
    }
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  /** --verbose only */
  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /** Hidden by --quiet */
  info(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /** Prints only; the caller picks the exit code */
  logError(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * For flag problems found before any command has run.
   */
  usageError(message: string): never {
    this.logError(message);
    process.exit(EXIT_CODES.USAGE_ERROR);
  }

  /** Hidden by --quiet */
  success(message: string): void {
    if (!this.quiet) {
      console.log(chalk.green(`${this.plain ? '[OK]' : '✔'} ${message}`));
    }
  }

  fail(message: string): void {
    console.log(chalk.red(`${this.plain ? '[FAIL]' : '✘'} ${message}`));
  }

  blank(): void {
    if (!this.quiet) {
      console.log();
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Logger for runDiscovery and the collectors. Its `error` never exits.
   */
  createLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => this.logError(message, ...args),
    };
  }
}

/**
 * The context stored by the program's preAction hook, or a default one when
 * a command runs without it.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const stored = cmd.opts()[BASE_COMMAND_KEY];
  return stored instanceof BaseCommand ? stored : new BaseCommand({});
}
