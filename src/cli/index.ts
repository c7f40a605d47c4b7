#!/usr/bin/env node
/**
 * Startup Discovery CLI
 *
 * Main entry point for the startup-discovery tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   startup-discovery --help
 *   startup-discovery discover -n 25 --sources yc,dpiit
 *   startup-discovery sources
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, BASE_COMMAND_KEY, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('startup-discovery')
    .description('Discover, validate, deduplicate and rank startup records from public sources')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.startup-discovery)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue(BASE_COMMAND_KEY, baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.usageError('Cannot use both --verbose and --quiet flags');
    }
  });

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  // Subcommands inherit the exit override, so register them after it
  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
