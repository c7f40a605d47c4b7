/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - discover: Run the discovery pipeline
 * - sources: List registered collectors
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerDiscoverCommand } from './discover.js';
import { registerSourcesCommand } from './sources.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerDiscoverCommand(program);
  registerSourcesCommand(program);
}
