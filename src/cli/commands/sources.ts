/**
 * Sources Command
 *
 * Lists the registered collectors.
 *
 * @module cli/commands/sources
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { CollectorRegistry, createDefaultRegistry } from '../../collectors/registry.js';

/**
 * One row of the sources table.
 */
export interface SourceRow {
  id: string;
  name: string;
  defaultLimit: number | null;
}

/**
 * Describe every registered collector, sorted by ID.
 */
export function describeSources(registry: CollectorRegistry): SourceRow[] {
  return registry.getAvailableCollectors().flatMap((id) => {
    const collector = registry.get(id);
    if (!collector) {
      return [];
    }
    return [{ id, name: collector.name, defaultLimit: collector.defaultLimit ?? null }];
  });
}

/**
 * Format the sources table.
 *
 * @example
 * ```
 * ID            NAME                          LIMIT
 * dpiit         Startup India (DPIIT)         50
 * ```
 */
export function formatSourcesTable(rows: SourceRow[]): string {
  const lines = [chalk.bold(`${'ID'.padEnd(14)}${'NAME'.padEnd(30)}LIMIT`)];
  for (const row of rows) {
    const limit = row.defaultLimit === null ? '-' : String(row.defaultLimit);
    lines.push(`${row.id.padEnd(14)}${row.name.padEnd(30)}${limit}`);
  }
  return lines.join('\n');
}

/**
 * Print the sources table, or JSON with --json.
 */
export function handleSources(
  options: { json?: boolean },
  base: BaseCommand,
  registry: CollectorRegistry = createDefaultRegistry()
): void {
  const rows = describeSources(registry);
  if (options.json) {
    base.json(rows);
    return;
  }
  console.log(formatSourcesTable(rows));
}

/**
 * Register the sources command.
 */
export function registerSourcesCommand(program: Command): void {
  program
    .command('sources')
    .description('List the available collectors')
    .option('--json', 'Print as JSON')
    .action((options: { json?: boolean }, cmd: Command) => {
      handleSources(options, getBaseCommand(cmd.parent ?? cmd));
    });
}
