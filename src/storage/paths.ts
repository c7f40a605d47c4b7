/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for run output.
 *
 * Directory Structure:
 * ```
 * ~/.startup-discovery/                       # Default data directory
 * ├── latest.json                             # Copy of the most recent results
 * └── runs/
 *     └── <run_id>/                           # e.g., 20260301-093000
 *         ├── startup_discovery.json          # Final results
 *         └── XX_stage_name.json              # Stage checkpoints (--checkpoints)
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** File name of the final results inside a run directory */
export const RESULTS_FILE_NAME = 'startup_discovery.json';

/** File name of the latest-results copy in the data directory */
export const LATEST_FILE_NAME = 'latest.json';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * @throws {Error} If the ID contains `..`, `/` or `\`
 */
function validateIdSecurity(id: string, idName: string): void {
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory.
 *
 * Resolution order: explicit override, `DISCOVERY_DATA_DIR`, then
 * `~/.startup-discovery`. A leading `~` expands to the home directory and
 * relative paths resolve against the working directory.
 *
 * @example
 * ```typescript
 * process.env.DISCOVERY_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * getDataDir('~/runs'); // '/Users/username/runs'
 * ```
 */
export function getDataDir(override?: string): string {
  const configured = override || process.env.DISCOVERY_DATA_DIR;

  if (configured) {
    if (configured.startsWith('~')) {
      return path.join(os.homedir(), configured.slice(1));
    }
    return path.resolve(configured);
  }

  return path.join(os.homedir(), '.startup-discovery');
}

/**
 * Gets the runs root directory.
 */
export function getRunsDir(dataDir: string): string {
  return path.join(dataDir, 'runs');
}

/**
 * Gets the directory for one run.
 *
 * @throws {Error} If runId is empty or contains path separators
 */
export function getRunDir(dataDir: string, runId: string): string {
  if (!runId || runId.trim() === '') {
    throw new Error('runId is required');
  }
  validateIdSecurity(runId, 'runId');

  return path.join(getRunsDir(dataDir), runId);
}

/**
 * Gets the checkpoint path for a stage.
 *
 * @param runDir - Run directory from getRunDir
 * @param stageId - Stage ID, e.g. "02_dedupe"
 * @throws {Error} If stageId is empty or contains path separators
 */
export function getStageFilePath(runDir: string, stageId: string): string {
  if (!stageId || stageId.trim() === '') {
    throw new Error('stageId is required');
  }
  validateIdSecurity(stageId, 'stageId');

  return path.join(runDir, `${stageId}.json`);
}

/**
 * Gets the final results path for a run.
 */
export function getResultsPath(dataDir: string, runId: string): string {
  return path.join(getRunDir(dataDir, runId), RESULTS_FILE_NAME);
}

/**
 * Gets the latest-results path.
 */
export function getLatestResultsPath(dataDir: string): string {
  return path.join(dataDir, LATEST_FILE_NAME);
}
