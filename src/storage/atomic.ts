/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Narrow an unknown error to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Write JSON atomically: pretty-printed UTF-8 to a temp file, then rename.
 *
 * Parent directories are created. A reader never sees a half-written file.
 *
 * @throws Error `Atomic write failed for <path>: <message>` with the original error as cause
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/data/runs/20260301-093000/startup_discovery.json', results);
 * ```
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Read and parse a JSON file
 *
 * @returns Parsed JSON data, not yet validated
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Check if a file exists (not a directory)
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
