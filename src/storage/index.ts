/**
 * Storage Layer
 *
 * Atomic JSON persistence and path resolution for run output.
 *
 * @module storage
 */

export {
  atomicWriteJson,
  readJson,
  fileExists,
  isErrnoException,
} from './atomic.js';

export {
  RESULTS_FILE_NAME,
  LATEST_FILE_NAME,
  getDataDir,
  getRunsDir,
  getRunDir,
  getStageFilePath,
  getResultsPath,
  getLatestResultsPath,
} from './paths.js';
