/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export { StageProgress, formatDuration } from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatCollectorStatus,
  formatSourceBreakdown,
  countBySource,
  formatStageFailure,
  formatTimingBreakdown,
  type RunSummary,
} from './run-summary.js';
