/**
 * Run ID Generation
 *
 * @module pipeline/run-id
 */

/** Run IDs look like `20260301-093000` */
export const RUN_ID_PATTERN = /^\d{8}-\d{6}$/;

/**
 * Format a date as a UTC run ID: YYYYMMDD-HHMMSS.
 *
 * @example
 * ```typescript
 * generateRunId(new Date('2026-03-01T09:30:00Z'));
 * // Returns: '20260301-093000'
 * ```
 */
export function generateRunId(date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');

  const datePart = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const timePart = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

  return `${datePart}-${timePart}`;
}

/**
 * Check whether a string is a well-formed run ID.
 */
export function isValidRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}
