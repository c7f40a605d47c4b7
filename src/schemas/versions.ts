/**
 * Schema Version Registry
 *
 * All persisted schemas include a schemaVersion field.
 * Each schema type has an independent version number (simple integers).
 */

/**
 * Current schema versions for all persisted data types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Final discovery output */
  discoveryResults: 1,
  /** Pipeline stage checkpoints */
  stage: 1,
  /** Run configuration */
  runConfig: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

