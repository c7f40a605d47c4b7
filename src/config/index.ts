/**
 * Configuration Module
 *
 * Loads and validates environment variables for startup discovery.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { getDataDir } from '../storage/paths.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Data directory
  DISCOVERY_DATA_DIR: z.string().optional(),

  // Run defaults
  DISCOVERY_TARGET_COUNT: positiveInt(50),
  DISCOVERY_CONCURRENCY: positiveInt(4),

  // Timeouts
  DISCOVERY_COLLECTOR_TIMEOUT_MS: positiveInt(60000),
  DISCOVERY_FETCH_TIMEOUT_MS: positiveInt(5000),
  DISCOVERY_HTTP_TIMEOUT_MS: positiveInt(15000),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  // Data directory
  dataDir: getDataDir(env.DISCOVERY_DATA_DIR),

  // Run defaults, overridable per run from the CLI
  defaults: {
    targetCount: env.DISCOVERY_TARGET_COUNT,
    concurrency: env.DISCOVERY_CONCURRENCY,
  },

  timeouts: {
    collectorMs: env.DISCOVERY_COLLECTOR_TIMEOUT_MS,
    fetchMs: env.DISCOVERY_FETCH_TIMEOUT_MS,
    httpMs: env.DISCOVERY_HTTP_TIMEOUT_MS,
  },
} as const;

// Re-export types
export type Config = typeof config;
