/**
 * Last-Resort Collector
 *
 * A bundled list of well-known Indian startups. It runs like any other
 * collector so a run still produces output when every remote source fails.
 *
 * @module collectors/last-resort/collector
 */

import { z } from 'zod';
import type { Collector, CollectOptions } from '../types.js';
import type { RawCandidate, StartupRecord } from '../../schemas/startup.js';
import { normalizeStartups } from '../../normalize/record.js';
import rawDataset from './data.json';

// ============================================================================
// Dataset
// ============================================================================

const LastResortEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  location: z.string(),
  website: z.string().optional(),
});

export const LastResortDatasetSchema = z.object({
  startups: z.array(LastResortEntrySchema),
});

export type LastResortEntry = z.infer<typeof LastResortEntrySchema>;

/** Parsed once at load; a malformed dataset fails fast */
export const LAST_RESORT_STARTUPS: readonly LastResortEntry[] =
  LastResortDatasetSchema.parse(rawDataset).startups;

// ============================================================================
// Collector
// ============================================================================

export class LastResortCollector implements Collector {
  readonly id = 'last-resort';
  readonly name = 'Bundled fallback list';
  readonly defaultLimit: number;

  constructor(private readonly entries: readonly LastResortEntry[] = LAST_RESORT_STARTUPS) {
    this.defaultLimit = entries.length;
  }

  async collect(options: CollectOptions): Promise<StartupRecord[]> {
    const limit = options.limit ?? this.defaultLimit;
    const candidates: RawCandidate[] = this.entries.slice(0, limit).map((entry) => ({
      name: entry.name,
      source: 'last_resort',
      website: entry.website ?? '',
      description: entry.description,
      location: entry.location,
      confidence: 'medium',
    }));
    return normalizeStartups(candidates, { logger: options.logger });
  }
}
