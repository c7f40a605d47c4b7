/**
 * Stage Tests
 *
 * @module stages/stages.test
 */

import { describe, it, expect } from '@jest/globals';
import * as path from 'node:path';
import { buildCollectorPlan, buildDiscoveryResults, resolveResultsPath, rankStage, dedupeStage } from './index.js';
import type { StageContext } from '../pipeline/types.js';
import type { RunConfig } from '../schemas/run-config.js';
import type { StartupRecord } from '../schemas/startup.js';
import type { CollectorSummary } from '../schemas/discovery-results.js';
import { CollectorRegistry } from '../collectors/registry.js';
import { LastResortCollector } from '../collectors/last-resort/index.js';
import { normalizeStartup } from '../normalize/record.js';

// ============================================================================
// Test Helpers
// ============================================================================

function makeRecord(
  name: string,
  source: string,
  confidenceTier: StartupRecord['confidenceTier'] = 'medium'
): StartupRecord {
  const record = normalizeStartup({
    name,
    source,
    website: `https://${name.toLowerCase()}.example`,
    description: 'Logistics platform for small businesses',
  });
  if (!record) {
    throw new Error(`Fixture ${name} failed validation`);
  }
  return { ...record, confidenceTier };
}

function createContext(overrides: Partial<RunConfig> = {}): StageContext {
  const registry = new CollectorRegistry();
  registry.register(new LastResortCollector([]));
  registry.register({
    id: 'yc',
    name: 'Y Combinator India',
    async collect() {
      return [];
    },
  });

  return {
    runId: '20260301-093000',
    config: {
      schemaVersion: 1,
      runId: '20260301-093000',
      startedAt: '2026-03-01T09:30:00.000Z',
      targetCount: 2,
      concurrency: 4,
      collectorTimeoutMs: 60000,
      httpTimeoutMs: 15000,
      fetchTimeoutMs: 5000,
      websiteFetch: false,
      sources: [],
      saveCheckpoints: false,
      ...overrides,
    },
    dataDir: '/data',
    registry,
  };
}

const okSummary: CollectorSummary = {
  collectorId: 'yc',
  name: 'Y Combinator India',
  status: 'ok',
  recordCount: 3,
  rejectedCount: 0,
  durationMs: 12,
};

// ============================================================================
// Collect
// ============================================================================

describe('buildCollectorPlan', () => {
  it('plans every registered collector when no sources are set', () => {
    const plan = buildCollectorPlan(createContext());

    expect(plan.collectors).toEqual([{ collectorId: 'last-resort' }, { collectorId: 'yc' }]);
  });

  it('plans only the configured sources, in order', () => {
    const plan = buildCollectorPlan(createContext({ sources: ['yc', 'inc42'] }));

    expect(plan.collectors).toEqual([{ collectorId: 'yc' }, { collectorId: 'inc42' }]);
  });
});

// ============================================================================
// Dedupe and Rank
// ============================================================================

describe('dedupeStage', () => {
  it('collapses duplicates and carries collector summaries forward', async () => {
    const result = await dedupeStage.run(createContext(), {
      records: [makeRecord('Shiprocket', 'yc_W21'), makeRecord('Shiprocket', 'dpiit_api')],
      collectors: [okSummary],
    });

    expect(result.data.records).toHaveLength(1);
    expect(result.data.records[0].source).toBe('yc_W21');
    expect(result.data.stats.identityDuplicates).toBe(1);
    expect(result.data.collectors).toEqual([okSummary]);
    expect(result.details).toMatchObject({ inputCount: 2, outputCount: 1, identityDuplicates: 1 });
  });
});

describe('rankStage', () => {
  it('keeps the top N by tier', async () => {
    const records = [
      makeRecord('Lowco', 'a', 'low'),
      makeRecord('Highco', 'b', 'high'),
      makeRecord('Midco', 'c', 'medium'),
    ];

    const result = await rankStage.run(createContext({ targetCount: 2 }), {
      records,
      collectors: [],
      stats: {
        sectorTagged: 0,
        websiteEnriched: 0,
        websiteFailures: 0,
        tiers: { high: 1, medium: 1, low: 1 },
      },
    });

    expect(result.data.records.map((r) => r.name)).toEqual(['Highco', 'Midco']);
    expect(result.data.stats).toEqual({
      inputCount: 3,
      outputCount: 2,
      targetCount: 2,
      tiers: { high: 1, medium: 1, low: 0 },
    });
    expect(result.details).toEqual({ inputCount: 3, outputCount: 2, targetCount: 2 });
  });
});

// ============================================================================
// Results
// ============================================================================

describe('buildDiscoveryResults', () => {
  it('builds metadata from the records', () => {
    const results = buildDiscoveryResults(
      [
        makeRecord('Shiprocket', 'yc_W21', 'high'),
        makeRecord('Delhivery', 'dpiit_api', 'medium'),
        makeRecord('Porter', 'yc_W21', 'high'),
      ],
      [okSummary],
      { runId: '20260301-093000', targetCount: 50, generatedAt: '2026-03-01T09:31:00.000Z' }
    );

    expect(results.metadata).toEqual({
      schemaVersion: 1,
      runId: '20260301-093000',
      generatedAt: '2026-03-01T09:31:00.000Z',
      totalCount: 3,
      targetCount: 50,
      sourcesUsed: ['dpiit_api', 'yc_W21'],
      highConfidence: 2,
      mediumConfidence: 1,
      lowConfidence: 0,
      collectors: [okSummary],
    });
    expect(results.startups.map((s) => s.name)).toEqual(['Shiprocket', 'Delhivery', 'Porter']);
  });

  it('handles an empty run', () => {
    const results = buildDiscoveryResults([], [], { runId: '20260301-093000', targetCount: 50 });

    expect(results.metadata.totalCount).toBe(0);
    expect(results.metadata.sourcesUsed).toEqual([]);
    expect(results.startups).toEqual([]);
  });

  it('rejects a record that breaks the schema', () => {
    const broken = { ...makeRecord('Porter', 'yc_W21'), identity: 'not-hex' };

    expect(() =>
      buildDiscoveryResults([broken], [], { runId: '20260301-093000', targetCount: 50 })
    ).toThrow();
  });
});

describe('resolveResultsPath', () => {
  it('defaults to the run directory', () => {
    expect(resolveResultsPath(createContext())).toBe(
      path.join('/data', 'runs', '20260301-093000', 'startup_discovery.json')
    );
  });

  it('uses the configured output path', () => {
    expect(resolveResultsPath(createContext({ outputPath: '/tmp/out.json' }))).toBe('/tmp/out.json');
  });
});
