/**
 * Unit Tests for the Zod Schemas
 *
 * Tests each schema with valid and invalid data.
 */

import { describe, it, expect } from '@jest/globals';

import {
  SCHEMA_VERSIONS,
  ISO8601TimestampSchema,
  ConfidenceTierSchema,
  CONFIDENCE_TIERS,
  IdentitySchema,
  RawCandidateSchema,
  StartupRecordSchema,
  isValidStartupRecord,
  StageIdSchema,
  StageMetadataSchema,
  createStageMetadata,
  STAGE_SEQUENCE,
  stageIdOf,
  stageNumberOf,
  upstreamOf,
  RunConfigSchema,
  CollectorSummarySchema,
  DiscoveryResultsSchema,
  type StartupRecord,
} from './index.js';

// ============================================================================
// Fixtures
// ============================================================================

function validRecord(): StartupRecord {
  return {
    identity: 'a1b2c3d4e5f60718',
    name: 'Razorpay',
    source: 'yc_W24',
    website: 'https://razorpay.com',
    description: 'Payments platform',
    location: 'Bengaluru',
    industry: 'Fintech',
    fundingStage: 'Series A',
    employeeCount: '',
    discoveredAt: '2026-03-01T09:30:00.000Z',
    confidenceTier: 'high',
    isValidCompany: true,
    validationReason: 'passed_validation',
  };
}

// ============================================================================
// Common Types
// ============================================================================

describe('Common Types', () => {
  describe('ISO8601TimestampSchema', () => {
    it('accepts valid ISO8601 timestamp', () => {
      expect(ISO8601TimestampSchema.safeParse('2026-03-01T09:30:00.000Z').success).toBe(true);
    });

    it('rejects invalid format', () => {
      expect(ISO8601TimestampSchema.safeParse('01/03/2026').success).toBe(false);
    });
  });

  describe('ConfidenceTierSchema', () => {
    it('lists tiers best first', () => {
      expect(CONFIDENCE_TIERS).toEqual(['high', 'medium', 'low']);
    });

    it('rejects unknown tiers', () => {
      expect(ConfidenceTierSchema.safeParse('certain').success).toBe(false);
    });
  });

  describe('IdentitySchema', () => {
    it('accepts 16 lowercase hex characters', () => {
      expect(IdentitySchema.safeParse('0123456789abcdef').success).toBe(true);
    });

    it.each(['0123456789ABCDEF', '0123456789abcde', '0123456789abcdefg'])('rejects %p', (value) => {
      expect(IdentitySchema.safeParse(value).success).toBe(false);
    });
  });
});

// ============================================================================
// Startup Records
// ============================================================================

describe('Startup Schemas', () => {
  it('accepts a raw candidate with only name and source', () => {
    const result = RawCandidateSchema.safeParse({ name: 'Zerodha', source: 'dpiit_api' });

    expect(result.success).toBe(true);
  });

  it('rejects a raw candidate with a bad confidence hint', () => {
    const result = RawCandidateSchema.safeParse({ name: 'Zerodha', source: 'x', confidence: 'sure' });

    expect(result.success).toBe(false);
  });

  it('accepts a complete record', () => {
    expect(StartupRecordSchema.safeParse(validRecord()).success).toBe(true);
  });

  it('requires every text field', () => {
    const { location: _location, ...rest } = validRecord();

    expect(StartupRecordSchema.safeParse(rest).success).toBe(false);
  });

  it('rejects an empty name', () => {
    expect(StartupRecordSchema.safeParse({ ...validRecord(), name: '' }).success).toBe(false);
  });

  it('rejects an unknown validation reason', () => {
    const result = StartupRecordSchema.safeParse({ ...validRecord(), validationReason: 'looks_fine' });

    expect(result.success).toBe(false);
  });

  it('guards on validity', () => {
    expect(isValidStartupRecord(validRecord())).toBe(true);
    expect(isValidStartupRecord({ ...validRecord(), isValidCompany: false })).toBe(false);
    expect(isValidStartupRecord({ name: 'Razorpay' })).toBe(false);
  });
});

// ============================================================================
// Stage Metadata
// ============================================================================

describe('Stage Schemas', () => {
  it('validates stage IDs', () => {
    expect(StageIdSchema.safeParse('02_dedupe').success).toBe(true);
    expect(StageIdSchema.safeParse('2_dedupe').success).toBe(false);
    expect(StageIdSchema.safeParse('02-dedupe').success).toBe(false);
  });

  it('derives number, ID and upstream from the stage name', () => {
    expect(STAGE_SEQUENCE.map(stageIdOf)).toEqual([
      '01_collect',
      '02_dedupe',
      '03_enrich',
      '04_rank',
      '05_results',
    ]);
    expect(stageNumberOf('rank')).toBe(4);
    expect(upstreamOf('rank')).toBe('enrich');
    expect(upstreamOf('collect')).toBeUndefined();
  });

  it('creates a header for a finished stage', () => {
    const meta = createStageMetadata('rank', '20260301-093000', { targetCount: 50 });

    expect(meta).toMatchObject({
      stageId: '04_rank',
      stageNumber: 4,
      stageName: 'rank',
      schemaVersion: SCHEMA_VERSIONS.stage,
      runId: '20260301-093000',
      upstreamStage: '03_enrich',
      details: { targetCount: 50 },
    });
    expect(StageMetadataSchema.safeParse(meta).success).toBe(true);
  });

  it('leaves upstream and details off the first stage header when absent', () => {
    const meta = createStageMetadata('collect', '20260301-093000');

    expect(meta).not.toHaveProperty('upstreamStage');
    expect(meta).not.toHaveProperty('details');
  });

  it('rejects unknown stage names', () => {
    const meta = { ...createStageMetadata('results', 'r'), stageName: 'export' };

    expect(StageMetadataSchema.safeParse(meta).success).toBe(false);
  });

  it('rejects an ID that disagrees with the name', () => {
    const meta = { ...createStageMetadata('dedupe', 'r'), stageId: '03_dedupe' };

    expect(StageMetadataSchema.safeParse(meta).success).toBe(false);
  });
});

// ============================================================================
// Run Config
// ============================================================================

describe('RunConfigSchema', () => {
  const input = {
    runId: '20260301-093000',
    startedAt: '2026-03-01T09:30:00.000Z',
    targetCount: 50,
    concurrency: 4,
    collectorTimeoutMs: 60000,
    httpTimeoutMs: 15000,
    fetchTimeoutMs: 5000,
    websiteFetch: true,
    sources: [],
    saveCheckpoints: false,
  };

  it('fills in the schema version', () => {
    expect(RunConfigSchema.parse(input).schemaVersion).toBe(SCHEMA_VERSIONS.runConfig);
  });

  it('rejects a zero target', () => {
    expect(RunConfigSchema.safeParse({ ...input, targetCount: 0 }).success).toBe(false);
  });

  it('rejects empty source IDs', () => {
    expect(RunConfigSchema.safeParse({ ...input, sources: [''] }).success).toBe(false);
  });
});

// ============================================================================
// Discovery Results
// ============================================================================

describe('Discovery Results Schemas', () => {
  it('accepts each collector status', () => {
    for (const status of ['ok', 'error', 'timeout', 'missing']) {
      const result = CollectorSummarySchema.safeParse({
        collectorId: 'yc',
        name: 'Y Combinator India',
        status,
        recordCount: 0,
        rejectedCount: 0,
        durationMs: 10,
      });
      expect(result.success).toBe(true);
    }
  });

  it('rejects negative counts', () => {
    const result = CollectorSummarySchema.safeParse({
      collectorId: 'yc',
      name: 'Y Combinator India',
      status: 'ok',
      recordCount: -1,
      rejectedCount: 0,
      durationMs: 10,
    });

    expect(result.success).toBe(false);
  });

  it('accepts a complete results document', () => {
    const result = DiscoveryResultsSchema.safeParse({
      metadata: {
        schemaVersion: SCHEMA_VERSIONS.discoveryResults,
        runId: '20260301-093000',
        generatedAt: '2026-03-01T09:31:00.000Z',
        totalCount: 1,
        targetCount: 50,
        sourcesUsed: ['yc_W24'],
        highConfidence: 1,
        mediumConfidence: 0,
        lowConfidence: 0,
        collectors: [],
      },
      startups: [validRecord()],
    });

    expect(result.success).toBe(true);
  });
});
