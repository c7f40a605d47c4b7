/**
 * Tests for the Collector Framework
 *
 * - CollectorRegistry: registration and lookup
 * - ConcurrencyLimiter: bounded concurrency with FIFO hand-off
 * - Aggregator: failure isolation, timeouts and output filtering
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { CollectorRegistry, createDefaultRegistry } from './registry.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { isCollector } from './types.js';
import type { Collector, CollectOptions, CollectorPlan } from './types.js';
import {
  aggregateCollectors,
  filterValidRecords,
  summarizeCollection,
  withTimeout,
} from './aggregator.js';
import { CollectorTimeoutError } from './errors.js';
import { normalizeStartup } from '../normalize/record.js';
import type { Logger } from '../pipeline/types.js';
import type { StartupRecord } from '../schemas/startup.js';
import type { CollectorSummary } from '../schemas/discovery-results.js';

// ============================================================================
// Mock Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Build a valid record through the normalizer.
 */
function makeRecord(name: string, source: string = 'test_source'): StartupRecord {
  const record = normalizeStartup({
    name,
    source,
    website: `https://${name.toLowerCase()}.example`,
    description: 'Payments platform for small businesses',
    location: 'Bangalore, India',
  });
  if (!record) {
    throw new Error(`Fixture ${name} failed validation`);
  }
  return record;
}

/**
 * Create a fake collector for testing.
 */
function createMockCollector(
  id: string,
  options: {
    delay?: number;
    records?: StartupRecord[];
    shouldFail?: boolean;
    errorMessage?: string;
    onCollect?: (options: CollectOptions) => void;
  } = {}
): Collector {
  const { delay = 5, records = [], shouldFail = false, errorMessage = `${id} failed` } = options;

  return {
    id,
    name: `${id} source`,
    defaultLimit: 25,
    async collect(collectOptions: CollectOptions): Promise<StartupRecord[]> {
      options.onCollect?.(collectOptions);
      await sleep(delay);
      if (shouldFail) {
        throw new Error(errorMessage);
      }
      return records;
    },
  };
}

function createMockLogger() {
  return {
    debug: jest.fn<Logger['debug']>(),
    info: jest.fn<Logger['info']>(),
    warn: jest.fn<Logger['warn']>(),
    error: jest.fn<Logger['error']>(),
  };
}

function planFor(...ids: string[]): CollectorPlan {
  return { collectors: ids.map((collectorId) => ({ collectorId })) };
}

// ============================================================================
// CollectorRegistry Tests
// ============================================================================

describe('CollectorRegistry', () => {
  let registry: CollectorRegistry;

  beforeEach(() => {
    registry = new CollectorRegistry();
  });

  describe('register and get', () => {
    it('registers and retrieves a collector', () => {
      const collector = createMockCollector('alpha');
      registry.register(collector);
      expect(registry.get('alpha')).toBe(collector);
    });

    it('returns undefined for unregistered collector', () => {
      expect(registry.get('nonexistent')).toBeUndefined();
    });

    it('throws error on duplicate registration', () => {
      registry.register(createMockCollector('duplicate'));
      expect(() => registry.register(createMockCollector('duplicate'))).toThrow(
        "Collector 'duplicate' is already registered"
      );
    });

    it('rejects a factory whose ID is already taken', () => {
      registry.register(createMockCollector('taken'));
      expect(() => registry.registerFactory('taken', () => createMockCollector('taken'))).toThrow(
        "Collector 'taken' is already registered"
      );
    });
  });

  describe('registerFactory', () => {
    it('instantiates lazily and only once', () => {
      const factory = jest.fn(() => createMockCollector('lazy'));
      registry.registerFactory('lazy', factory);

      expect(factory).not.toHaveBeenCalled();
      const first = registry.get('lazy');
      const second = registry.get('lazy');

      expect(factory).toHaveBeenCalledTimes(1);
      expect(first).toBe(second);
    });

    it('throws when a factory produces a different ID', () => {
      registry.registerFactory('expected', () => createMockCollector('other'));
      expect(() => registry.get('expected')).toThrow("Factory for 'expected' produced collector 'other'");
    });
  });

  describe('getAvailableCollectors', () => {
    it('lists direct and factory registrations sorted', () => {
      registry.register(createMockCollector('zeta'));
      registry.registerFactory('alpha', () => createMockCollector('alpha'));
      registry.register(createMockCollector('mu'));

      expect(registry.getAvailableCollectors()).toEqual(['alpha', 'mu', 'zeta']);
      expect(registry.size).toBe(3);
    });
  });

  describe('unregister', () => {
    it('removes registered collector', () => {
      registry.register(createMockCollector('gone'));
      expect(registry.unregister('gone')).toBe(true);
      expect(registry.has('gone')).toBe(false);
    });

    it('returns false for nonexistent collector', () => {
      expect(registry.unregister('never')).toBe(false);
    });
  });

  describe('createDefaultRegistry', () => {
    it('registers the built-in collectors', () => {
      const defaults = createDefaultRegistry();
      expect(defaults.getAvailableCollectors()).toEqual([
        'dpiit',
        'inc42',
        'inc42-listings',
        'last-resort',
        'tier2',
        'yc',
      ]);
      expect(defaults.get('yc')?.name).toBe('Y Combinator India');
      expect(defaults.get('last-resort')?.defaultLimit).toBe(15);
    });
  });
});

// ============================================================================
// ConcurrencyLimiter Tests
// ============================================================================

describe('ConcurrencyLimiter', () => {
  it('defaults to four slots', () => {
    expect(new ConcurrencyLimiter().limit).toBe(4);
  });

  it.each([0, -1, 1.5])('rejects a limit of %p', (limit) => {
    expect(() => new ConcurrencyLimiter(limit)).toThrow(
      `Concurrency limit must be a positive integer, got ${limit}`
    );
  });

  it('never runs more than the limit at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let inFlight = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        limiter.run(async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await sleep(20);
          inFlight--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(limiter.running).toBe(0);
  });

  it('starts waiting tasks in arrival order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];
    let releaseFirst: () => void = () => {};

    const first = limiter.run(
      () =>
        new Promise<void>((resolve) => {
          order.push('first');
          releaseFirst = resolve;
        })
    );
    const waiting = ['A', 'B', 'C'].map((label) =>
      limiter.run(async () => {
        order.push(label);
      })
    );

    await sleep(5);
    expect(limiter.running).toBe(1);
    expect(limiter.queued).toBe(3);

    releaseFirst();
    await Promise.all([first, ...waiting]);

    expect(order).toEqual(['first', 'A', 'B', 'C']);
    expect(limiter.queued).toBe(0);
  });

  it('returns the task result', async () => {
    await expect(new ConcurrencyLimiter(1).run(async () => 42)).resolves.toBe(42);
  });

  it('frees the slot when the task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(
      limiter.run(async () => {
        throw new Error('test error');
      })
    ).rejects.toThrow('test error');
    expect(limiter.running).toBe(0);
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });
});

// ============================================================================
// isCollector Tests
// ============================================================================

describe('isCollector', () => {
  it('returns true for a collector', () => {
    expect(isCollector(createMockCollector('ok'))).toBe(true);
  });

  it('returns false for null and primitives', () => {
    expect(isCollector(null)).toBe(false);
    expect(isCollector('yc')).toBe(false);
  });

  it('returns false for object missing collect', () => {
    expect(isCollector({ id: 'x', name: 'X' })).toBe(false);
  });
});

// ============================================================================
// Aggregator Tests
// ============================================================================

describe('withTimeout', () => {
  it('resolves with the promise value when it settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50, 'fast')).resolves.toBe('done');
  });

  it('rejects with CollectorTimeoutError when the bound elapses', async () => {
    const error = await withTimeout(sleep(200), 10, 'slow').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollectorTimeoutError);
    expect(error).toHaveProperty('message', 'Collector slow timed out after 10ms');
  });
});

describe('filterValidRecords', () => {
  it('drops records that fail the schema or are not valid companies', () => {
    const good = makeRecord('Razorpay');
    const badIdentity: StartupRecord = { ...good, identity: 'not-a-hash' };
    const emptyName: StartupRecord = { ...good, name: '' };
    const invalid: StartupRecord = { ...good, isValidCompany: false };

    const { records, rejected } = filterValidRecords([good, badIdentity, emptyName, invalid, 'junk']);

    expect(records).toEqual([good]);
    expect(rejected).toBe(4);
  });
});

describe('aggregateCollectors', () => {
  it('isolates failures: 2 of 5 failing still yields the other 3', async () => {
    const registry = new CollectorRegistry();
    registry.register(createMockCollector('a', { records: [makeRecord('Razorpay')] }));
    registry.register(createMockCollector('b', { shouldFail: true, errorMessage: 'HTTP 503' }));
    registry.register(createMockCollector('c', { records: [makeRecord('Zepto')] }));
    registry.register(createMockCollector('d', { shouldFail: true }));
    registry.register(createMockCollector('e', { records: [makeRecord('Groww')] }));
    const logger = createMockLogger();

    const result = await aggregateCollectors(planFor('a', 'b', 'c', 'd', 'e'), registry, { logger });

    expect(result.records.map((r) => r.name).sort()).toEqual(['Groww', 'Razorpay', 'Zepto']);
    expect(result.summaries.map((s) => [s.collectorId, s.status])).toEqual([
      ['a', 'ok'],
      ['b', 'error'],
      ['c', 'ok'],
      ['d', 'error'],
      ['e', 'ok'],
    ]);
    expect(result.summaries[1].error).toBe('HTTP 503');
    expect(logger.error).toHaveBeenCalledWith('[b] b source failed: HTTP 503');
  });

  it('marks a hanging collector as timed out without delaying the others', async () => {
    const registry = new CollectorRegistry();
    registry.register(createMockCollector('slow', { delay: 300, records: [makeRecord('Slowco')] }));
    registry.register(createMockCollector('fast', { records: [makeRecord('Cred')] }));

    const result = await aggregateCollectors(planFor('slow', 'fast'), registry, { timeoutMs: 30 });

    expect(result.records.map((r) => r.name)).toEqual(['Cred']);
    expect(result.summaries[0]).toMatchObject({
      collectorId: 'slow',
      status: 'timeout',
      recordCount: 0,
      error: 'Collector slow timed out after 30ms',
    });
    expect(result.summaries[1].status).toBe('ok');
  });

  it('prefers the assignment timeout over the default', async () => {
    const registry = new CollectorRegistry();
    registry.register(createMockCollector('slow', { delay: 100 }));

    const result = await aggregateCollectors(
      { collectors: [{ collectorId: 'slow', timeoutMs: 10 }] },
      registry,
      { timeoutMs: 5000 }
    );

    expect(result.summaries[0].error).toBe('Collector slow timed out after 10ms');
  });

  it('reports an unregistered collector as missing', async () => {
    const registry = new CollectorRegistry();

    const result = await aggregateCollectors(planFor('ghost'), registry);

    expect(result.records).toEqual([]);
    expect(result.summaries).toEqual([
      {
        collectorId: 'ghost',
        name: 'ghost',
        status: 'missing',
        recordCount: 0,
        rejectedCount: 0,
        durationMs: 0,
        error: "Collector 'ghost' not found in registry",
      },
    ]);
  });

  it('filters malformed output and counts the rejects', async () => {
    const good = makeRecord('Meesho');
    const registry = new CollectorRegistry();
    registry.register(
      createMockCollector('sloppy', {
        records: [good, { ...good, identity: 'XYZ' }, { ...good, isValidCompany: false }],
      })
    );
    const logger = createMockLogger();

    const result = await aggregateCollectors(planFor('sloppy'), registry, { logger });

    expect(result.records).toEqual([good]);
    expect(result.summaries[0]).toMatchObject({ status: 'ok', recordCount: 1, rejectedCount: 2 });
    expect(logger.warn).toHaveBeenCalledWith('[sloppy] Dropped 2 malformed or invalid records');
  });

  it('merges records in completion order', async () => {
    const registry = new CollectorRegistry();
    registry.register(createMockCollector('late', { delay: 60, records: [makeRecord('Latecomer')] }));
    registry.register(createMockCollector('early', { delay: 1, records: [makeRecord('Earlybird')] }));

    const result = await aggregateCollectors(planFor('late', 'early'), registry);

    expect(result.records.map((r) => r.name)).toEqual(['Earlybird', 'Latecomer']);
    expect(result.summaries.map((s) => s.collectorId)).toEqual(['late', 'early']);
  });

  it('never runs more collectors than the concurrency limit', async () => {
    let running = 0;
    let maxRunning = 0;
    const registry = new CollectorRegistry();
    for (const id of ['a', 'b', 'c', 'd', 'e']) {
      registry.register({
        id,
        name: id,
        async collect() {
          running++;
          maxRunning = Math.max(maxRunning, running);
          await sleep(15);
          running--;
          return [];
        },
      });
    }

    await aggregateCollectors(planFor('a', 'b', 'c', 'd', 'e'), registry, { concurrency: 2 });

    expect(maxRunning).toBe(2);
  });

  it('passes limit and request timeout to the collector', async () => {
    const onCollect = jest.fn<(options: CollectOptions) => void>();
    const registry = new CollectorRegistry();
    registry.register(createMockCollector('sized', { onCollect }));

    await aggregateCollectors(
      { collectors: [{ collectorId: 'sized', limit: 7 }, { collectorId: 'sized' }] },
      registry,
      { httpTimeoutMs: 1234 }
    );

    expect(onCollect.mock.calls[0][0]).toMatchObject({ limit: 7, timeoutMs: 1234 });
    expect(onCollect.mock.calls[1][0]).toMatchObject({ limit: 25, timeoutMs: 1234 });
  });
});

describe('summarizeCollection', () => {
  it('returns correct counts for mixed results', () => {
    const summaries: CollectorSummary[] = [
      { collectorId: 'a', name: 'A', status: 'ok', recordCount: 10, rejectedCount: 1, durationMs: 5 },
      { collectorId: 'b', name: 'B', status: 'error', recordCount: 0, rejectedCount: 0, durationMs: 5, error: 'x' },
      { collectorId: 'c', name: 'C', status: 'timeout', recordCount: 0, rejectedCount: 0, durationMs: 60000 },
      { collectorId: 'd', name: 'D', status: 'missing', recordCount: 0, rejectedCount: 0, durationMs: 0 },
      { collectorId: 'e', name: 'E', status: 'ok', recordCount: 4, rejectedCount: 0, durationMs: 5 },
    ];

    expect(summarizeCollection(summaries)).toEqual({
      total: 5,
      successful: 2,
      failed: 1,
      timedOut: 1,
      missing: 1,
      totalRecords: 14,
      totalRejected: 1,
      failedCollectors: ['b', 'c', 'd'],
    });
  });

  it('returns zero counts for no collectors', () => {
    expect(summarizeCollection([]).total).toBe(0);
  });
});
