/**
 * Collector Registry
 *
 * Central registry for collector implementations. Provides collector
 * lookup during the collect stage and for the `sources` command.
 *
 * @module collectors/registry
 */

import type { Collector, CollectorFactory, CollectorMap } from './types.js';
import { YCombinatorCollector } from './yc/collector.js';
import { DPIITCollector } from './dpiit/collector.js';
import { Inc42Collector } from './inc42/collector.js';
import { Inc42ListingsCollector } from './inc42/listings.js';
import { Tier2Collector } from './tier2/collector.js';
import { LastResortCollector } from './last-resort/collector.js';

// ============================================================================
// Collector Registry Class
// ============================================================================

/**
 * CollectorRegistry manages all registered collectors.
 *
 * Collectors are registered by ID and can be retrieved for execution.
 * The registry supports both direct instance registration and lazy
 * factory-based registration.
 *
 * @example
 * ```typescript
 * const registry = new CollectorRegistry();
 * registry.register(new LastResortCollector());
 * registry.registerFactory('yc', () => new YCombinatorCollector());
 *
 * const collector = registry.get('yc');
 * ```
 */
export class CollectorRegistry {
  /** Map of collector ID to collector instance */
  private readonly collectors: CollectorMap = new Map();

  /** Map of collector ID to factory (for lazy instantiation) */
  private readonly factories: Map<string, CollectorFactory> = new Map();

  /**
   * Register a collector instance directly.
   *
   * @throws Error if a collector with the same ID is already registered
   */
  register(collector: Collector): void {
    if (this.has(collector.id)) {
      throw new Error(`Collector '${collector.id}' is already registered`);
    }
    this.collectors.set(collector.id, collector);
  }

  /**
   * Register a collector factory for lazy instantiation.
   *
   * The factory will be called the first time the collector is requested.
   *
   * @throws Error if a collector with the same ID is already registered
   */
  registerFactory(id: string, factory: CollectorFactory): void {
    if (this.has(id)) {
      throw new Error(`Collector '${id}' is already registered`);
    }
    this.factories.set(id, factory);
  }

  /**
   * Get a collector by ID.
   *
   * If the collector was registered via factory, instantiates it on first access.
   *
   * @returns Collector instance or undefined if not found
   * @throws Error if a factory returns a collector with a different ID
   */
  get(id: string): Collector | undefined {
    const existing = this.collectors.get(id);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(id);
    if (factory) {
      const collector = factory();
      if (collector.id !== id) {
        throw new Error(`Factory for '${id}' produced collector '${collector.id}'`);
      }
      this.collectors.set(id, collector);
      this.factories.delete(id);
      return collector;
    }

    return undefined;
  }

  /**
   * Check if a collector is registered (directly or via factory).
   */
  has(id: string): boolean {
    return this.collectors.has(id) || this.factories.has(id);
  }

  /**
   * Get all available collector IDs, sorted alphabetically.
   */
  getAvailableCollectors(): string[] {
    const directIds = Array.from(this.collectors.keys());
    const factoryIds = Array.from(this.factories.keys());
    return [...new Set([...directIds, ...factoryIds])].sort();
  }

  /**
   * Unregister a collector by ID.
   *
   * @returns true if the collector was removed, false if not found
   */
  unregister(id: string): boolean {
    const deletedDirect = this.collectors.delete(id);
    const deletedFactory = this.factories.delete(id);
    return deletedDirect || deletedFactory;
  }

  /**
   * Get the count of registered collectors (including factories).
   */
  get size(): number {
    return this.getAvailableCollectors().length;
  }
}

// ============================================================================
// Default Registry
// ============================================================================

/**
 * Create a registry with the built-in collectors.
 *
 * Remote collectors are registered as factories; the bundled list is
 * registered directly.
 */
export function createDefaultRegistry(): CollectorRegistry {
  const registry = new CollectorRegistry();
  registry.registerFactory('yc', () => new YCombinatorCollector());
  registry.registerFactory('dpiit', () => new DPIITCollector());
  registry.registerFactory('inc42', () => new Inc42Collector());
  registry.registerFactory('inc42-listings', () => new Inc42ListingsCollector());
  registry.registerFactory('tier2', () => new Tier2Collector());
  registry.register(new LastResortCollector());
  return registry;
}
