/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';

describe('config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset module cache to get fresh config
    jest.resetModules();
    process.env = { ...originalEnv };
    process.env.NODE_ENV = 'test';
    delete process.env.DISCOVERY_DATA_DIR;
    delete process.env.DISCOVERY_TARGET_COUNT;
    delete process.env.DISCOVERY_CONCURRENCY;
    delete process.env.DISCOVERY_COLLECTOR_TIMEOUT_MS;
    delete process.env.DISCOVERY_FETCH_TIMEOUT_MS;
    delete process.env.DISCOVERY_HTTP_TIMEOUT_MS;
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('should load defaults', async () => {
    const { config } = await import('./index.js');

    expect(config.defaults).toEqual({ targetCount: 50, concurrency: 4 });
    expect(config.timeouts).toEqual({ collectorMs: 60000, fetchMs: 5000, httpMs: 15000 });
  });

  it('should use default data directory when not specified', async () => {
    const { config } = await import('./index.js');
    expect(config.dataDir).toBe(path.join(os.homedir(), '.startup-discovery'));
  });

  it('should use custom data directory when specified', async () => {
    process.env.DISCOVERY_DATA_DIR = '/custom/path';
    const { config } = await import('./index.js');
    expect(config.dataDir).toBe('/custom/path');
  });

  it('should coerce numeric settings', async () => {
    process.env.DISCOVERY_TARGET_COUNT = '25';
    process.env.DISCOVERY_HTTP_TIMEOUT_MS = '2000';
    const { config } = await import('./index.js');

    expect(config.defaults.targetCount).toBe(25);
    expect(config.timeouts.httpMs).toBe(2000);
  });

  it('should have environment flags', async () => {
    const { config } = await import('./index.js');
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.isDevelopment).toBe(false);
  });

  it('should exit on invalid values', async () => {
    process.env.DISCOVERY_CONCURRENCY = 'many';
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    await expect(import('./index.js')).rejects.toThrow('process.exit called');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
