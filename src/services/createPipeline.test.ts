import { describe, it, expect } from 'vitest';
import os from 'os';
import path from 'path';
import { createCacheBackend, createPipeline } from './createPipeline.js';
import { NullCacheBackend } from '../cache/CacheBackend.js';
import { FileCacheBackend } from '../cache/FileCacheBackend.js';
import { MemoryCacheBackend } from '../cache/MemoryCacheBackend.js';
import { testConfig } from '../testing/fakes.js';

describe('createCacheBackend', () => {
  const directory = path.join(os.tmpdir(), 'mixtrace-never-written');

  it('should pick the backend named in the configuration', () => {
    const base = testConfig().cache;

    expect(createCacheBackend({ ...base, enabled: false })).toBeInstanceOf(NullCacheBackend);
    expect(createCacheBackend({ ...base, backend: 'memory' })).toBeInstanceOf(MemoryCacheBackend);
    expect(createCacheBackend({ ...base, backend: 'file', directory })).toBeInstanceOf(FileCacheBackend);
  });
});

describe('createPipeline', () => {
  it('should register each configured provider with its rate limits', async () => {
    const config = testConfig(
      { providers: 'acrcloud,audd' },
      { RATE_LIMIT_AUDD_MAX_REQUESTS: '7' }
    );
    const components = createPipeline(config);

    try {
      expect(components.orchestrator.providerNames).toEqual(['acrcloud', 'audd']);
      expect(components.rateLimiter.providerNames()).toEqual(['acrcloud', 'audd']);
      expect((await components.rateLimiter.utilization('acrcloud')).maxRequestsPerWindow).toBe(60);
      expect((await components.rateLimiter.utilization('audd')).maxRequestsPerWindow).toBe(7);
    } finally {
      await components.close();
    }
  });
});
