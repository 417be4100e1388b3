import { resolve } from 'node:path';
import { IdentificationCache } from './IdentificationCache.js';
import { IdentificationPipeline } from './IdentificationPipeline.js';
import { ProviderClient, type RetryWait } from './ProviderClient.js';
import { ProviderOrchestrator } from './ProviderOrchestrator.js';
import { RateLimiter } from './RateLimiter.js';
import { RetryPolicy } from './RetryPolicy.js';
import { NullCacheBackend, type CacheBackend } from '../cache/CacheBackend.js';
import { FileCacheBackend } from '../cache/FileCacheBackend.js';
import { MemoryCacheBackend } from '../cache/MemoryCacheBackend.js';
import { createProviderRegistry, type ProviderRegistry } from '../providers/factory.js';
import type { ValidatedAppConfig } from '../config/schema.js';
import type { RecognitionProvider } from '../types/identification.js';

export interface PipelineComponents {
  pipeline: IdentificationPipeline;
  orchestrator: ProviderOrchestrator;
  cache: IdentificationCache;
  rateLimiter: RateLimiter;
  /** Releases timers held by the rate limiter */
  close(): Promise<void>;
}

export interface CreatePipelineOverrides {
  /** Used instead of instantiating providers from the registry */
  providers?: RecognitionProvider[];
  registry?: ProviderRegistry;
  cacheBackend?: CacheBackend;
  wait?: RetryWait;
}

export function createCacheBackend(config: ValidatedAppConfig['cache']): CacheBackend {
  if (!config.enabled) return new NullCacheBackend();
  if (config.backend === 'memory') return new MemoryCacheBackend();
  return new FileCacheBackend({
    directory: resolve(config.directory),
    compression: config.compression,
  });
}

/**
 * Wires the shared rate limiter, retry policy and cache into one pipeline
 * for the configured providers.
 */
export function createPipeline(
  config: ValidatedAppConfig,
  overrides: CreatePipelineOverrides = {}
): PipelineComponents {
  const providers =
    overrides.providers ?? (overrides.registry ?? createProviderRegistry()).create(config.providers);

  const rateLimiter = new RateLimiter(config.rateLimit.default, {
    circuitBreaker: config.rateLimit.circuitBreaker,
  });
  for (const provider of providers) {
    rateLimiter.register(
      provider.name,
      config.rateLimit.overrides[provider.name] ?? config.rateLimit.default
    );
  }

  const retryPolicy = new RetryPolicy(config.retry);
  const cache = new IdentificationCache(overrides.cacheBackend ?? createCacheBackend(config.cache));

  const clients = providers.map(
    (provider) => new ProviderClient(provider, rateLimiter, retryPolicy, overrides.wait)
  );

  const orchestrator = new ProviderOrchestrator({
    clients,
    cache,
    cacheTtlMs: config.cache.ttlSeconds * 1000,
    failureCacheTtlMs: Math.min(config.cache.failureTtlSeconds, config.cache.ttlSeconds) * 1000,
    acceptanceThreshold:
      config.providers.acceptanceThreshold ?? config.matching.minConfidenceThreshold,
    fallbackEnabled: config.providers.fallbackEnabled,
    dispatchMode: config.providers.dispatchMode,
  });

  const pipeline = new IdentificationPipeline(orchestrator, {
    segmentLengthSeconds: config.segmentation.segmentLengthSeconds,
    overlapSeconds: config.segmentation.overlapSeconds,
    maxConcurrentSegments: config.pipeline.maxConcurrentSegments,
    matching: config.matching,
  });

  return {
    pipeline,
    orchestrator,
    cache,
    rateLimiter,
    close: () => rateLimiter.stop(),
  };
}
