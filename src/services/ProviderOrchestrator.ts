import { Logger, formatOffset } from '../utils/logger.js';
import { segmentFingerprint } from '../utils/fingerprint.js';
import { ConfigurationError } from '../types/errors.js';
import type { IdentificationCache } from './IdentificationCache.js';
import type { ProviderClient } from './ProviderClient.js';
import type { AudioSegment } from '../types/audio.js';
import type { DispatchMode } from '../types/config.js';
import type { ProviderResult } from '../types/identification.js';

const DEFAULT_FAILURE_CACHE_TTL_MS = 5 * 60 * 1000;

export interface OrchestratorOptions {
  /** Clients in priority order, primary first */
  clients: ProviderClient[];
  cache: IdentificationCache;
  cacheTtlMs: number;
  /** TTL for result sets in which every provider failed; defaults to the shorter of five minutes and `cacheTtlMs` */
  failureCacheTtlMs?: number;
  acceptanceThreshold: number;
  fallbackEnabled: boolean;
  dispatchMode?: DispatchMode;
}

export interface SegmentIdentification {
  results: ProviderResult[];
  fromCache: boolean;
  exhausted: boolean;
}

/**
 * Resolves one segment against the configured providers: cache first, then
 * the primary provider, then fallbacks while the best answer is still below
 * the acceptance threshold.
 */
export class ProviderOrchestrator {
  private readonly clients: ProviderClient[];
  private readonly dispatchMode: DispatchMode;
  private readonly failureCacheTtlMs: number;

  constructor(private readonly options: OrchestratorOptions) {
    if (options.clients.length === 0) {
      throw new ConfigurationError('No identification providers configured');
    }
    this.clients = [...options.clients];
    this.dispatchMode = options.dispatchMode ?? 'sequential';
    this.failureCacheTtlMs =
      options.failureCacheTtlMs ?? Math.min(options.cacheTtlMs, DEFAULT_FAILURE_CACHE_TTL_MS);
  }

  async identify(segment: AudioSegment, signal?: AbortSignal): Promise<ProviderResult[]> {
    return (await this.identifySegment(segment, signal)).results;
  }

  async identifySegment(segment: AudioSegment, signal?: AbortSignal): Promise<SegmentIdentification> {
    const fingerprint = segmentFingerprint(segment);

    const cached = await this.options.cache.get(fingerprint);
    if (cached) {
      Logger.debug(`Segment ${segment.index} served from cache`);
      return { results: rankResults(cached.results), fromCache: true, exhausted: false };
    }

    Logger.info(`Identifying segment ${segment.index} at ${formatOffset(segment.startOffsetSeconds)}`);

    const obtained =
      this.dispatchMode === 'parallel'
        ? await this.fanOut(segment, signal)
        : await this.walkPriorityList(segment, signal);

    const results = rankResults(obtained);
    const exhausted = results.every((result) => !result.succeeded);

    if (exhausted) {
      Logger.error(`All providers failed for segment ${segment.index}`, {
        offset: formatOffset(segment.startOffsetSeconds),
        errors: results.map((result) => `${result.providerName}:${result.errorKind}`),
      });
    }

    // After an abort, retries and fallbacks may have been cut short
    const settled = !signal?.aborted || (results[0] !== undefined && this.isAccepted(results[0]));
    if (settled) {
      const ttlMs = exhausted ? this.failureCacheTtlMs : this.options.cacheTtlMs;
      await this.options.cache.put(fingerprint, results, ttlMs);
    }

    return { results, fromCache: false, exhausted };
  }

  get providerNames(): string[] {
    return this.clients.map((client) => client.name);
  }

  private async walkPriorityList(segment: AudioSegment, signal?: AbortSignal): Promise<ProviderResult[]> {
    const candidates = this.options.fallbackEnabled ? this.clients : this.clients.slice(0, 1);
    const results: ProviderResult[] = [];

    for (const client of candidates) {
      if (results.length > 0 && signal?.aborted) {
        Logger.debug(`Run cancelled, no fallback after ${results.length} provider(s)`, {
          segment: segment.index,
        });
        break;
      }

      const result = await client.identify(segment, signal);
      results.push(result);

      if (this.isAccepted(result)) break;

      if (client !== candidates[candidates.length - 1]) {
        Logger.debug(`${client.name} below acceptance threshold, falling back`, {
          segment: segment.index,
          confidence: result.confidence,
          succeeded: result.succeeded,
        });
      }
    }

    return results;
  }

  private async fanOut(segment: AudioSegment, signal?: AbortSignal): Promise<ProviderResult[]> {
    return Promise.all(this.clients.map((client) => client.identify(segment, signal)));
  }

  private isAccepted(result: ProviderResult): boolean {
    return result.succeeded && result.confidence >= this.options.acceptanceThreshold;
  }
}

/**
 * Highest confidence first; among equals, successes before failures and
 * otherwise priority order.
 */
export function rankResults(results: readonly ProviderResult[]): ProviderResult[] {
  return results
    .map((result, position) => ({ result, position }))
    .sort(
      (a, b) =>
        b.result.confidence - a.result.confidence ||
        Number(b.result.succeeded) - Number(a.result.succeeded) ||
        a.position - b.position
    )
    .map(({ result }) => result);
}
