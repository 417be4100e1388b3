import { setTimeout as sleep } from 'node:timers/promises';
import { ProviderError, type ProviderErrorKind } from '../types/errors.js';
import { Logger, formatOffset } from '../utils/logger.js';
import type { RateLimiter } from './RateLimiter.js';
import type { RetryPolicy } from './RetryPolicy.js';
import type { AudioSegment } from '../types/audio.js';
import type { ProviderResult, RecognitionProvider } from '../types/identification.js';

export type RetryWait = (ms: number, signal?: AbortSignal) => Promise<unknown>;

const abortableSleep: RetryWait = (ms, signal) => sleep(ms, undefined, { signal });

/**
 * A recognition provider behind its rate limiter, circuit breaker and retry
 * policy. Never rejects: failures come back as `succeeded: false` results.
 */
export class ProviderClient {
  constructor(
    private readonly provider: RecognitionProvider,
    private readonly rateLimiter: RateLimiter,
    private readonly retryPolicy: RetryPolicy,
    private readonly wait: RetryWait = abortableSleep
  ) {}

  get name(): string {
    return this.provider.name;
  }

  /**
   * Identifies one segment. Once `signal` aborts no further attempt starts and
   * a pending backoff ends early; a request already on the wire is left to
   * finish. An open circuit fails the segment without contacting the provider.
   */
  async identify(segment: AudioSegment, signal?: AbortSignal): Promise<ProviderResult> {
    const name = this.provider.name;

    const trippedBy = this.rateLimiter.checkCircuit(name);
    if (trippedBy) {
      Logger.debug(`${name} circuit open, skipping segment ${segment.index}`);
      return ProviderClient.failure(name, segment, trippedBy);
    }

    let lastKind: ProviderErrorKind = 'Timeout';

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        Logger.debug(`${name} stopped on segment ${segment.index}: run cancelled`, { attempt });
        return ProviderClient.failure(name, segment, lastKind);
      }

      try {
        const match = await this.rateLimiter.schedule(name, () =>
          this.provider.identify(segment.audio, { offsetSeconds: segment.startOffsetSeconds })
        );
        this.rateLimiter.recordSuccess(name);

        if (!match) {
          Logger.debug(`${name}: no music detected at ${formatOffset(segment.startOffsetSeconds)}`);
          return ProviderClient.noMatch(name, segment);
        }

        return Object.freeze({
          providerName: name,
          trackTitle: match.title,
          artist: match.artist,
          confidence: clamp(match.confidence),
          matchedAtOffsetSeconds: segment.startOffsetSeconds,
          rawMetadata: match.rawMetadata,
          succeeded: true,
        });
      } catch (error) {
        const providerError = ProviderError.from(name, error);
        lastKind = providerError.kind;
        const decision = this.retryPolicy.nextDelay(
          attempt,
          providerError.kind,
          providerError.retryAfterMs
        );

        if (decision.action === 'give-up') {
          Logger.warn(`${name} gave up on segment ${segment.index} after ${attempt} attempt(s)`, {
            kind: providerError.kind,
            error: providerError.message,
          });
          this.rateLimiter.recordFailure(name, providerError.kind);
          return ProviderClient.failure(name, segment, providerError.kind);
        }

        if (signal?.aborted) continue;

        Logger.warn(
          `${name} failed on segment ${segment.index}, retry ${attempt}/${this.retryPolicy.maxAttempts - 1} in ${Math.round(decision.delayMs)}ms`,
          { kind: providerError.kind }
        );
        await this.backoff(decision.delayMs, signal);
      }
    }
  }

  private async backoff(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.wait(ms, signal);
    } catch (error) {
      // An aborted wait ends the retry loop at the next attempt check
      if (!signal?.aborted) throw error;
    }
  }

  static failure(
    providerName: string,
    segment: AudioSegment,
    errorKind: ProviderErrorKind
  ): ProviderResult {
    return Object.freeze({
      providerName,
      trackTitle: '',
      artist: '',
      confidence: 0,
      matchedAtOffsetSeconds: segment.startOffsetSeconds,
      rawMetadata: {},
      succeeded: false,
      errorKind,
    });
  }

  private static noMatch(providerName: string, segment: AudioSegment): ProviderResult {
    return Object.freeze({
      providerName,
      trackTitle: '',
      artist: '',
      confidence: 0,
      matchedAtOffsetSeconds: segment.startOffsetSeconds,
      rawMetadata: {},
      succeeded: true,
    });
  }
}

function clamp(confidence: number): number {
  if (!Number.isFinite(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}
