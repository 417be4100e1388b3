import Bottleneck from 'bottleneck';
import { Logger } from '../utils/logger.js';
import type { ProviderErrorKind } from '../types/errors.js';

export interface RateLimits {
  maxRequestsPerWindow: number;
  windowMs: number;
  maxConcurrent?: number;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  /** Consecutive failed identifications that open the circuit */
  failureThreshold: number;
  /** How long an open circuit rejects requests before letting a trial through */
  resetTimeoutMs: number;
}

export interface RateLimiterOptions {
  circuitBreaker?: CircuitBreakerOptions;
  now?: () => number;
}

export interface ProviderUtilization {
  providerName: string;
  maxRequestsPerWindow: number;
  remainingTokens: number;
  queued: number;
  running: number;
  granted: number;
  delayed: number;
  totalWaitMs: number;
  circuitState: CircuitState;
  consecutiveFailures: number;
  circuitTrips: number;
  rejected: number;
}

interface ProviderBucket {
  limits: RateLimits;
  limiter: Bottleneck;
  granted: number;
  delayed: number;
  totalWaitMs: number;
  circuit: {
    state: CircuitState;
    consecutiveFailures: number;
    openedAt: number;
    trippedBy: ProviderErrorKind;
    trips: number;
    rejected: number;
  };
}

// Waits shorter than this are scheduling noise, not throttling
const DELAY_NOTICE_MS = 50;

export const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerOptions = Object.freeze({
  failureThreshold: 5,
  resetTimeoutMs: 60000,
});

/**
 * Per-provider token bucket. Each provider gets its own bottleneck limiter
 * whose reservoir refills to `maxRequestsPerWindow` every `windowMs`; callers
 * beyond that are queued, never rejected.
 *
 * Each provider also carries a circuit breaker fed by `recordSuccess` and
 * `recordFailure`. Once open, `checkCircuit` refuses requests until the reset
 * timeout passes, then lets requests through half-open: the next success
 * closes the circuit, the next failure opens it again. An AuthError opens it
 * at once.
 */
export class RateLimiter {
  private buckets = new Map<string, ProviderBucket>();
  private readonly breaker: CircuitBreakerOptions;
  private readonly now: () => number;

  constructor(
    private readonly defaults: RateLimits,
    options: RateLimiterOptions = {}
  ) {
    this.breaker = options.circuitBreaker ?? DEFAULT_CIRCUIT_BREAKER;
    this.now = options.now ?? Date.now;
  }

  register(providerName: string, limits: RateLimits): void {
    const existing = this.buckets.get(providerName);
    if (existing) {
      existing.limiter.updateSettings(RateLimiter.toBottleneckOptions(limits));
      existing.limits = limits;
      return;
    }

    this.buckets.set(providerName, {
      limits,
      limiter: new Bottleneck(RateLimiter.toBottleneckOptions(limits)),
      granted: 0,
      delayed: 0,
      totalWaitMs: 0,
      circuit: {
        state: 'closed',
        consecutiveFailures: 0,
        openedAt: 0,
        trippedBy: 'Unknown',
        trips: 0,
        rejected: 0,
      },
    });

    Logger.debug(`Registered rate limits for ${providerName}`, { ...limits });
  }

  /**
   * Returns the error kind that opened the provider's circuit while it still
   * refuses requests, otherwise `undefined`.
   */
  checkCircuit(providerName: string): ProviderErrorKind | undefined {
    const { circuit } = this.bucket(providerName);
    if (circuit.state !== 'open') return undefined;

    if (this.now() - circuit.openedAt >= this.breaker.resetTimeoutMs) {
      circuit.state = 'half-open';
      Logger.info(`Circuit for ${providerName} half-open, trying again`);
      return undefined;
    }

    circuit.rejected++;
    return circuit.trippedBy;
  }

  recordSuccess(providerName: string): void {
    const { circuit } = this.bucket(providerName);
    circuit.consecutiveFailures = 0;
    if (circuit.state === 'half-open') {
      circuit.state = 'closed';
      Logger.info(`Circuit for ${providerName} closed`);
    }
  }

  recordFailure(providerName: string, kind: ProviderErrorKind): void {
    const { circuit } = this.bucket(providerName);
    circuit.consecutiveFailures++;

    const shouldOpen =
      circuit.state === 'half-open' ||
      (circuit.state === 'closed' &&
        (kind === 'AuthError' || circuit.consecutiveFailures >= this.breaker.failureThreshold));
    if (!shouldOpen) return;

    circuit.state = 'open';
    circuit.openedAt = this.now();
    circuit.trippedBy = kind;
    circuit.trips++;
    Logger.warn(`Circuit for ${providerName} opened after ${circuit.consecutiveFailures} failure(s)`, {
      kind,
      resetTimeoutMs: this.breaker.resetTimeoutMs,
      trips: circuit.trips,
    });
  }

  /**
   * Resolves once a token for the provider has been granted.
   */
  async acquire(providerName: string): Promise<void> {
    await this.schedule(providerName, async () => undefined);
  }

  /**
   * Runs `task` under one of the provider's tokens (and concurrency slots).
   */
  async schedule<T>(providerName: string, task: () => Promise<T>): Promise<T> {
    const bucket = this.bucket(providerName);
    const queuedAt = Date.now();

    return bucket.limiter.schedule(() => {
      const waited = Date.now() - queuedAt;
      bucket.granted++;
      bucket.totalWaitMs += waited;
      if (waited >= DELAY_NOTICE_MS) {
        bucket.delayed++;
        Logger.debug(`Rate limit wait complete for ${providerName} after ${waited}ms`);
      }
      return task();
    });
  }

  async utilization(providerName: string): Promise<ProviderUtilization> {
    const bucket = this.bucket(providerName);
    const counts = bucket.limiter.counts();
    const remaining = await bucket.limiter.currentReservoir();

    return {
      providerName,
      maxRequestsPerWindow: bucket.limits.maxRequestsPerWindow,
      remainingTokens: remaining ?? bucket.limits.maxRequestsPerWindow,
      queued: counts.QUEUED ?? 0,
      running: (counts.RUNNING ?? 0) + (counts.EXECUTING ?? 0),
      granted: bucket.granted,
      delayed: bucket.delayed,
      totalWaitMs: bucket.totalWaitMs,
      circuitState: bucket.circuit.state,
      consecutiveFailures: bucket.circuit.consecutiveFailures,
      circuitTrips: bucket.circuit.trips,
      rejected: bucket.circuit.rejected,
    };
  }

  providerNames(): string[] {
    return [...this.buckets.keys()];
  }

  /**
   * Stops the refill timers. Queued work still runs to completion.
   */
  async stop(): Promise<void> {
    await Promise.all([...this.buckets.values()].map((bucket) => bucket.limiter.disconnect()));
    this.buckets.clear();
  }

  private bucket(providerName: string): ProviderBucket {
    if (!this.buckets.has(providerName)) {
      this.register(providerName, this.defaults);
    }
    const bucket = this.buckets.get(providerName);
    if (!bucket) {
      throw new Error(`Rate limiter bucket missing for ${providerName}`);
    }
    return bucket;
  }

  private static toBottleneckOptions(limits: RateLimits): Bottleneck.ConstructorOptions {
    return {
      reservoir: limits.maxRequestsPerWindow,
      reservoirRefreshAmount: limits.maxRequestsPerWindow,
      reservoirRefreshInterval: limits.windowMs,
      maxConcurrent: limits.maxConcurrent ?? null,
    };
  }
}
