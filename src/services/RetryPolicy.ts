import type { ProviderErrorKind } from '../types/errors.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Up to this fraction of the computed delay is added as jitter */
  jitterRatio: number;
  /** Returns a number in [0, 1); swapped out in tests */
  random?: () => number;
}

export type RetryDecision = { action: 'retry'; delayMs: number } | { action: 'give-up' };

const NON_TRANSIENT: ReadonlySet<ProviderErrorKind> = new Set(['AuthError', 'MalformedRequest']);

export const GIVE_UP: RetryDecision = Object.freeze({ action: 'give-up' });

/**
 * Decides whether a failed provider call is retried and after how long.
 * `attempt` counts the attempts already made, starting at 1.
 */
export function nextDelay(
  options: RetryPolicyOptions,
  attempt: number,
  errorKind: ProviderErrorKind,
  retryAfterMs?: number
): RetryDecision {
  if (NON_TRANSIENT.has(errorKind) || attempt >= options.maxAttempts) {
    return GIVE_UP;
  }

  if (errorKind === 'RateLimited' && retryAfterMs !== undefined && retryAfterMs >= 0) {
    return { action: 'retry', delayMs: retryAfterMs };
  }

  const exponential = options.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(options.maxDelayMs, exponential);
  const random = options.random ?? Math.random;
  const jitter = capped * options.jitterRatio * random();

  return { action: 'retry', delayMs: Math.min(options.maxDelayMs, capped + jitter) };
}

export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {}

  nextDelay(attempt: number, errorKind: ProviderErrorKind, retryAfterMs?: number): RetryDecision {
    return nextDelay(this.options, attempt, errorKind, retryAfterMs);
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }
}
