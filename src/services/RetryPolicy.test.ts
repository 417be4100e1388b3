import { describe, it, expect } from 'vitest';
import { RetryPolicy, nextDelay, type RetryPolicyOptions } from './RetryPolicy.js';

const options: RetryPolicyOptions = {
  maxAttempts: 4,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  jitterRatio: 0.5,
  random: () => 0,
};

describe('nextDelay', () => {
  it('should double the delay on each transient failure', () => {
    expect(nextDelay(options, 1, 'Timeout')).toEqual({ action: 'retry', delayMs: 100 });
    expect(nextDelay(options, 2, 'Timeout')).toEqual({ action: 'retry', delayMs: 200 });
    expect(nextDelay(options, 3, 'Unknown')).toEqual({ action: 'retry', delayMs: 400 });
  });

  it('should give up once maxAttempts have been made', () => {
    expect(nextDelay(options, 4, 'Timeout')).toEqual({ action: 'give-up' });
    expect(nextDelay(options, 5, 'RateLimited', 10)).toEqual({ action: 'give-up' });
  });

  it('should cap the delay at maxDelayMs', () => {
    const many = { ...options, maxAttempts: 10 };
    expect(nextDelay(many, 5, 'Timeout')).toEqual({ action: 'retry', delayMs: 1000 });
    expect(nextDelay({ ...many, random: () => 0.99 }, 5, 'Timeout')).toEqual({
      action: 'retry',
      delayMs: 1000,
    });
  });

  it('should add jitter proportional to the delay', () => {
    expect(nextDelay({ ...options, random: () => 0.5 }, 1, 'Timeout')).toEqual({
      action: 'retry',
      delayMs: 125,
    });
  });

  it('should never retry non-transient errors', () => {
    expect(nextDelay(options, 1, 'AuthError')).toEqual({ action: 'give-up' });
    expect(nextDelay(options, 1, 'MalformedRequest')).toEqual({ action: 'give-up' });
  });

  it('should honour the retry-after hint for rate limiting', () => {
    expect(nextDelay(options, 1, 'RateLimited', 2500)).toEqual({ action: 'retry', delayMs: 2500 });
    expect(nextDelay(options, 2, 'RateLimited', 0)).toEqual({ action: 'retry', delayMs: 0 });
  });

  it('should back off normally when rate limited without a hint', () => {
    expect(nextDelay(options, 2, 'RateLimited')).toEqual({ action: 'retry', delayMs: 200 });
  });
});

describe('RetryPolicy', () => {
  it('should delegate to nextDelay with its options', () => {
    const policy = new RetryPolicy(options);
    expect(policy.maxAttempts).toBe(4);
    expect(policy.nextDelay(2, 'Timeout')).toEqual({ action: 'retry', delayMs: 200 });
    expect(policy.nextDelay(1, 'AuthError')).toEqual({ action: 'give-up' });
  });
});
