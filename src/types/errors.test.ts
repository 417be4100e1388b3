import { describe, it, expect } from 'vitest';
import { AppError, ConfigurationError, ProviderError } from './errors.js';

describe('ProviderError.from', () => {
  it('should pass provider errors through', () => {
    const original = new ProviderError('audd', 'RateLimited', 'slow down', 1000);
    expect(ProviderError.from('audd', original)).toBe(original);
  });

  it('should treat aborts and timeouts as Timeout', () => {
    const aborted = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    const timedOut = Object.assign(new Error('timed out'), { name: 'TimeoutError' });

    expect(ProviderError.from('audd', aborted).kind).toBe('Timeout');
    expect(ProviderError.from('audd', timedOut).kind).toBe('Timeout');
  });

  it('should classify anything else as Unknown', () => {
    const wrapped = ProviderError.from('acrcloud', 'socket closed');

    expect(wrapped.kind).toBe('Unknown');
    expect(wrapped.message).toBe('Provider Error [acrcloud/Unknown]: socket closed');
    expect(wrapped).toBeInstanceOf(AppError);
    expect(wrapped.isOperational).toBe(true);
  });
});

describe('ConfigurationError', () => {
  it('should be fatal', () => {
    const error = new ConfigurationError('bad overlap', { overlapSeconds: 30 });

    expect(error.isOperational).toBe(false);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Configuration Error: bad overlap');
    expect(error.context).toEqual({ overlapSeconds: 30 });
  });
});
