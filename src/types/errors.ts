export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export const PROVIDER_ERROR_KINDS = [
  'RateLimited',
  'Timeout',
  'AuthError',
  'MalformedRequest',
  'Unknown',
] as const;

export type ProviderErrorKind = (typeof PROVIDER_ERROR_KINDS)[number];

export class ProviderError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(
    public readonly providerName: string,
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly retryAfterMs?: number,
    context?: Record<string, unknown>
  ) {
    super(`Provider Error [${providerName}/${kind}]: ${message}`, context);
  }

  /**
   * Wraps anything thrown by a provider call. Errors that are already
   * ProviderErrors pass through untouched.
   */
  static from(providerName: string, error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return new ProviderError(providerName, 'Timeout', error.message);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(providerName, 'Unknown', message);
  }
}

export class CacheUnavailableError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Cache Unavailable: ${message}`, context);
  }
}

export class AudioSourceError extends AppError {
  readonly statusCode = 422;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Audio Source Error: ${message}`, context);
  }
}

export class EnrichmentError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Enrichment Error: ${message}`, context);
  }
}
