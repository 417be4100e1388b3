import * as dotenv from 'dotenv';
import { ZodError } from 'zod';
import {
  AppConfigSchema,
  type RateLimitSettings,
  type ValidatedAppConfig,
} from './schema.js';
import { ConfigurationError } from '../types/errors.js';
import type { CLIOptions } from '../types/config.js';

type Env = Record<string, string | undefined>;

const DEFAULT_PRIORITY = 'acrcloud';

function parseList(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function parseOptionalFloat(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : parseFloat(value);
}

function rateLimitOverrides(env: Env, providers: string[]): Record<string, RateLimitSettings> {
  const overrides: Record<string, RateLimitSettings> = {};

  for (const provider of providers) {
    const prefix = `RATE_LIMIT_${provider.toUpperCase()}`;
    const maxRequests = env[`${prefix}_MAX_REQUESTS`];
    if (!maxRequests) continue;

    overrides[provider] = {
      maxRequestsPerWindow: parseInt(maxRequests, 10),
      windowMs: parseFloat(env[`${prefix}_WINDOW_SECONDS`] || '60') * 1000,
      maxConcurrent: env[`${prefix}_MAX_CONCURRENT`]
        ? parseInt(env[`${prefix}_MAX_CONCURRENT`] || '', 10)
        : undefined,
    };
  }

  return overrides;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Builds the application configuration from environment variables, with CLI
 * options taking precedence. Throws a ConfigurationError when anything is out
 * of range, before any audio is touched.
 */
export function loadConfig(options: CLIOptions = {}, env: Env = process.env): ValidatedAppConfig {
  const priorityOrder = options.providers
    ? parseList(options.providers, DEFAULT_PRIORITY)
    : parseList(env.PROVIDER_PRIORITY, DEFAULT_PRIORITY);

  const rawConfig = {
    segmentation: {
      segmentLengthSeconds: options.segmentLength ?? parseFloat(env.SEGMENT_LENGTH || '30'),
      overlapSeconds: options.overlap ?? parseFloat(env.OVERLAP || '5'),
    },
    matching: {
      minConfidenceThreshold: options.minConfidence ?? parseFloat(env.MIN_CONFIDENCE || '0.5'),
      timeThresholdSeconds: parseFloat(env.TIME_THRESHOLD || '60'),
      maxDuplicates: parseInt(env.MAX_DUPLICATES || '2', 10),
    },
    providers: {
      priorityOrder,
      fallbackEnabled: options.fallback ?? env.PROVIDER_FALLBACK_ENABLED === 'true',
      acceptanceThreshold: parseOptionalFloat(env.ACCEPTANCE_THRESHOLD),
      dispatchMode: env.DISPATCH_MODE || 'sequential',
      acrcloud: {
        host: env.ACR_HOST || 'identify-eu-west-1.acrcloud.com',
        accessKey: env.ACR_ACCESS_KEY || '',
        accessSecret: env.ACR_ACCESS_SECRET || '',
        timeoutMs: parseInt(env.ACR_TIMEOUT_MS || '10000', 10),
      },
      audd: {
        endpoint: env.AUDD_ENDPOINT || 'https://api.audd.io/',
        apiToken: env.AUDD_API_TOKEN || '',
        timeoutMs: parseInt(env.AUDD_TIMEOUT_MS || '15000', 10),
      },
    },
    retry: {
      maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS || '3', 10),
      baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS || '1000', 10),
      maxDelayMs: parseInt(env.RETRY_MAX_DELAY_MS || '30000', 10),
      jitterRatio: parseFloat(env.RETRY_JITTER_RATIO || '0.2'),
    },
    rateLimit: {
      default: {
        maxRequestsPerWindow: parseInt(env.RATE_LIMIT_MAX_REQUESTS || '60', 10),
        windowMs: parseFloat(env.RATE_LIMIT_WINDOW_SECONDS || '60') * 1000,
        maxConcurrent: parseInt(env.RATE_LIMIT_MAX_CONCURRENT || '5', 10),
      },
      overrides: rateLimitOverrides(env, priorityOrder),
      circuitBreaker: {
        failureThreshold: parseInt(env.CIRCUIT_BREAKER_THRESHOLD || '5', 10),
        resetTimeoutMs: parseFloat(env.CIRCUIT_BREAKER_RESET_SECONDS || '60') * 1000,
      },
    },
    cache: {
      enabled: options.cache ?? env.CACHE_ENABLED !== 'false',
      backend: env.CACHE_BACKEND || 'file',
      directory: env.CACHE_DIR || '.mixtrace/cache',
      ttlSeconds: parseFloat(env.CACHE_TTL_SECONDS || '86400'),
      failureTtlSeconds: parseFloat(env.CACHE_FAILURE_TTL_SECONDS || '300'),
      compression: env.CACHE_COMPRESSION !== 'false',
    },
    pipeline: {
      maxConcurrentSegments:
        options.concurrency ?? parseInt(env.MAX_CONCURRENT_SEGMENTS || '4', 10),
    },
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID || '',
      clientSecret: env.SPOTIFY_CLIENT_SECRET || '',
      minMatchScore: parseFloat(env.SPOTIFY_MIN_MATCH_SCORE || '70'),
    },
    logging: {
      level: options.verbose ? 'debug' : env.LOG_LEVEL || 'info',
    },
  };

  try {
    return AppConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(error)}`, {
        issues: error.issues,
      });
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Invalid configuration: ${error.message}`);
    }
    throw new ConfigurationError('Unknown configuration validation error');
  }
}

/**
 * Reads `.env` into `process.env` and builds the configuration.
 */
export function loadConfigFromEnvironment(options: CLIOptions = {}): ValidatedAppConfig {
  dotenv.config();
  return loadConfig(options, process.env);
}

/**
 * Lists the environment variables a configured provider still needs.
 */
export function missingCredentials(config: ValidatedAppConfig): string[] {
  const missing: string[] = [];

  for (const provider of config.providers.priorityOrder) {
    if (provider === 'acrcloud') {
      if (!config.providers.acrcloud.accessKey) missing.push('ACR_ACCESS_KEY');
      if (!config.providers.acrcloud.accessSecret) missing.push('ACR_ACCESS_SECRET');
    } else if (provider === 'audd' && !config.providers.audd.apiToken) {
      missing.push('AUDD_API_TOKEN');
    }
  }

  return missing;
}

export function printConfigSummary(config: ValidatedAppConfig): void {
  console.log('Configuration Summary:');
  console.log(
    `- Segments: ${config.segmentation.segmentLengthSeconds}s with ${config.segmentation.overlapSeconds}s overlap`
  );
  console.log(`- Providers: ${config.providers.priorityOrder.join(' > ')}`);
  console.log(`- Fallback: ${config.providers.fallbackEnabled ? 'YES' : 'NO'}`);
  console.log(`- Min Confidence: ${config.matching.minConfidenceThreshold}`);
  console.log(
    `- Cache: ${config.cache.enabled ? `${config.cache.backend} (${config.cache.ttlSeconds}s ttl)` : 'disabled'}`
  );
  console.log(`- Concurrency: ${config.pipeline.maxConcurrentSegments}`);
  console.log(`- Log Level: ${config.logging.level}`);
}

export { AppConfigSchema };
export type { ValidatedAppConfig, RateLimitSettings };
