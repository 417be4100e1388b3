import { z } from 'zod';

export const SegmentationConfigSchema = z
  .object({
    segmentLengthSeconds: z
      .number()
      .min(10, 'Segment length must be at least 10 seconds')
      .max(300, 'Segment length must be at most 300 seconds'),
    overlapSeconds: z.number().gt(0, 'Overlap must be greater than 0 seconds'),
  })
  .refine((value) => value.overlapSeconds < value.segmentLengthSeconds, {
    message: 'Overlap must be shorter than the segment length',
    path: ['overlapSeconds'],
  });

export const MatchingConfigSchema = z.object({
  minConfidenceThreshold: z.number().min(0).max(1),
  timeThresholdSeconds: z.number().min(0),
  maxDuplicates: z.number().int().min(0),
});

export const AcrCloudConfigSchema = z.object({
  host: z.string().min(1, 'ACRCloud host is required'),
  accessKey: z.string(),
  accessSecret: z.string(),
  timeoutMs: z.number().min(1000, 'Timeout must be at least 1000ms'),
});

export const AuddConfigSchema = z.object({
  endpoint: z.string().url('AudD endpoint must be a valid URL'),
  apiToken: z.string(),
  timeoutMs: z.number().min(1000, 'Timeout must be at least 1000ms'),
});

export const ProvidersConfigSchema = z.object({
  priorityOrder: z.array(z.string().min(1)).nonempty('At least one provider is required'),
  fallbackEnabled: z.boolean(),
  acceptanceThreshold: z.number().min(0).max(1).optional(),
  dispatchMode: z.enum(['sequential', 'parallel']),
  acrcloud: AcrCloudConfigSchema,
  audd: AuddConfigSchema,
});

export const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    baseDelayMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
    jitterRatio: z.number().min(0).max(1),
  })
  .refine((value) => value.baseDelayMs <= value.maxDelayMs, {
    message: 'Base retry delay must not exceed the maximum delay',
    path: ['baseDelayMs'],
  });

export const RateLimitConfigSchema = z.object({
  maxRequestsPerWindow: z.number().int().min(1),
  windowMs: z.number().min(1),
  maxConcurrent: z.number().int().min(1).optional(),
});

export const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().min(1),
  resetTimeoutMs: z.number().min(0),
});

export const CacheConfigSchema = z.object({
  enabled: z.boolean(),
  backend: z.enum(['memory', 'file']),
  directory: z.string().min(1, 'Cache directory is required'),
  ttlSeconds: z.number().min(0),
  failureTtlSeconds: z.number().min(0),
  compression: z.boolean(),
});

export const PipelineConfigSchema = z.object({
  maxConcurrentSegments: z.number().int().min(1),
});

export const SpotifyConfigSchema = z.object({
  clientId: z.string(),
  clientSecret: z.string(),
  minMatchScore: z.number().min(0).max(100),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const AppConfigSchema = z.object({
  segmentation: SegmentationConfigSchema,
  matching: MatchingConfigSchema,
  providers: ProvidersConfigSchema,
  retry: RetryConfigSchema,
  rateLimit: z.object({
    default: RateLimitConfigSchema,
    overrides: z.record(RateLimitConfigSchema),
    circuitBreaker: CircuitBreakerConfigSchema,
  }),
  cache: CacheConfigSchema,
  pipeline: PipelineConfigSchema,
  spotify: SpotifyConfigSchema,
  logging: LoggingConfigSchema,
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
export type RateLimitSettings = z.infer<typeof RateLimitConfigSchema>;
export type RetrySettings = z.infer<typeof RetryConfigSchema>;
