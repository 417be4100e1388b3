import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import { PROVIDER_ERROR_KINDS } from '../types/errors.js';
import type { CacheBackend } from '../cache/CacheBackend.js';
import type { CacheEntry, ProviderResult } from '../types/identification.js';

const ProviderResultSchema = z.object({
  providerName: z.string(),
  trackTitle: z.string(),
  artist: z.string(),
  confidence: z.number().min(0).max(1),
  matchedAtOffsetSeconds: z.number(),
  rawMetadata: z.record(z.unknown()),
  succeeded: z.boolean(),
  errorKind: z.enum(PROVIDER_ERROR_KINDS).optional(),
});

const CacheEntrySchema = z.object({
  segmentFingerprint: z.string(),
  results: z.array(ProviderResultSchema),
  createdAt: z.number(),
  ttlMs: z.number(),
});

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
  hitRate: number;
}

/**
 * Fingerprint → provider result set, over any CacheBackend. Backend failures
 * never escape: a failed read is a miss and a failed write is skipped.
 */
export class IdentificationCache {
  private hits = 0;
  private misses = 0;
  private writes = 0;
  private errors = 0;

  constructor(
    private readonly backend: CacheBackend,
    private readonly now: () => number = Date.now
  ) {}

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    let raw: Buffer | undefined;
    try {
      raw = await this.backend.get(fingerprint);
    } catch (error) {
      this.errors++;
      this.misses++;
      Logger.warn('Cache read failed, treating as miss', {
        fingerprint,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const entry = raw ? this.decode(raw) : undefined;
    if (!entry || entry.segmentFingerprint !== fingerprint || this.isExpired(entry)) {
      this.misses++;
      Logger.debug(`Cache miss: ${fingerprint.slice(0, 12)}`);
      return undefined;
    }

    this.hits++;
    Logger.debug(`Cache hit: ${fingerprint.slice(0, 12)}`);
    return entry;
  }

  async put(fingerprint: string, results: readonly ProviderResult[], ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;

    const entry: CacheEntry = {
      segmentFingerprint: fingerprint,
      results: results.map((result) => ({ ...result, rawMetadata: { ...result.rawMetadata } })),
      createdAt: this.now(),
      ttlMs,
    };

    try {
      await this.backend.put(fingerprint, Buffer.from(JSON.stringify(entry), 'utf8'), ttlMs);
      this.writes++;
    } catch (error) {
      this.errors++;
      Logger.warn('Cache write failed, continuing without caching', {
        fingerprint,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async delete(fingerprint: string): Promise<void> {
    try {
      await this.backend.delete(fingerprint);
    } catch (error) {
      this.errors++;
      Logger.warn('Cache delete failed', {
        fingerprint,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async clear(): Promise<void> {
    await this.backend.clear();
    this.resetStats();
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      writes: this.writes,
      errors: this.errors,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.writes = 0;
    this.errors = 0;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() >= entry.createdAt + entry.ttlMs;
  }

  private decode(raw: Buffer): CacheEntry | undefined {
    try {
      const parsed = CacheEntrySchema.safeParse(JSON.parse(raw.toString('utf8')));
      if (parsed.success) return parsed.data;
      Logger.debug('Ignoring cache entry with unexpected shape', {
        issues: parsed.error.issues.length,
      });
    } catch (error) {
      Logger.debug('Ignoring undecodable cache entry', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return undefined;
  }
}
