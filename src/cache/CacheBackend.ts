/**
 * Byte-level key/value store with per-entry time to live. Implementations may
 * throw CacheUnavailableError; callers are expected to degrade to a miss.
 */
export interface CacheBackend {
  get(key: string): Promise<Buffer | undefined>;
  put(key: string, bytes: Buffer, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

/** Used when caching is disabled: stores nothing, always misses. */
export class NullCacheBackend implements CacheBackend {
  async get(): Promise<Buffer | undefined> {
    return undefined;
  }

  async put(): Promise<void> {}

  async delete(): Promise<void> {}

  async clear(): Promise<void> {}
}
