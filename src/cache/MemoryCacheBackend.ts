import type { CacheBackend } from './CacheBackend.js';

interface StoredValue {
  bytes: Buffer;
  expiresAt: number;
}

export class MemoryCacheBackend implements CacheBackend {
  private store = new Map<string, StoredValue>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<Buffer | undefined> {
    const value = this.store.get(key);
    if (!value) return undefined;

    if (this.now() >= value.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return value.bytes;
  }

  async put(key: string, bytes: Buffer, ttlMs: number): Promise<void> {
    this.store.set(key, { bytes: Buffer.from(bytes), expiresAt: this.now() + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
