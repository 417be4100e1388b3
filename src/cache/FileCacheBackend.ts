import { mkdir, readFile, readdir, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { createHash, randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { deflateSync, inflateSync } from 'node:zlib';
import { z } from 'zod';
import { CacheUnavailableError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { CacheBackend } from './CacheBackend.js';

const CACHE_EXTENSION = '.cache';

const StoredFileSchema = z.object({
  key: z.string(),
  storedAt: z.number(),
  expiresAt: z.number(),
  data: z.string(),
});

type StoredFile = z.infer<typeof StoredFileSchema>;

export interface FileCacheBackendOptions {
  directory: string;
  compression?: boolean;
  now?: () => number;
}

/**
 * One file per key under `directory`, named by the SHA-256 of the key.
 * Writes go to a unique temp file and are renamed into place, so concurrent
 * writers of the same key resolve last-write-wins and readers never see a
 * partial file.
 */
export class FileCacheBackend implements CacheBackend {
  private readonly directory: string;
  private readonly compression: boolean;
  private readonly now: () => number;
  private ready: Promise<void> | undefined;

  constructor(options: FileCacheBackendOptions) {
    this.directory = options.directory;
    this.compression = options.compression ?? true;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<Buffer | undefined> {
    const path = this.pathFor(key);
    let raw: Buffer;

    try {
      raw = await readFile(path);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new CacheUnavailableError(`Cannot read ${path}`, { cause: describe(error) });
    }

    // Stale files stay on disk for cleanup(); a put may already be replacing them
    const stored = this.decode(raw);
    if (!stored || stored.key !== key) {
      Logger.debug('Ignoring unreadable cache file', { path });
      return undefined;
    }

    if (this.now() >= stored.expiresAt) return undefined;

    return Buffer.from(stored.data, 'base64');
  }

  async put(key: string, bytes: Buffer, ttlMs: number): Promise<void> {
    await this.ensureDirectory();

    const now = this.now();
    const stored: StoredFile = {
      key,
      storedAt: now,
      expiresAt: now + ttlMs,
      data: bytes.toString('base64'),
    };
    const json = Buffer.from(JSON.stringify(stored), 'utf8');
    const payload = this.compression ? deflateSync(json) : json;

    const path = this.pathFor(key);
    const tempPath = `${path}.${randomUUID()}.tmp`;

    try {
      await writeFile(tempPath, payload);
      await rename(tempPath, path);
    } catch (error) {
      await this.removeQuietly(tempPath);
      throw new CacheUnavailableError(`Cannot write ${path}`, { cause: describe(error) });
    }
  }

  async delete(key: string): Promise<void> {
    await this.removeQuietly(this.pathFor(key));
  }

  async clear(): Promise<void> {
    try {
      await rm(this.directory, { recursive: true, force: true });
    } catch (error) {
      throw new CacheUnavailableError(`Cannot clear ${this.directory}`, { cause: describe(error) });
    }
    this.ready = undefined;
  }

  /**
   * Removes expired and unreadable entries, plus anything stored more than
   * `maxAgeMs` ago when given. Returns the number of files removed.
   */
  async cleanup(maxAgeMs?: number): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw new CacheUnavailableError(`Cannot list ${this.directory}`, { cause: describe(error) });
    }

    const now = this.now();
    let removed = 0;

    for (const name of names) {
      const path = join(this.directory, name);

      if (name.endsWith('.tmp')) {
        await this.removeQuietly(path);
        removed++;
        continue;
      }
      if (!name.endsWith(CACHE_EXTENSION)) continue;

      const stored = this.decode(await readFile(path).catch(() => Buffer.alloc(0)));
      const expired =
        !stored ||
        now >= stored.expiresAt ||
        (maxAgeMs !== undefined && now - stored.storedAt > maxAgeMs);

      if (expired) {
        await this.removeQuietly(path);
        removed++;
      }
    }

    Logger.debug(`Cache cleanup removed ${removed} file(s)`, { directory: this.directory });
    return removed;
  }

  private decode(raw: Buffer): StoredFile | undefined {
    try {
      // zlib streams start with 0x78
      const json = raw[0] === 0x78 ? inflateSync(raw) : raw;
      const parsed = StoredFileSchema.safeParse(JSON.parse(json.toString('utf8')));
      return parsed.success ? parsed.data : undefined;
    } catch {
      return undefined;
    }
  }

  private pathFor(key: string): string {
    const hashed = createHash('sha256').update(key).digest('hex');
    return join(this.directory, `${hashed}${CACHE_EXTENSION}`);
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = undefined;
          throw new CacheUnavailableError(`Cannot create ${this.directory}`, {
            cause: describe(error),
          });
        }
      );
    }
    return this.ready;
  }

  private async removeQuietly(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!isNotFound(error)) {
        Logger.warn('Failed to remove cache file', { path, error: describe(error) });
      }
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
