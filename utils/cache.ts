/********************************************
 * utils/cache.ts
 *
 * A CacheBackend that keeps responses in a JSON file (by default data/cache.json).
 * The file maps each request key to the cached response and its expiry time.
 *
 * The file is read once, on first access, and rewritten after every change.
 * Expired entries are evicted whenever a new entry is stored.
 * Writes are chained so that concurrent requests never interleave them.
 ********************************************/

import { promises as fs } from 'fs';
import path from 'path';
import { CacheBackend, CachedResponse } from '../interfaces/CacheBackend';
import { isPayload } from '../interfaces/ApiPayload';
import { log, debug } from './logger';
import { handleError } from './errorHandler';

export interface FileCacheEntry {
  value: CachedResponse;
  expiresAt: number;
}

export type FileCache = {
  [requestKey: string]: FileCacheEntry;
};

function isCacheEntry(value: unknown): value is FileCacheEntry {
  if (!isPayload(value) || typeof value.expiresAt !== 'number' || !isPayload(value.value)) return false;
  const { status, body, storedAt } = value.value;
  return typeof status === 'number' && typeof body === 'string' && typeof storedAt === 'number';
}

export class FileCacheBackend implements CacheBackend {
  private entries?: Promise<Map<string, FileCacheEntry>>;
  private writing: Promise<void> = Promise.resolve();

  public constructor(
    public readonly filePath: string,
    private readonly now: () => number = Date.now
  ) {}

  public async get(key: string): Promise<CachedResponse | undefined> {
    const entries = await this.load();
    const entry = entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      entries.delete(key);
      await this.save(entries);
      return undefined;
    }
    return entry.value;
  }

  public async set(key: string, value: CachedResponse, ttlSeconds: number): Promise<void> {
    const entries = await this.load();
    const now = this.now();
    for (const [storedKey, entry] of entries) {
      if (now >= entry.expiresAt) entries.delete(storedKey);
    }
    entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
    await this.save(entries);
  }

  public async delete(key: string): Promise<void> {
    const entries = await this.load();
    if (entries.delete(key)) {
      await this.save(entries);
    }
  }

  public async clear(): Promise<void> {
    const entries = await this.load();
    entries.clear();
    await this.save(entries);
  }

  private load(): Promise<Map<string, FileCacheEntry>> {
    if (!this.entries) {
      this.entries = this.readFile();
    }
    return this.entries;
  }

  /**
   * Reads the cache file. A missing file is an empty cache; an unreadable one is
   * logged and replaced by an empty cache on the next save.
   */
  private async readFile(): Promise<Map<string, FileCacheEntry>> {
    const entries = new Map<string, FileCacheEntry>();
    let rawData: string;
    try {
      rawData = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        debug(`[Cache] No cache file at ${this.filePath}, starting empty.`);
        return entries;
      }
      handleError(`[Cache] Error reading ${this.filePath}`, err);
      return entries;
    }

    try {
      const parsed: unknown = JSON.parse(rawData);
      if (isPayload(parsed)) {
        for (const [key, entry] of Object.entries(parsed)) {
          if (isCacheEntry(entry)) entries.set(key, entry);
        }
      }
      log(`[Cache] Loaded ${entries.size} entries from ${this.filePath}.`);
    } catch (err) {
      handleError(`[Cache] Error parsing ${this.filePath}`, err);
    }
    return entries;
  }

  private save(entries: Map<string, FileCacheEntry>): Promise<void> {
    const cache: FileCache = Object.fromEntries(entries);
    this.writing = this.writing.then(async () => {
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, JSON.stringify(cache, null, 2), 'utf-8');
      } catch (err) {
        handleError(`[Cache] Error saving ${this.filePath}`, err);
      }
    });
    return this.writing;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
