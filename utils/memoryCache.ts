/**
 * In-process TTL cache backend. Entries expire after their TTL and are dropped
 * when read after expiry, on the next set(), or by cleanup().
 */

import { CacheBackend, CachedResponse } from '../interfaces/CacheBackend';

interface CacheEntry {
  value: CachedResponse;
  expiresAt: number;
}

export interface MemoryCacheStats {
  size: number;
  hits: number;
  misses: number;
}

/**
 * @example
 * const client = new SongLink({ cacheBackend: new MemoryCacheBackend() });
 */
export class MemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  public constructor(private readonly now: () => number = Date.now) {}

  public get(key: string): CachedResponse | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  public set(key: string, value: CachedResponse, ttlSeconds: number): void {
    this.cleanup();
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  public delete(key: string): void {
    this.entries.delete(key);
  }

  public clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Removes every expired entry.
   * @returns How many entries were removed.
   */
  public cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  public get stats(): MemoryCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
