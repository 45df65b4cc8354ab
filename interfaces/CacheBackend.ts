export type MaybePromise<T> = T | Promise<T>;

/** A raw HTTP response as kept in the cache. */
export interface CachedResponse {
  status: number;
  body: string;
  storedAt: number;
}

/**
 * Key/value store for responses. Implementations may answer synchronously or with a promise.
 */
export interface CacheBackend {
  get(key: string): MaybePromise<CachedResponse | undefined>;
  set(key: string, value: CachedResponse, ttlSeconds: number): MaybePromise<void>;
  delete(key: string): MaybePromise<void>;
  clear(): MaybePromise<void>;
}
