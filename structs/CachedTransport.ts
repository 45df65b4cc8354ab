import type { AxiosInstance } from "axios";
import { CacheBackend, CachedResponse } from "../interfaces/CacheBackend";
import { debug } from "../utils/logger";

export interface CachedTransportOptions {
  /** Seconds a response stays cached. */
  expireAfter?: number;
  /** Query parameters left out of the cache key. */
  ignoredParameters?: string[];
  /** Only responses with these statuses are cached. */
  allowedCodes?: number[];
  now?: () => number;
}

export interface TransportResponse {
  status: number;
  body: string;
  fromCache: boolean;
}

/**
 * Issues GET requests through an axios client, answering from and filling the cache backend.
 */
export class CachedTransport {
  public readonly expireAfter: number;
  private readonly ignoredParameters: ReadonlySet<string>;
  private readonly allowedCodes: ReadonlySet<number>;
  private readonly now: () => number;

  public constructor(
    public readonly backend: CacheBackend | null,
    { expireAfter = 900, ignoredParameters = ["key"], allowedCodes = [200], now = Date.now }: CachedTransportOptions = {}
  ) {
    this.expireAfter = expireAfter;
    this.ignoredParameters = new Set(ignoredParameters);
    this.allowedCodes = new Set(allowedCodes);
    this.now = now;
  }

  /**
   * Identifies a request by url and its non-ignored parameters, sorted by name.
   */
  public cacheKey(url: string, params: Record<string, string>): string {
    const query = Object.keys(params)
      .filter((name) => !this.ignoredParameters.has(name))
      .sort()
      .map((name) => `${encodeURIComponent(name)}=${encodeURIComponent(params[name])}`)
      .join("&");
    return query === "" ? url : `${url}?${query}`;
  }

  public async get(
    client: AxiosInstance,
    url: string,
    params: Record<string, string>,
    timeoutMs: number
  ): Promise<TransportResponse> {
    const key = this.cacheKey(url, params);

    if (this.backend) {
      const cached = await this.backend.get(key);
      if (cached) {
        debug(`[Cache] Hit for ${key}`);
        return { status: cached.status, body: cached.body, fromCache: true };
      }
    }

    const response = await client.get<unknown>(url, { params, timeout: timeoutMs });
    const body = toText(response.data);

    if (this.backend && this.allowedCodes.has(response.status)) {
      const entry: CachedResponse = { status: response.status, body, storedAt: this.now() };
      await this.backend.set(key, entry, this.expireAfter);
    }

    return { status: response.status, body, fromCache: false };
  }

  public async clear(): Promise<void> {
    if (this.backend) {
      await this.backend.clear();
    }
  }
}

function toText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  return JSON.stringify(data);
}
