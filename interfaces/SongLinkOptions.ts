import type { AxiosAdapter } from "axios";
import { CacheBackend } from "./CacheBackend";

export interface SongLinkOptions {
  /** Appended to every request as the `key` query parameter. */
  apiKey?: string;
  apiUrl?: string;
  apiVersion?: string;
  /** Request timeout, also the cooldown applied after a rate-limit response. */
  apiTimeoutSeconds?: number;
  /** Proxy URLs (http, https, socks4, socks5) to spread requests over. */
  proxies?: string | string[];
  /** Never connect directly, only through `proxies`. */
  alwaysUseProxy?: boolean;
  /** Where responses are cached; null turns caching off. Defaults to a file cache. */
  cacheBackend?: CacheBackend | null;
  /** Seconds a successful response stays cached. */
  cacheExpireAfter?: number;
  /** Decoder for response bodies, JSON.parse unless given. */
  jsonDecoder?: (raw: string) => unknown;
  /** Replaces axios' HTTP adapter. */
  httpAdapter?: AxiosAdapter;
}
