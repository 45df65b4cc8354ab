import { CacheBackend } from "../interfaces/CacheBackend";
import { SongLinkOptions } from "../interfaces/SongLinkOptions";
import { FileCacheBackend } from "../utils/cache";
import { config } from "../utils/config";
import { debug } from "../utils/logger";
import { EntityType, PlatformName } from "../utils/platform";
import { userAgent } from "../utils/version";
import { APIResponse } from "./APIResponse";
import { CachedTransport } from "./CachedTransport";
import { ConnectionPool } from "./ConnectionPool";
import { Dispatcher } from "./Dispatcher";

/**
 * Client for the song.link links API.
 *
 * @example
 * const songLink = new SongLink({ apiKey: process.env.SONGLINK_API_KEY });
 * const response = await songLink.linksByUrl("https://open.spotify.com/track/0Jcij1eWd5bDMU5iPbxe2i");
 * console.log(response.getLink("appleMusic")?.url);
 */
export class SongLink {
  public readonly apiKey?: string;
  public readonly apiUrl: string;
  public readonly apiVersion: string;
  public readonly apiTimeoutSeconds: number;
  public readonly connections: ConnectionPool;
  public readonly cacheBackend: CacheBackend | null;
  private readonly transport: CachedTransport;
  private readonly dispatcher: Dispatcher;

  public constructor(options: SongLinkOptions = {}) {
    this.apiKey = options.apiKey ?? config.SONGLINK_API_KEY;
    this.apiUrl = (options.apiUrl ?? config.SONGLINK_API_URL).replace(/\/+$/, "");
    this.apiVersion = options.apiVersion ?? config.SONGLINK_API_VERSION;
    this.apiTimeoutSeconds = options.apiTimeoutSeconds ?? config.SONGLINK_API_TIMEOUT;

    this.connections = new ConnectionPool({
      proxies: options.proxies ?? config.SONGLINK_PROXIES,
      alwaysUseProxy: options.alwaysUseProxy ?? config.SONGLINK_ALWAYS_USE_PROXY
    });

    this.cacheBackend = options.cacheBackend === undefined ? new FileCacheBackend(config.CACHE_PATH) : options.cacheBackend;
    this.transport = new CachedTransport(this.cacheBackend, {
      expireAfter: options.cacheExpireAfter ?? config.CACHE_EXPIRE_AFTER,
      ignoredParameters: ["key"],
      allowedCodes: [200]
    });

    this.dispatcher = new Dispatcher({
      apiKey: this.apiKey,
      apiUrl: this.apiUrl,
      apiVersion: this.apiVersion,
      apiTimeoutSeconds: this.apiTimeoutSeconds,
      pool: this.connections,
      transport: this.transport,
      jsonDecoder: options.jsonDecoder,
      httpAdapter: options.httpAdapter,
      userAgent
    });

    debug(`[SongLink] Client ready for ${this.apiUrl}/${this.apiVersion} with ${this.connections.size} connection(s).`);
  }

  /**
   * Resolves links for a song or album URL from any supported platform.
   * @param url - e.g. a Spotify track or Apple Music album URL.
   * @param userCountry - Two-letter country code the links should be valid in.
   * @param songIfSingle - For single-track albums, resolve the song rather than the album.
   */
  public linksByUrl(url: string, userCountry: string = "US", songIfSingle: boolean = false): Promise<APIResponse> {
    return this.dispatcher.dispatch("links", {
      url,
      userCountry: userCountry.toUpperCase(),
      songIfSingle: songIfSingle ? "true" : "false"
    });
  }

  /**
   * Resolves links for an entity by its id on a given platform.
   * @param id - The platform's id, e.g. a Spotify track id or an iTunes numeric id.
   */
  public linksById(
    id: string | number,
    platform: PlatformName,
    type: EntityType,
    userCountry: string = "US",
    songIfSingle: boolean = false
  ): Promise<APIResponse> {
    return this.dispatcher.dispatch("links", {
      id,
      platform,
      type,
      userCountry: userCountry.toUpperCase(),
      songIfSingle: songIfSingle ? "true" : "false"
    });
  }

  public clearCache(): Promise<void> {
    return this.transport.clear();
  }

  public toString(): string {
    return `<SongLink apiUrl=${this.apiUrl}/${this.apiVersion}>`;
  }
}
