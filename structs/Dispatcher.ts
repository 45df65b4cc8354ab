import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { Payload, isPayload } from "../interfaces/ApiPayload";
import { handleError } from "../utils/errorHandler";
import { TooManyRequests, errorFromResponse } from "../utils/exceptions";
import { debug, formatQuery, log } from "../utils/logger";
import { createProxyAgent } from "../utils/proxy";
import { APIResponse } from "./APIResponse";
import { CachedTransport, TransportResponse } from "./CachedTransport";
import { Connection, ConnectionPool, describeConnection } from "./ConnectionPool";

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;
export type JsonDecoder = (raw: string) => unknown;

export interface DispatcherOptions {
  apiKey?: string;
  apiUrl: string;
  apiVersion: string;
  apiTimeoutSeconds: number;
  pool: ConnectionPool;
  transport: CachedTransport;
  jsonDecoder?: JsonDecoder;
  httpAdapter?: AxiosAdapter;
  userAgent: string;
}

/**
 * Performs one API call per dispatch(): picks a connection, sends a cached GET
 * and turns the response into an APIResponse or a typed error.
 */
export class Dispatcher {
  private readonly clients = new Map<Connection, AxiosInstance>();
  private readonly apiUrl: string;
  private readonly jsonDecoder: JsonDecoder;

  public constructor(private readonly options: DispatcherOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.jsonDecoder = options.jsonDecoder ?? JSON.parse;

    // Build proxy agents up front so a bad proxy URL fails at construction.
    for (const connection of options.pool.connections) {
      this.clientFor(connection);
    }
  }

  public endpoint(method: string): string {
    return `${this.apiUrl}/${this.options.apiVersion}/${method}`;
  }

  /**
   * Drops null and undefined values, stringifies the rest and appends the API key.
   */
  public buildQuery(params: QueryParams): Record<string, string> {
    const query: Record<string, string> = {};
    for (const [name, value] of Object.entries(params)) {
      if (value !== null && value !== undefined) {
        query[name] = String(value);
      }
    }
    if (this.options.apiKey !== undefined) {
      query.key = this.options.apiKey;
    }
    return query;
  }

  /**
   * @throws TooManyRequests when no connection is free or the API rate-limits the call.
   * @throws EntityNotFound when the API cannot resolve the entity.
   * @throws APIException for any other failed response.
   */
  public async dispatch(method: string, params: QueryParams = {}): Promise<APIResponse> {
    const { pool, transport, apiTimeoutSeconds } = this.options;
    const connection = pool.pickAvailable();

    const url = this.endpoint(method);
    const query = this.buildQuery(params);
    debug(`[Dispatcher] GET ${url}?${formatQuery(query)} via ${describeConnection(connection)}`);

    let response: TransportResponse;
    try {
      response = await transport.get(this.clientFor(connection), url, query, apiTimeoutSeconds * 1000);
    } catch (err) {
      handleError(`[Dispatcher] GET ${url} via ${describeConnection(connection)} failed`, err);
      throw err;
    }

    const data = this.decode(response.body);

    if (response.status !== 200 || Object.keys(data).length === 0) {
      const error = errorFromResponse(response.status, data.code);
      if (error instanceof TooManyRequests) {
        pool.markCooldown(connection, apiTimeoutSeconds);
      }
      log(`[Dispatcher] ${url} answered ${response.status}: ${error.message}`);
      throw error;
    }

    const requestedCountry = typeof params.userCountry === "string" ? params.userCountry : undefined;
    return APIResponse.from(data, requestedCountry);
  }

  /**
   * Bodies that are not JSON objects decode to an empty object.
   */
  private decode(body: string): Payload {
    try {
      const decoded = this.jsonDecoder(body);
      return isPayload(decoded) ? decoded : {};
    } catch (err) {
      debug(`[Dispatcher] Response body is not JSON: ${err instanceof Error ? err.message : String(err)}`);
      return {};
    }
  }

  private clientFor(connection: Connection): AxiosInstance {
    let client = this.clients.get(connection);
    if (!client) {
      const agent = connection === null ? undefined : createProxyAgent(connection);
      client = axios.create({
        adapter: this.options.httpAdapter,
        httpAgent: agent,
        httpsAgent: agent,
        proxy: false,
        headers: { "User-Agent": this.options.userAgent },
        responseType: "text",
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true
      });
      this.clients.set(connection, client);
    }
    return client;
  }
}
