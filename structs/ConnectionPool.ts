import { ConfigurationError, TooManyRequests } from "../utils/exceptions";
import { warn } from "../utils/logger";

/** A proxy URL, or null for a direct connection. */
export type Connection = string | null;

export interface ConnectionPoolOptions {
  proxies?: string | string[];
  alwaysUseProxy?: boolean;
  now?: () => number;
  random?: () => number;
}

/**
 * The egress paths requests may take, each either free or cooling down after the
 * API rate-limited it. Cooldowns are stored as epoch milliseconds.
 */
export class ConnectionPool {
  private readonly cooldowns = new Map<Connection, number | null>();
  private readonly now: () => number;
  private readonly random: () => number;

  public constructor({ proxies, alwaysUseProxy = false, now = Date.now, random = Math.random }: ConnectionPoolOptions = {}) {
    const proxyList = proxies === undefined ? [] : Array.isArray(proxies) ? proxies : [proxies];
    for (const proxy of proxyList) {
      this.cooldowns.set(proxy, null);
    }
    if (!alwaysUseProxy) {
      this.cooldowns.set(null, null);
    }
    if (this.cooldowns.size === 0) {
      throw new ConfigurationError("No connections specified.");
    }

    this.now = now;
    this.random = random;
  }

  public get connections(): Connection[] {
    return [...this.cooldowns.keys()];
  }

  public get size(): number {
    return this.cooldowns.size;
  }

  public get availableCount(): number {
    return this.connections.filter((connection) => this.isAvailable(connection)).length;
  }

  public isAvailable(connection: Connection): boolean {
    if (!this.cooldowns.has(connection)) return false;
    const until = this.cooldownUntil(connection);
    return until === null || this.now() >= until;
  }

  public cooldownUntil(connection: Connection): number | null {
    return this.cooldowns.get(connection) ?? null;
  }

  /**
   * Picks a random connection that is not cooling down.
   * @throws TooManyRequests when every connection is cooling down.
   */
  public pickAvailable(): Connection {
    const available = this.connections.filter((connection) => this.isAvailable(connection));
    if (available.length === 0) {
      throw new TooManyRequests();
    }
    const index = Math.min(Math.floor(this.random() * available.length), available.length - 1);
    return available[index];
  }

  /**
   * Excludes a connection from selection for the given number of seconds.
   */
  public markCooldown(connection: Connection, durationSeconds: number): void {
    if (!this.cooldowns.has(connection)) return;
    const until = this.now() + durationSeconds * 1000;
    this.cooldowns.set(connection, until);
    warn(`[ConnectionPool] ${describeConnection(connection)} cooling down until ${new Date(until).toISOString()}`);
  }
}

export function describeConnection(connection: Connection): string {
  return connection === null ? "direct" : `proxy ${redactProxy(connection)}`;
}

/**
 * Hides proxy credentials for log lines.
 */
function redactProxy(proxy: string): string {
  try {
    const url = new URL(proxy);
    if (url.username || url.password) {
      url.username = "***";
      url.password = "";
    }
    return url.toString();
  } catch {
    return "<invalid proxy url>";
  }
}
