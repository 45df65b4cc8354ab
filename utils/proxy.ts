import type { Agent } from "http";
import { HttpsProxyAgent } from "https-proxy-agent";
import { SocksProxyAgent } from "socks-proxy-agent";
import { ConfigurationError } from "./exceptions";

const HTTP_PROTOCOLS = new Set(["http:", "https:"]);
const SOCKS_PROTOCOLS = new Set(["socks:", "socks4:", "socks4a:", "socks5:", "socks5h:"]);

/**
 * Creates the agent that tunnels requests through the given proxy URL.
 * http(s) proxies are reached with CONNECT, socks proxies through socks-proxy-agent.
 * @throws ConfigurationError for malformed URLs or unsupported schemes.
 */
export function createProxyAgent(proxyUrl: string): Agent {
  let url: URL;
  try {
    url = new URL(proxyUrl);
  } catch {
    throw new ConfigurationError(`Invalid proxy URL: ${proxyUrl}`);
  }

  if (HTTP_PROTOCOLS.has(url.protocol)) {
    return new HttpsProxyAgent(url);
  }
  if (SOCKS_PROTOCOLS.has(url.protocol)) {
    return new SocksProxyAgent(url);
  }
  throw new ConfigurationError(`Unsupported proxy protocol "${url.protocol}" in ${url.host}`);
}
