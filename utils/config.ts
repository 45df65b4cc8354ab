import "dotenv/config";
import { existsSync, readFileSync } from "fs";
import path from "path";
import { Config } from "../interfaces/Config";

type RawValues = Record<string, unknown>;

function isRecord(value: unknown): value is RawValues {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads config.json if present. A file that is not a JSON object is rejected.
 */
export function readConfigFile(file: string): RawValues {
  if (!existsSync(file)) return {};
  const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
  if (!isRecord(parsed)) {
    throw new Error(`${file} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Builds the configuration from config.json values (preferred) and environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, fileValues: RawValues = {}): Config {
  const raw = (key: string): unknown => (fileValues[key] !== undefined ? fileValues[key] : env[key]);

  const str = (key: string): string | undefined => {
    const value = raw(key);
    if (value === undefined || value === null) return undefined;
    const text = String(value).trim();
    return text === "" ? undefined : text;
  };

  const num = (key: string, fallback: number): number => {
    const parsed = Number(str(key));
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  };

  const bool = (key: string, fallback: boolean): boolean => {
    const value = raw(key);
    if (typeof value === "boolean") return value;
    const text = str(key);
    return text === undefined ? fallback : text.toLowerCase() === "true";
  };

  const list = (key: string): string[] => {
    const value = raw(key);
    if (Array.isArray(value)) return value.map(String).filter((entry) => entry.trim() !== "");
    return (str(key) ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry !== "");
  };

  return {
    SONGLINK_API_KEY: str("SONGLINK_API_KEY"),
    SONGLINK_API_URL: str("SONGLINK_API_URL") ?? "https://api.song.link/",
    SONGLINK_API_VERSION: str("SONGLINK_API_VERSION") ?? "v1-alpha.1",
    SONGLINK_API_TIMEOUT: num("SONGLINK_API_TIMEOUT", 60),
    SONGLINK_PROXIES: list("SONGLINK_PROXIES"),
    SONGLINK_ALWAYS_USE_PROXY: bool("SONGLINK_ALWAYS_USE_PROXY", false),
    CACHE_PATH: path.resolve(str("CACHE_PATH") ?? "data/cache.json"),
    CACHE_EXPIRE_AFTER: num("CACHE_EXPIRE_AFTER", 900),
    DEBUG: bool("DEBUG", false),
    LOG_TERMINAL: bool("LOG_TERMINAL", false),
    LOG_FILE: bool("LOG_FILE", false),
    LOG_DIR: path.resolve(str("LOG_DIR") ?? "data/logs")
  };
}

const config: Config = loadConfig(process.env, readConfigFile(path.resolve(process.cwd(), "config.json")));

export { config };
