export interface Config {
  SONGLINK_API_KEY?: string;
  SONGLINK_API_URL: string;
  SONGLINK_API_VERSION: string;
  SONGLINK_API_TIMEOUT: number;
  SONGLINK_PROXIES: string[];
  SONGLINK_ALWAYS_USE_PROXY: boolean;
  CACHE_PATH: string;
  CACHE_EXPIRE_AFTER: number;
  DEBUG?: boolean;
  LOG_TERMINAL?: boolean;   // Mirror log lines to the terminal
  LOG_FILE?: boolean;       // Append log lines to LOG_DIR/<date>.log
  LOG_DIR: string;
}
