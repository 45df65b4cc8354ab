// File: utils/logger.ts

import fs from 'fs';
import path from 'path';
import { config } from './config';

// =======================
// General Logging Section
// =======================

let logsDirReady = false;

/**
 * Returns today's log file (YYYY-MM-DD.log), creating the logs directory on first use.
 */
function logFile(): string {
  if (!logsDirReady) {
    fs.mkdirSync(config.LOG_DIR, { recursive: true });
    logsDirReady = true;
  }
  return path.join(config.LOG_DIR, `${new Date().toISOString().split('T')[0]}.log`);
}

/**
 * Appends a log message with a timestamp to the general log file.
 * If config.LOG_TERMINAL is enabled, the log message is also printed to the terminal.
 * @param message The message to log.
 */
function info(message: string): void {
  const timestamp = new Date().toISOString();
  const logEntry = `[${timestamp}] ${message}\n`;
  if (config.LOG_FILE) {
    try {
      // Synchronously append to ensure immediate write
      fs.appendFileSync(logFile(), logEntry);
    } catch (err) {
      console.error("Failed to write log:", err);
    }
  }
  if (config.LOG_TERMINAL) {
    console.log(logEntry.trim());
  }
}

/**
 * Like info(), but only when config.DEBUG is on.
 */
function debug(message: string): void {
  if (config.DEBUG) {
    info(`DEBUG ${message}`);
  }
}

function warn(message: string): void {
  info(`WARN ${message}`);
}

/**
 * Logs an error message (with an optional error stack trace) to the log file,
 * while printing only a short explanation (without the full stack trace) to the console.
 * @param message The error message.
 * @param err Optional Error object.
 */
function error(message: string, err?: Error): void {
  const fullError = `${message}${err ? ' - ' + err.stack : ''}`;
  info(`ERROR ${fullError}`);
  console.error(`${message}${err ? ' - ' + err.message : ''}`);
}

/**
 * Renders query parameters for a log line with the API key masked.
 */
function formatQuery(params: Record<string, string>): string {
  return Object.entries(params)
    .map(([name, value]) => `${name}=${name === 'key' ? '***' : value}`)
    .join('&');
}

export const log = info;
export { info, debug, warn, error, formatQuery };
export const logger = { info, debug, warn, error };
export default logger;
