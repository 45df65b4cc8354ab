import logger from './logger';
import { v4 as uuid } from "uuid";

/**
 * Logs an error under a short error code and returns that code, so callers can
 * quote it in their own messages. The full stack only goes to the log file.
 * @param context - Where the error occurred, e.g. "[Dispatcher] GET https://...".
 * @param err - The thrown value.
 */
export function handleError(context: string, err: unknown): string {
  const errorCode = uuid().slice(0, 8);
  const error = err instanceof Error ? err : new Error(String(err));
  logger.error(`[${errorCode}] ${context}`, error);
  return errorCode;
}
