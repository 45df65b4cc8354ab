/********************************************
 * utils/exceptions.ts
 *
 * Error taxonomy of the client. Every failure a query can produce is one of these;
 * upstream `code` values are translated through UPSTREAM_ERRORS.
 ********************************************/

export class SongLinkError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid client setup, e.g. no connections or an unsupported proxy URL.
 */
export class ConfigurationError extends SongLinkError {}

/**
 * Every connection is cooling down, or the API said so itself.
 * Callers decide whether and when to retry.
 */
export class TooManyRequests extends SongLinkError {
  public constructor(message = "Too many requests.") {
    super(message);
  }
}

/**
 * The API could not resolve the requested entity.
 */
export class EntityNotFound extends SongLinkError {
  public constructor(message = "Could not fetch entity data.") {
    super(message);
  }
}

export class APIException extends SongLinkError {
  public readonly statusCode: number;
  public readonly reason?: string;

  public constructor(statusCode: number, reason?: string) {
    super(`SongLink API error (HTTP ${statusCode}): ${reason ?? "unknown reason"}`);
    this.statusCode = statusCode;
    this.reason = reason;
  }
}

export const UPSTREAM_ERRORS = {
  too_many_requests: () => new TooManyRequests(),
  could_not_fetch_entity_data: () => new EntityNotFound()
} as const;

export type UpstreamErrorCode = keyof typeof UPSTREAM_ERRORS;

export function isUpstreamErrorCode(code: unknown): code is UpstreamErrorCode {
  return typeof code === "string" && Object.prototype.hasOwnProperty.call(UPSTREAM_ERRORS, code);
}

/**
 * Maps a failed response to its error. Unknown or missing codes become an APIException
 * carrying the status and the raw code.
 */
export function errorFromResponse(statusCode: number, code: unknown): SongLinkError {
  if (isUpstreamErrorCode(code)) {
    return UPSTREAM_ERRORS[code]();
  }
  return new APIException(statusCode, typeof code === "string" ? code : undefined);
}
