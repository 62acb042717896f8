/**
 * errors.ts - Error taxonomy for the location-sharing client.
 *
 *   InvalidCookieFileError  cookie file missing or unreadable (construction)
 *   InvalidCookiesError     no session cookie, or session not authenticated (construction)
 *   MalformedDataError      unexpected response shape, or retries exhausted
 *   CancelledError          the caller's AbortSignal fired
 *   TransportError          network-level failure inside one attempt; retried,
 *                           never surfaced by the service itself
 */

/** Longest response excerpt kept on a MalformedDataError. */
export const MAX_BODY_EXCERPT = 500;

export function truncateBody(body: string, max: number = MAX_BODY_EXCERPT): string {
  return body.length <= max ? body : body.slice(0, max);
}

export class LocationSharingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCookieFileError extends LocationSharingError {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Cookie file not found or unreadable: ${filePath}`, options);
    this.filePath = filePath;
  }
}

export class InvalidCookiesError extends LocationSharingError {}

export class MalformedDataError extends LocationSharingError {
  /** Response body, cut to MAX_BODY_EXCERPT characters. */
  readonly body?: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    details: { body?: string; statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.body = details.body === undefined ? undefined : truncateBody(details.body);
    this.statusCode = details.statusCode;
  }
}

export class CancelledError extends LocationSharingError {
  constructor(message = 'Operation cancelled by caller', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TransportError extends LocationSharingError {
  /** Low-level error code when the HTTP client reports one (ECONNRESET, ETIMEDOUT…). */
  readonly code?: string;

  constructor(message: string, details: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.code = details.code;
  }
}
