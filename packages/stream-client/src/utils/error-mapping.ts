/**
 * Maps failed HTTP handshakes to the typed ConnectionError hierarchy.
 */

import {
  ConnectionError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  type ConnectionErrorOptions,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Pull a human-readable message out of an error body. */
function extractMessage(status: number, body: unknown, text: string): string {
  if (isRecord(body)) {
    const nested = body["error"];
    if (isRecord(nested) && typeof nested["message"] === "string") {
      return nested["message"];
    }
    if (typeof body["message"] === "string") return body["message"];
    if (typeof nested === "string") return nested;
  }
  return text.trim() !== "" ? text.trim() : `HTTP ${status}`;
}

/** Pull a service error code, which may be a string or a number. */
function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const nested = body["error"];
  const source = isRecord(nested) ? nested : body;
  const code = source["code"];
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

/**
 * Parse the `Retry-After` header value.
 *
 * Only the integer-seconds form is handled; HTTP-dates are rare here.
 */
function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map a non-2xx handshake to a ConnectionError subclass.
 *
 * @param text - Raw response text, used when the body has no message field.
 */
export function mapHttpError(
  status: number,
  body: unknown,
  text = "",
  headers?: Headers,
): ConnectionError {
  const message = extractMessage(status, body, text);
  const opts: ConnectionErrorOptions = {
    status_code: status,
    error_code: extractErrorCode(body),
    retry_after: parseRetryAfter(headers),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 400:
    case 422:
      return new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 408:
      return new RequestTimeoutError(message, opts);
    case 429:
      return new RateLimitError(message, opts);
  }

  if (status >= 500) return new ServerError(message, opts);

  // Remaining statuses are not retried.
  return new ConnectionError(message, { ...opts, retryable: false });
}
