/**
 * Error hierarchy for agent conversation runs.
 *
 * All library errors inherit from AgentRunError. Each class carries a stable
 * `kind` string, which is what a failed RunResult records.
 */

import type { SSEEvent } from "../utils/sse.js";

// ---------------------------------------------------------------------------
// ErrorKind
// ---------------------------------------------------------------------------

export const ErrorKind = {
  CONNECTION: "ConnectionError",
  DECODE: "DecodeError",
  PROTOCOL: "ProtocolError",
  INCOMPLETE_TOOL_CALL: "IncompleteToolCall",
  UNEXPECTED_END_OF_STREAM: "UnexpectedEndOfStream",
  TIMEOUT: "TimeoutError",
  PERSISTENCE: "PersistenceError",
  CONFIGURATION: "ConfigurationError",
  /** Error event sent by the agent without its own code. */
  AGENT: "AgentError",
} as const satisfies Record<string, string>;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

// ---------------------------------------------------------------------------
// AgentRunError: base for all library errors
// ---------------------------------------------------------------------------

export class AgentRunError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;
  readonly kind: ErrorKind;

  constructor(
    message: string,
    options: { kind: ErrorKind; cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options.cause });
    this.name = "AgentRunError";
    this.kind = options.kind;
    this.retryable = options.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// ConnectionError: the transport could not open the stream
// ---------------------------------------------------------------------------

export interface ConnectionErrorOptions {
  /** HTTP status code, if a response arrived. */
  status_code?: number;
  /** Service-specific error code. */
  error_code?: string;
  /** Seconds to wait before retrying. */
  retry_after?: number;
  /** Raw error response body. */
  raw?: Record<string, unknown>;
  cause?: unknown;
}

export class ConnectionError extends AgentRunError {
  readonly status_code?: number;
  readonly error_code?: string;
  readonly retry_after?: number;
  readonly raw?: Record<string, unknown>;

  constructor(
    message: string,
    options: ConnectionErrorOptions & { retryable?: boolean } = {},
  ) {
    super(message, {
      kind: ErrorKind.CONNECTION,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "ConnectionError";
    this.status_code = options.status_code;
    this.error_code = options.error_code;
    this.retry_after = options.retry_after;
    this.raw = options.raw;
  }
}

// ---------------------------------------------------------------------------
// ConnectionError subclasses: non-retryable
// ---------------------------------------------------------------------------

/** 401: Invalid or expired token. */
export class AuthenticationError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient privileges for the agent or its tools. */
export class AccessDeniedError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Endpoint or agent not found. */
export class NotFoundError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request body. */
export class InvalidRequestError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

// ---------------------------------------------------------------------------
// ConnectionError subclasses: retryable
// ---------------------------------------------------------------------------

/** 429: Rate limit exceeded. */
export class RateLimitError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 500-599: Service internal error. */
export class ServerError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}

/** 408: The service gave up waiting for the request. */
export class RequestTimeoutError extends ConnectionError {
  constructor(message: string, options: ConnectionErrorOptions = {}) {
    super(message, { ...options, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** DNS failure, connection refused, reset before the response. */
export class NetworkError extends ConnectionError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause, retryable: true });
    this.name = "NetworkError";
  }
}

// ---------------------------------------------------------------------------
// Stream errors
// ---------------------------------------------------------------------------

/** A frame that could not be decoded into an event. */
export class DecodeError extends AgentRunError {
  /** The offending frame, verbatim. */
  readonly frame: SSEEvent;

  constructor(message: string, frame: SSEEvent, options?: { cause?: unknown }) {
    super(message, { kind: ErrorKind.DECODE, cause: options?.cause });
    this.name = "DecodeError";
    this.frame = frame;
  }
}

/** Duplicate or unmatched tool-call events. */
export class ProtocolError extends AgentRunError {
  constructor(message: string) {
    super(message, { kind: ErrorKind.PROTOCOL });
    this.name = "ProtocolError";
  }
}

/** The final event arrived while tool calls were still open. */
export class IncompleteToolCallError extends AgentRunError {
  readonly openToolCallIds: readonly string[];

  constructor(openToolCallIds: readonly string[]) {
    super(
      `Final event received with open tool calls: ${openToolCallIds.join(", ")}`,
      { kind: ErrorKind.INCOMPLETE_TOOL_CALL },
    );
    this.name = "IncompleteToolCallError";
    this.openToolCallIds = openToolCallIds;
  }
}

/** The stream closed before a final or error event. */
export class UnexpectedEndOfStreamError extends AgentRunError {
  constructor(message = "Stream closed without a final or error event") {
    super(message, { kind: ErrorKind.UNEXPECTED_END_OF_STREAM });
    this.name = "UnexpectedEndOfStreamError";
  }
}

/** The overall run deadline passed. */
export class RunTimeoutError extends AgentRunError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Run exceeded its ${timeoutMs}ms deadline`, {
      kind: ErrorKind.TIMEOUT,
    });
    this.name = "RunTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Writing the run artifact failed. Never changes the run's status. */
export class PersistenceError extends AgentRunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { kind: ErrorKind.PERSISTENCE, cause: options?.cause });
    this.name = "PersistenceError";
  }
}

/** Invalid options or environment. Not retryable. */
export class ConfigurationError extends AgentRunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { kind: ErrorKind.CONFIGURATION, cause: options?.cause });
    this.name = "ConfigurationError";
  }
}
