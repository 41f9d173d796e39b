/**
 * Barrel re-export for utility modules.
 */

// HTTP client wrapper
export { httpPost, httpStream, mergeHeaders } from "./http.js";
export type {
  HttpResponse,
  HttpStreamResponse,
  HttpRequestOptions,
} from "./http.js";

// SSE framing
export { parseSSEStream } from "./sse.js";
export type { SSEEvent, Frame } from "./sse.js";

// Retry loop
export {
  withRetries,
  calculateDelay,
  classifyError,
  sleep,
  DEFAULT_RETRY_POLICY,
} from "./retry.js";
export type { RetryPolicy, AttemptOutcome, RetryResult } from "./retry.js";

// Error mapping
export { mapHttpError, isRecord } from "./error-mapping.js";
