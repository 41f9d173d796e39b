/**
 * Bounded retry loop with exponential backoff and jitter.
 *
 *   - Exponential backoff: `min(baseDelay * multiplier^attempt, maxDelay)`
 *   - Jitter: `delay * random(0.5, 1.5)`
 *   - A `retry_after` hint (seconds) replaces the computed delay
 *
 * Attempts report their outcome as a value rather than by throwing, so the
 * caller decides per attempt what is retryable and what is terminal.
 */

import { AgentRunError, ConnectionError } from "../types/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for retry behavior. */
export interface RetryPolicy {
  /** Total retry attempts (not counting the initial call). Default: 3. */
  maxRetries: number;
  /** Initial delay in milliseconds. Default: 500. */
  baseDelay: number;
  /** Maximum delay between retries in milliseconds. Default: 30000. */
  maxDelay: number;
  /** Exponential backoff factor. Default: 2. */
  backoffMultiplier: number;
  /** Whether to add random jitter (+/- 50%). Default: true. */
  jitter: boolean;
  /** Called before each backoff sleep with the error, attempt number and delay. */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

/** What a single attempt produced. */
export type AttemptOutcome<T> =
  | { type: "ok"; value: T }
  | {
      type: "retryable";
      error: Error;
      /** Seconds the remote side asked us to wait. */
      retryAfter?: number;
    }
  | { type: "terminal"; error: Error };

/** Final result of the loop. `attempts` counts every call made. */
export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      error: Error;
      attempts: number;
      /**
       * terminal: an attempt was not retryable, or asked for a wait beyond
       * maxDelay. exhausted: retries ran out. aborted: the signal fired.
       */
      reason: "terminal" | "exhausted" | "aborted";
    };

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelay: 500,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Calculate the delay for a given attempt.
 *
 * `attempt` is 0-indexed (first retry = attempt 0).
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );
  return policy.jitter ? delay * (0.5 + Math.random()) : delay;
}

/** Sleep that wakes early when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Classify a thrown value by its `retryable` flag.
 *
 * Anything that is not an AgentRunError is terminal.
 */
export function classifyError(err: unknown): AttemptOutcome<never> {
  const error = err instanceof Error ? err : new Error(String(err));
  if (error instanceof AgentRunError && error.retryable) {
    return {
      type: "retryable",
      error,
      retryAfter: error instanceof ConnectionError ? error.retry_after : undefined,
    };
  }
  return { type: "terminal", error };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run `attempt` until it succeeds, reports a terminal failure, or the retry
 * budget is spent. `attempt` receives its 0-indexed attempt number.
 *
 * When `signal` aborts, no further attempt is started and any backoff sleep
 * ends immediately.
 */
export async function withRetries<T>(
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
  policy?: Partial<RetryPolicy>,
  signal?: AbortSignal,
): Promise<RetryResult<T>> {
  const p: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };
  let lastError: Error = new Error("withRetries: no attempt was made");
  let attempts = 0;

  for (let n = 0; n <= p.maxRetries; n++) {
    if (signal?.aborted) {
      return { ok: false, error: lastError, attempts, reason: "aborted" };
    }

    attempts++;
    const outcome = await attempt(n);

    if (outcome.type === "ok") {
      return { ok: true, value: outcome.value, attempts };
    }
    lastError = outcome.error;

    if (outcome.type === "terminal") {
      return { ok: false, error: lastError, attempts, reason: "terminal" };
    }
    if (n >= p.maxRetries) break;

    let delay = calculateDelay(n, p);
    if (outcome.retryAfter != null && outcome.retryAfter > 0) {
      const retryAfterMs = outcome.retryAfter * 1000;
      if (retryAfterMs > p.maxDelay) {
        return { ok: false, error: lastError, attempts, reason: "terminal" };
      }
      delay = retryAfterMs;
    }

    p.onRetry?.(lastError, n, delay);
    await sleep(delay, signal);
  }

  if (signal?.aborted) {
    return { ok: false, error: lastError, attempts, reason: "aborted" };
  }
  return { ok: false, error: lastError, attempts, reason: "exhausted" };
}
