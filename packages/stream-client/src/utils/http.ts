/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * JSON POST helpers: a buffered variant for single-shot calls and a
 * streaming variant that hands back the raw body for SSE parsing.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from a non-streaming HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

/**
 * Resolved response from a streaming HTTP request.
 *
 * Non-2xx responses are buffered so the caller can map them to an error;
 * only a 2xx response exposes the live body.
 */
export type HttpStreamResponse =
  | {
      ok: true;
      status: number;
      headers: Headers;
      body: ReadableStream<Uint8Array>;
    }
  | {
      ok: false;
      status: number;
      headers: Headers;
      /** Parsed JSON error body, if any. */
      body: unknown;
      text: string;
    };

/** Options shared by both `httpPost` and `httpStream`. */
export interface HttpRequestOptions {
  /** Request timeout in milliseconds. Combined with any user-provided signal. */
  timeout?: number;
  /** Optional caller-provided abort signal. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) Object.assign(merged, set);
  }
  return merged;
}

/** Combine the caller's signal with a timeout signal, if either is given. */
function buildSignal(options?: HttpRequestOptions): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (options?.signal) signals.push(options.signal);
  if (options?.timeout != null && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout));
  }

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * Non-2xx statuses still resolve; the caller maps them to errors.
 *
 * @throws {Error} On network-level failures or abort/timeout.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const res = await fetch(url, {
    method: "POST",
    headers: mergeHeaders(headers),
    body: JSON.stringify(body),
    signal: buildSignal(options),
  });

  const text = await res.text();
  return {
    status: res.status,
    headers: res.headers,
    body: parseJson(text),
    text,
  };
}

/**
 * Send a JSON POST request and return a streaming response.
 *
 * The caller owns the returned body and must consume or cancel it.
 *
 * @throws {Error} On network-level failures or abort/timeout before the
 *   response headers arrive, or when a 2xx response has no body.
 */
export async function httpStream(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpStreamResponse> {
  const res = await fetch(url, {
    method: "POST",
    headers: mergeHeaders(headers),
    body: JSON.stringify(body),
    signal: buildSignal(options),
  });

  if (!res.ok) {
    const text = await res.text();
    return {
      ok: false,
      status: res.status,
      headers: res.headers,
      body: parseJson(text),
      text,
    };
  }

  if (!res.body) {
    throw new Error("Response body is null -- streaming not supported");
  }

  return { ok: true, status: res.status, headers: res.headers, body: res.body };
}
