/**
 * Transport: opens an authenticated, server-streamed agent run and exposes
 * the response as a lazy sequence of frames.
 *
 * The transport never retries; retry policy belongs to the session.
 */

import { buildRequestBody, type AgentRequest } from "./request.js";
import { NetworkError } from "./types/index.js";
import {
  httpStream,
  mapHttpError,
  parseSSEStream,
  type Frame,
  type HttpStreamResponse,
} from "./utils/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Opaque credentials, sourced by the caller. */
export interface Credentials {
  token: string;
  /** Authorization scheme. Default: "Bearer". */
  scheme?: string;
}

/**
 * A lazy, finite sequence of frames.
 *
 * `close()` is the only cancellation primitive: a consumer blocked in a read
 * sees the sequence end rather than an error.
 */
export interface FrameStream extends AsyncIterable<Frame> {
  close(): Promise<void>;
}

export interface OpenOptions {
  /** Aborts the handshake and, once open, the body. */
  signal?: AbortSignal;
}

/** Anything that can open a frame stream for a request. */
export interface Transport {
  /**
   * @throws {ConnectionError} When the stream cannot be established.
   */
  open(request: AgentRequest, options?: OpenOptions): Promise<FrameStream>;
}

export interface HttpTransportConfig {
  endpoint: string;
  credentials: Credentials;
  /** Extra request headers, e.g. a user agent. */
  headers?: Record<string, string>;
}

/** Data payload that marks the end of the stream. */
export const END_MARKER = "[DONE]";

// ---------------------------------------------------------------------------
// SSE-backed frame stream
// ---------------------------------------------------------------------------

class SseFrameStream implements FrameStream {
  private closed = false;

  constructor(
    private readonly body: ReadableStream<Uint8Array>,
    private readonly controller: AbortController,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<Frame> {
    try {
      for await (const frame of parseSSEStream(this.body)) {
        if (frame.data === END_MARKER) return;
        yield frame;
      }
    } catch (err) {
      if (this.closed) return;
      throw new NetworkError("Agent stream was interrupted", { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort();
  }
}

// ---------------------------------------------------------------------------
// HttpTransport
// ---------------------------------------------------------------------------

export class HttpTransport implements Transport {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;

  constructor(config: HttpTransportConfig) {
    const { token, scheme = "Bearer" } = config.credentials;
    this.endpoint = config.endpoint;
    this.headers = {
      ...config.headers,
      Accept: "text/event-stream",
      Authorization: `${scheme} ${token}`,
    };
  }

  async open(request: AgentRequest, options?: OpenOptions): Promise<FrameStream> {
    const controller = new AbortController();
    const signal = options?.signal
      ? AbortSignal.any([options.signal, controller.signal])
      : controller.signal;

    let res: HttpStreamResponse;
    try {
      res = await httpStream(this.endpoint, buildRequestBody(request), this.headers, {
        signal,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Could not reach agent endpoint: ${reason}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      throw mapHttpError(res.status, res.body, res.text, res.headers);
    }

    return new SseFrameStream(res.body, controller);
  }
}
