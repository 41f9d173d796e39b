/**
 * Server-Sent Events (SSE) framing.
 *
 * Splits a `ReadableStream<Uint8Array>` into frames, one per dispatched SSE
 * event:
 *   - `event:` sets the frame's tag
 *   - `data:` lines are joined with "\n"
 *   - `retry:` sets a reconnection interval
 *   - `:` comment lines are skipped
 *   - a blank line dispatches the frame
 *
 * Chunks may split anywhere, including inside a multi-byte character.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single dispatched SSE event. */
export interface SSEEvent {
  /** The event type (from `event:` line). `undefined` if not specified. */
  event?: string;
  /** The event data (from `data:` lines, joined with newlines). */
  data: string;
  /** Reconnection interval in milliseconds (from `retry:` line). */
  retry?: number;
}

/** One raw unit received from the transport, before decoding. */
export type Frame = SSEEvent;

// ---------------------------------------------------------------------------
// FrameAssembler
// ---------------------------------------------------------------------------

/** Accumulates field lines until a blank line completes a frame. */
class FrameAssembler {
  private tag: string | undefined;
  private dataLines: string[] = [];
  private retry: number | undefined;

  /** Feed one line. Returns a frame when the line dispatches one. */
  line(line: string): SSEEvent | undefined {
    if (line === "") return this.dispatch();
    if (line.startsWith(":")) return undefined;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    switch (field) {
      case "event":
        this.tag = value;
        break;
      case "data":
        this.dataLines.push(value);
        break;
      case "retry": {
        const parsed = parseInt(value, 10);
        if (!Number.isNaN(parsed)) this.retry = parsed;
        break;
      }
      // id and unknown fields carry nothing we use.
    }
    return undefined;
  }

  /** Emit the pending frame, if it has data, and reset. */
  dispatch(): SSEEvent | undefined {
    const frame =
      this.dataLines.length > 0
        ? { event: this.tag, data: this.dataLines.join("\n"), retry: this.retry }
        : undefined;
    this.tag = undefined;
    this.dataLines = [];
    this.retry = undefined;
    return frame;
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a byte stream as SSE frames.
 *
 * Frames are yielded as soon as they are complete. A trailing frame without
 * its blank line is still dispatched when the stream closes.
 */
export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
): AsyncIterableIterator<SSEEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  const assembler = new FrameAssembler();
  let pending = "";

  try {
    for (;;) {
      const { value, done } = await reader.read();

      if (done) {
        pending += decoder.decode();
        if (pending !== "") assembler.line(pending);
        const last = assembler.dispatch();
        if (last) yield last;
        return;
      }

      pending += decoder.decode(value, { stream: true });

      // Lines end in \r\n, \r or \n; the final segment may be incomplete.
      const lines = pending.split(/\r\n|\r|\n/);
      pending = lines.pop() ?? "";

      for (const line of lines) {
        const frame = assembler.line(line);
        if (frame) yield frame;
      }
    }
  } finally {
    reader.releaseLock();
  }
}
