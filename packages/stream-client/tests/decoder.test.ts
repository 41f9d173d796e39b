import { describe, it, expect } from "vitest";
import { decodeFrame } from "../src/decoder.js";
import { AgentEventKind, DecodeError, type SSEEvent } from "../src/index.js";

function frame(event: string | undefined, data: unknown): SSEEvent {
  return { event, data: typeof data === "string" ? data : JSON.stringify(data) };
}

function decodeOk(input: SSEEvent) {
  const result = decodeFrame(input);
  if (!result.ok) throw new Error(`expected a decoded event, got: ${result.error.message}`);
  return result.event;
}

function decodeErr(input: SSEEvent): DecodeError {
  const result = decodeFrame(input);
  if (result.ok) throw new Error(`expected a decode error, got: ${result.event.kind}`);
  return result.error;
}

// ---------------------------------------------------------------------------
// Known tags
// ---------------------------------------------------------------------------

describe("decodeFrame — known tags", () => {
  it("decodes a text delta", () => {
    expect(decodeOk(frame("response.text.delta", { text: "Hello" }))).toEqual({
      kind: AgentEventKind.TEXT_DELTA,
      text: "Hello",
    });
  });

  it("decodes a tool use into a tool call start", () => {
    const event = decodeOk(
      frame("response.tool_use", {
        tool_use_id: "t1",
        name: "search",
        input: { query: "revenue" },
      }),
    );
    expect(event).toEqual({
      kind: AgentEventKind.TOOL_CALL_START,
      id: "t1",
      name: "search",
      arguments: { query: "revenue" },
    });
  });

  it("defaults missing tool input to an empty object", () => {
    const event = decodeOk(frame("response.tool_use", { tool_use_id: "t1", name: "sql" }));
    expect(event).toEqual({
      kind: AgentEventKind.TOOL_CALL_START,
      id: "t1",
      name: "sql",
      arguments: {},
    });
  });

  it("decodes a successful tool result", () => {
    const event = decodeOk(
      frame("response.tool_result", {
        tool_use_id: "t1",
        content: [{ rows: 3 }],
        status: "success",
      }),
    );
    expect(event).toEqual({
      kind: AgentEventKind.TOOL_CALL_RESULT,
      id: "t1",
      payload: [{ rows: 3 }],
      isError: false,
    });
  });

  it("marks an error tool result and defaults its payload to null", () => {
    const event = decodeOk(
      frame("response.tool_result", { tool_use_id: "t1", status: "error" }),
    );
    expect(event).toEqual({
      kind: AgentEventKind.TOOL_CALL_RESULT,
      id: "t1",
      payload: null,
      isError: true,
    });
  });

  it("decodes a status with and without a message", () => {
    expect(
      decodeOk(frame("response.status", { status: "planning", message: "thinking" })),
    ).toEqual({ kind: AgentEventKind.STATUS, phase: "planning", message: "thinking" });
    expect(decodeOk(frame("response.status", { status: "executing" }))).toEqual({
      kind: AgentEventKind.STATUS,
      phase: "executing",
    });
  });

  it("uses the error code as the error kind", () => {
    expect(decodeOk(frame("error", { code: 399504, message: "quota" }))).toEqual({
      kind: AgentEventKind.ERROR,
      errorKind: "399504",
      message: "quota",
    });
  });

  it("falls back to AgentError when the error has no code", () => {
    expect(decodeOk(frame("error", { message: "boom" }))).toEqual({
      kind: AgentEventKind.ERROR,
      errorKind: "AgentError",
      message: "boom",
    });
  });

  it("decodes the final response regardless of its body", () => {
    expect(decodeOk(frame("response", { content: [] }))).toEqual({
      kind: AgentEventKind.FINAL,
    });
  });

  it("takes the tag from the data type field when the frame has no event", () => {
    expect(decodeOk(frame(undefined, { type: "response.text.delta", text: "x" }))).toEqual({
      kind: AgentEventKind.TEXT_DELTA,
      text: "x",
    });
  });
});

// ---------------------------------------------------------------------------
// Unknown and malformed frames
// ---------------------------------------------------------------------------

describe("decodeFrame — unknown and malformed frames", () => {
  it("maps an unknown tag to an unknown-phase status", () => {
    expect(decodeOk(frame("response.thinking.delta", { text: "hmm" }))).toEqual({
      kind: AgentEventKind.STATUS,
      phase: "unknown",
      tag: "response.thinking.delta",
    });
  });

  it("rejects non-JSON data and keeps the frame verbatim", () => {
    const input = frame("response.text.delta", "{not json");
    const error = decodeErr(input);
    expect(error).toBeInstanceOf(DecodeError);
    expect(error.message).toBe("Frame data is not valid JSON");
    expect(error.frame).toEqual({ event: "response.text.delta", data: "{not json" });
    expect(error.kind).toBe("DecodeError");
  });

  it("rejects JSON that is not an object", () => {
    expect(decodeErr(frame("response.text.delta", "[1,2]")).message).toBe(
      "Frame data is not a JSON object",
    );
  });

  it("rejects a frame without any tag", () => {
    expect(decodeErr(frame(undefined, { text: "x" })).message).toBe(
      "Frame has no event tag",
    );
  });

  it("rejects a known tag whose fields do not match", () => {
    expect(decodeErr(frame("response.text.delta", { text: 5 })).message).toBe(
      'Malformed "response.text.delta" frame: text: Expected string, received number',
    );
  });

  it("rejects a tool use without a name", () => {
    expect(decodeErr(frame("response.tool_use", { tool_use_id: "t1" })).message).toBe(
      'Malformed "response.tool_use" frame: name: Required',
    );
  });
});
