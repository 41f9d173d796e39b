/**
 * Event decoder: one SSE frame in, one typed AgentEvent (or DecodeError) out.
 *
 * Pure and stateless per frame. The wire tag comes from the SSE `event:`
 * field, falling back to a `type` field in the JSON data.
 */

import { z } from "zod";
import {
  AgentEventKind,
  DecodeError,
  ErrorKind,
  UNKNOWN_PHASE,
  WireTag,
  type AgentEvent,
} from "./types/index.js";
import { isRecord, type SSEEvent } from "./utils/index.js";

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

const textDeltaSchema = z.object({ text: z.string() });

const toolUseSchema = z.object({
  tool_use_id: z.string().min(1),
  name: z.string().min(1),
  input: z.record(z.unknown()).optional(),
});

const toolResultSchema = z.object({
  tool_use_id: z.string().min(1),
  content: z.unknown().optional(),
  status: z.enum(["success", "error"]).optional(),
});

const statusSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

const errorSchema = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  message: z.string(),
});

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export type DecodeResult =
  | { ok: true; event: AgentEvent }
  | { ok: false; error: DecodeError };

function fail(message: string, frame: SSEEvent, cause?: unknown): DecodeResult {
  return { ok: false, error: new DecodeError(message, frame, { cause }) };
}

/** Apply a schema, turning a mismatch into a DecodeError for this frame. */
function parseFields<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  tag: string,
  data: Record<string, unknown>,
  frame: SSEEvent,
): { ok: true; value: T } | { ok: false; result: DecodeResult } {
  const parsed = schema.safeParse(data);
  if (parsed.success) return { ok: true, value: parsed.data };
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return {
    ok: false,
    result: fail(`Malformed "${tag}" frame: ${issues}`, frame, parsed.error),
  };
}

/**
 * Decode one frame.
 *
 * Unknown tags decode to `status { phase: "unknown" }`. Frames that are not
 * JSON objects, carry no tag, or do not match their tag's fields yield a
 * DecodeError that holds the frame verbatim.
 */
export function decodeFrame(frame: SSEEvent): DecodeResult {
  let data: unknown;
  try {
    data = JSON.parse(frame.data);
  } catch (err) {
    return fail("Frame data is not valid JSON", frame, err);
  }
  if (!isRecord(data)) {
    return fail("Frame data is not a JSON object", frame);
  }

  const typeField = data["type"];
  const tag = frame.event ?? (typeof typeField === "string" ? typeField : undefined);
  if (tag === undefined || tag === "") {
    return fail("Frame has no event tag", frame);
  }

  switch (tag) {
    case WireTag.TEXT_DELTA: {
      const fields = parseFields(textDeltaSchema, tag, data, frame);
      if (!fields.ok) return fields.result;
      return {
        ok: true,
        event: { kind: AgentEventKind.TEXT_DELTA, text: fields.value.text },
      };
    }

    case WireTag.TOOL_USE: {
      const fields = parseFields(toolUseSchema, tag, data, frame);
      if (!fields.ok) return fields.result;
      return {
        ok: true,
        event: {
          kind: AgentEventKind.TOOL_CALL_START,
          id: fields.value.tool_use_id,
          name: fields.value.name,
          arguments: fields.value.input ?? {},
        },
      };
    }

    case WireTag.TOOL_RESULT: {
      const fields = parseFields(toolResultSchema, tag, data, frame);
      if (!fields.ok) return fields.result;
      return {
        ok: true,
        event: {
          kind: AgentEventKind.TOOL_CALL_RESULT,
          id: fields.value.tool_use_id,
          payload: fields.value.content ?? null,
          isError: fields.value.status === "error",
        },
      };
    }

    case WireTag.STATUS: {
      const fields = parseFields(statusSchema, tag, data, frame);
      if (!fields.ok) return fields.result;
      return {
        ok: true,
        event: {
          kind: AgentEventKind.STATUS,
          phase: fields.value.status,
          ...(fields.value.message !== undefined
            ? { message: fields.value.message }
            : {}),
        },
      };
    }

    case WireTag.ERROR: {
      const fields = parseFields(errorSchema, tag, data, frame);
      if (!fields.ok) return fields.result;
      return {
        ok: true,
        event: {
          kind: AgentEventKind.ERROR,
          errorKind:
            fields.value.code !== undefined
              ? String(fields.value.code)
              : ErrorKind.AGENT,
          message: fields.value.message,
        },
      };
    }

    case WireTag.RESPONSE:
      return { ok: true, event: { kind: AgentEventKind.FINAL } };

    default:
      return {
        ok: true,
        event: { kind: AgentEventKind.STATUS, phase: UNKNOWN_PHASE, tag },
      };
  }
}
