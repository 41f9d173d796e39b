/**
 * Run log serialization.
 *
 * On disk a log is JSON Lines: a `run` header, one line per entry, and an
 * `end` trailer. Parsing validates every line, so a reader never works with
 * a half-understood record.
 */

import { z } from "zod";
import { AgentEventKind, ContentType } from "@agent-ledger/stream-client";
import { RunSignal, type RunLog, type RunResult } from "./types.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const messageSchema = z.object({
  role: z.enum(["user", "assistant", "tool"]),
  content: z.array(
    z.union([
      z.object({ type: z.literal(ContentType.TEXT), text: z.string() }),
      z.object({
        type: z.literal(ContentType.TOOL_USE),
        tool_use: z.object({
          id: z.string(),
          name: z.string(),
          input: z.record(z.unknown()),
        }),
      }),
      z
        .object({
          type: z.literal(ContentType.TOOL_RESULT),
          tool_result: z.object({
            tool_use_id: z.string(),
            content: z.unknown(),
            status: z.enum(["success", "error"]),
          }),
        })
        .transform((part) => ({
          type: part.type,
          tool_result: {
            tool_use_id: part.tool_result.tool_use_id,
            content: part.tool_result.content,
            status: part.tool_result.status,
          },
        })),
    ]),
  ),
});

const agentEventSchema = z.union([
  z.object({ kind: z.literal(AgentEventKind.TEXT_DELTA), text: z.string() }),
  z.object({
    kind: z.literal(AgentEventKind.TOOL_CALL_START),
    id: z.string(),
    name: z.string(),
    arguments: z.record(z.unknown()),
  }),
  z
    .object({
      kind: z.literal(AgentEventKind.TOOL_CALL_RESULT),
      id: z.string(),
      payload: z.unknown(),
      isError: z.boolean(),
    })
    .transform((event) => ({
      kind: event.kind,
      id: event.id,
      payload: event.payload,
      isError: event.isError,
    })),
  z.object({
    kind: z.literal(AgentEventKind.STATUS),
    phase: z.string(),
    message: z.string().optional(),
    tag: z.string().optional(),
  }),
  z.object({
    kind: z.literal(AgentEventKind.ERROR),
    errorKind: z.string(),
    message: z.string(),
  }),
  z.object({ kind: z.literal(AgentEventKind.FINAL) }),
]);

const failureSchema = z.object({ kind: z.string(), message: z.string() });

const entrySchema = z.union([
  z.object({
    type: z.literal("event"),
    seq: z.number().int(),
    at: z.string(),
    event: agentEventSchema,
  }),
  z.object({
    type: z.literal("dropped"),
    seq: z.number().int(),
    at: z.string(),
    frame: z.object({
      event: z.string().optional(),
      data: z.string(),
      retry: z.number().optional(),
    }),
    reason: z.string(),
  }),
  z.object({
    type: z.literal("signal"),
    seq: z.number().int(),
    at: z.string(),
    signal: z.enum([RunSignal.CLOSED, RunSignal.EXPIRED, RunSignal.ABORTED]),
    failure: failureSchema.optional(),
    detail: z.string().optional(),
  }),
]);

const headerSchema = z.object({
  type: z.literal("run"),
  runId: z.string(),
  conversationId: z.string(),
  startedAt: z.string(),
  strict: z.boolean(),
  timeoutMs: z.number(),
  messages: z.array(messageSchema),
});

const trailerSchema = z.object({ type: z.literal("end"), endedAt: z.string() });

const runResultSchema = z.object({
  runId: z.string(),
  conversationId: z.string(),
  status: z.enum(["completed", "failed", "timed_out"]),
  answer: z.string(),
  toolCalls: z.array(
    z
      .object({
        id: z.string(),
        name: z.string(),
        arguments: z.record(z.unknown()),
        state: z.enum(["started", "completed", "failed"]),
        payload: z.unknown(),
        startedSeq: z.number().int(),
        finishedSeq: z.number().int().optional(),
      })
      .transform(({ payload, finishedSeq, ...call }) => ({
        ...call,
        ...(payload !== undefined ? { payload } : {}),
        ...(finishedSeq !== undefined ? { finishedSeq } : {}),
      })),
  ),
  events: z.array(agentEventSchema),
  error: failureSchema.optional(),
  lastPhase: z.string().optional(),
  droppedFrames: z.number().int(),
  conversation: z.object({ id: z.string(), messages: z.array(messageSchema) }),
  startedAt: z.string(),
  endedAt: z.string(),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function serializeRunLog(log: RunLog): string {
  const lines = [
    JSON.stringify({ type: "run", ...log.header }),
    ...log.entries.map((entry) => JSON.stringify(entry)),
    JSON.stringify({ type: "end", endedAt: log.endedAt }),
  ];
  return lines.join("\n") + "\n";
}

function parseRecord<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  where: string,
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error(`${where}: not valid JSON`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
    throw new Error(`${where}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Parse a JSON Lines run log.
 *
 * @param source - Name used in error messages, usually the file path.
 * @throws {Error} When a line is not JSON or does not match its record shape,
 *   or the header or trailer is missing.
 */
export function parseRunLog(text: string, source = "events.jsonl"): RunLog {
  const lines = text.split("\n").filter((line) => line.trim() !== "");
  const first = lines[0];
  const last = lines[lines.length - 1];
  if (first === undefined || last === undefined || lines.length < 2) {
    throw new Error(`${source}: expected a header and a trailer line`);
  }

  const header = parseRecord(headerSchema, first, `${source}:1`);
  const trailer = parseRecord(trailerSchema, last, `${source}:${lines.length}`);
  const entries = lines
    .slice(1, -1)
    .map((line, index) => parseRecord(entrySchema, line, `${source}:${index + 2}`));

  return {
    header: {
      runId: header.runId,
      conversationId: header.conversationId,
      startedAt: header.startedAt,
      strict: header.strict,
      timeoutMs: header.timeoutMs,
      messages: header.messages,
    },
    entries,
    endedAt: trailer.endedAt,
  };
}

/**
 * Parse a stored `result.json`.
 *
 * @throws {Error} When the document does not match the RunResult shape.
 */
export function parseRunResult(text: string, source = "result.json"): RunResult {
  return parseRecord(runResultSchema, text, source);
}
