import { describe, it, expect } from "vitest";
import {
  AgentEventKind,
  createCallerMessage,
  type AgentEvent,
} from "@agent-ledger/stream-client";
import { aggregateRunResult, buildAgentMessage, replayRunLog } from "../src/aggregator.js";
import { parseRunLog, serializeRunLog } from "../src/run-log.js";
import { ConversationStateMachine } from "../src/state-machine.js";
import type { RunHeader, RunLog } from "../src/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const header: RunHeader = {
  runId: "run-1",
  conversationId: "conv-1",
  startedAt: "2026-01-01T00:00:00.000Z",
  strict: false,
  timeoutMs: 1000,
  messages: [createCallerMessage("Find matches")],
};
const ENDED = "2026-01-01T00:00:05.000Z";

let tick = 0;
function clock(): string {
  tick++;
  return `2026-01-01T00:00:0${Math.min(tick, 4)}.000Z`;
}

const scenarioB: AgentEvent[] = [
  { kind: AgentEventKind.TOOL_CALL_START, id: "1", name: "search", arguments: { q: "m" } },
  { kind: AgentEventKind.TEXT_DELTA, text: "Checking…" },
  { kind: AgentEventKind.TOOL_CALL_RESULT, id: "1", payload: { hits: 3 }, isError: false },
  { kind: AgentEventKind.TEXT_DELTA, text: " Found 3 matches." },
  { kind: AgentEventKind.FINAL },
];

/** Run events through a machine, then return the live result and its log. */
function live(events: AgentEvent[], finish?: (m: ConversationStateMachine) => void) {
  tick = 0;
  const machine = new ConversationStateMachine({
    strict: header.strict,
    timeoutMs: header.timeoutMs,
    now: clock,
  });
  for (const event of events) machine.apply(event);
  finish?.(machine);
  const snapshot = machine.snapshot();
  const log: RunLog = { header, entries: snapshot.entries, endedAt: ENDED };
  return { result: aggregateRunResult(snapshot, header, ENDED), log };
}

// ---------------------------------------------------------------------------
// buildAgentMessage
// ---------------------------------------------------------------------------

describe("buildAgentMessage", () => {
  it("merges consecutive text and keeps tool parts in arrival order", () => {
    expect(buildAgentMessage(scenarioB)).toEqual({
      role: "assistant",
      content: [
        { type: "tool_use", tool_use: { id: "1", name: "search", input: { q: "m" } } },
        { type: "text", text: "Checking…" },
        {
          type: "tool_result",
          tool_result: { tool_use_id: "1", content: { hits: 3 }, status: "success" },
        },
        { type: "text", text: " Found 3 matches." },
      ],
    });
  });

  it("returns undefined when the agent produced no content", () => {
    expect(
      buildAgentMessage([{ kind: AgentEventKind.STATUS, phase: "planning" }]),
    ).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// aggregateRunResult
// ---------------------------------------------------------------------------

describe("aggregateRunResult", () => {
  it("builds the completed result for a tool-using run", () => {
    const { result } = live(scenarioB);

    expect(result).toMatchObject({
      runId: "run-1",
      conversationId: "conv-1",
      status: "completed",
      answer: "Checking… Found 3 matches.",
      droppedFrames: 0,
      startedAt: header.startedAt,
      endedAt: ENDED,
    });
    expect(result.error).toBeUndefined();
    expect(result.events).toEqual(scenarioB);
    expect(result.toolCalls).toEqual([
      {
        id: "1",
        name: "search",
        arguments: { q: "m" },
        state: "completed",
        payload: { hits: 3 },
        startedSeq: 0,
        finishedSeq: 2,
      },
    ]);
    expect(result.conversation.messages).toHaveLength(2);
    expect(result.conversation.messages[0]).toEqual(createCallerMessage("Find matches"));
  });

  it("keeps partial text on a failed run", () => {
    const { result } = live([{ kind: AgentEventKind.TEXT_DELTA, text: "partial" }], (m) =>
      m.close(),
    );
    expect(result.status).toBe("failed");
    expect(result.answer).toBe("partial");
    expect(result.error?.kind).toBe("UnexpectedEndOfStream");
  });

  it("returns a deeply frozen result", () => {
    const { result } = live(scenarioB);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.toolCalls[0])).toBe(true);
    expect(Object.isFrozen(result.conversation.messages)).toBe(true);
  });

  it("refuses a snapshot that is not terminal", () => {
    const machine = new ConversationStateMachine();
    machine.apply({ kind: AgentEventKind.TEXT_DELTA, text: "x" });
    expect(() => aggregateRunResult(machine.snapshot(), header, ENDED)).toThrow(
      'Cannot aggregate a run in state "streaming"',
    );
  });
});

// ---------------------------------------------------------------------------
// replayRunLog
// ---------------------------------------------------------------------------

describe("replayRunLog", () => {
  it.each([
    ["completed tool run", scenarioB, undefined],
    [
      "incomplete tool call",
      [scenarioB[0], { kind: AgentEventKind.FINAL }] satisfies AgentEvent[],
      undefined,
    ],
    [
      "closed stream",
      [{ kind: AgentEventKind.TEXT_DELTA, text: "partial" }] satisfies AgentEvent[],
      (m: ConversationStateMachine) => m.close("socket reset"),
    ],
    [
      "timeout",
      [{ kind: AgentEventKind.STATUS, phase: "executing" }] satisfies AgentEvent[],
      (m: ConversationStateMachine) => m.expire(),
    ],
    [
      "connection failure",
      [] satisfies AgentEvent[],
      (m: ConversationStateMachine) =>
        m.abort({ kind: "ConnectionError", message: "refused" }),
    ],
  ])("rebuilds the live result for a %s", (_name, events, finish) => {
    const { result, log } = live(events, finish);
    expect(replayRunLog(log)).toEqual(result);
  });

  it("survives a trip through the JSON Lines form", () => {
    const { result, log } = live(scenarioB);
    const text = serializeRunLog(log);
    expect(replayRunLog(parseRunLog(text))).toEqual(result);
  });

  it("replays dropped frames without changing the outcome", () => {
    tick = 0;
    const machine = new ConversationStateMachine({ now: clock, timeoutMs: 1000 });
    machine.apply({ kind: AgentEventKind.TEXT_DELTA, text: "a" });
    machine.recordDropped({ event: "response.text.delta", data: "{" }, "Frame data is not valid JSON");
    machine.apply({ kind: AgentEventKind.FINAL });
    const snapshot = machine.snapshot();
    const log: RunLog = { header, entries: snapshot.entries, endedAt: ENDED };

    const replayed = replayRunLog(log);
    expect(replayed).toEqual(aggregateRunResult(snapshot, header, ENDED));
    expect(replayed.droppedFrames).toBe(1);
  });

  it("closes a log that stops before any terminal entry", () => {
    const log: RunLog = {
      header,
      entries: [
        {
          type: "event",
          seq: 0,
          at: header.startedAt,
          event: { kind: AgentEventKind.TEXT_DELTA, text: "cut" },
        },
      ],
      endedAt: ENDED,
    };
    const replayed = replayRunLog(log);
    expect(replayed.status).toBe("failed");
    expect(replayed.error).toEqual({
      kind: "UnexpectedEndOfStream",
      message: "Stream closed without a final or error event: run log ended without a terminal entry",
    });
  });
});
