/**
 * Result aggregation and replay.
 *
 * `aggregateRunResult` is a pure function of a terminal machine snapshot.
 * `replayRunLog` rebuilds the same result from a persisted log alone by
 * feeding its entries through a fresh state machine.
 */

import {
  AgentEventKind,
  ContentType,
  Role,
  type AgentEvent,
  type ContentPart,
  type Message,
} from "@agent-ledger/stream-client";
import {
  ConversationStateMachine,
  type MachineSnapshot,
} from "./state-machine.js";
import {
  RunSignal,
  RunState,
  type RunHeader,
  type RunLog,
  type RunResult,
  type RunStatus,
} from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

function toStatus(state: RunState): RunStatus {
  switch (state) {
    case RunState.COMPLETED:
    case RunState.FAILED:
    case RunState.TIMED_OUT:
      return state;
    default:
      throw new Error(`Cannot aggregate a run in state "${state}"`);
  }
}

/**
 * Rebuild the agent's side of the exchange as one message whose parts follow
 * arrival order. Consecutive text deltas merge into one text part.
 */
export function buildAgentMessage(events: readonly AgentEvent[]): Message | undefined {
  const parts: ContentPart[] = [];
  let text: string[] = [];

  const flushText = (): void => {
    if (text.length > 0) {
      parts.push({ type: ContentType.TEXT, text: text.join("") });
      text = [];
    }
  };

  for (const event of events) {
    switch (event.kind) {
      case AgentEventKind.TEXT_DELTA:
        text.push(event.text);
        break;
      case AgentEventKind.TOOL_CALL_START:
        flushText();
        parts.push({
          type: ContentType.TOOL_USE,
          tool_use: { id: event.id, name: event.name, input: event.arguments },
        });
        break;
      case AgentEventKind.TOOL_CALL_RESULT:
        flushText();
        parts.push({
          type: ContentType.TOOL_RESULT,
          tool_result: {
            tool_use_id: event.id,
            content: event.payload,
            status: event.isError ? "error" : "success",
          },
        });
        break;
      default:
        break;
    }
  }
  flushText();

  return parts.length > 0 ? { role: Role.AGENT, content: parts } : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Produce the immutable RunResult for a terminal snapshot.
 *
 * Partial answer text and unfinished tool calls are kept on failed and
 * timed-out runs.
 *
 * @throws {Error} When the snapshot is not in a terminal state.
 */
export function aggregateRunResult(
  snapshot: MachineSnapshot,
  header: RunHeader,
  endedAt: string,
): RunResult {
  const status = toStatus(snapshot.state);
  const events: AgentEvent[] = [];
  let droppedFrames = 0;
  for (const entry of snapshot.entries) {
    if (entry.type === "event") events.push(entry.event);
    else if (entry.type === "dropped") droppedFrames++;
  }

  const agentMessage = buildAgentMessage(events);
  const messages = agentMessage
    ? [...header.messages, agentMessage]
    : [...header.messages];

  const result: RunResult = {
    runId: header.runId,
    conversationId: header.conversationId,
    status,
    answer: snapshot.answer,
    toolCalls: snapshot.toolCalls.map((call) => ({ ...call })),
    events,
    ...(snapshot.failure ? { error: { ...snapshot.failure } } : {}),
    ...(snapshot.lastPhase !== undefined ? { lastPhase: snapshot.lastPhase } : {}),
    droppedFrames,
    conversation: { id: header.conversationId, messages },
    startedAt: header.startedAt,
    endedAt,
  };

  return deepFreeze(structuredClone(result));
}

/**
 * Rebuild a RunResult from a run log.
 *
 * A log that stops before any terminal input is closed as an unexpected end
 * of stream.
 */
export function replayRunLog(log: RunLog): RunResult {
  const machine = new ConversationStateMachine({
    strict: log.header.strict,
    timeoutMs: log.header.timeoutMs,
  });

  for (const entry of log.entries) {
    switch (entry.type) {
      case "event":
        machine.apply(entry.event, entry.at);
        break;
      case "dropped":
        machine.recordDropped(entry.frame, entry.reason, entry.at);
        break;
      case "signal":
        if (entry.signal === RunSignal.CLOSED) machine.close(entry.detail, entry.at);
        else if (entry.signal === RunSignal.EXPIRED) machine.expire(entry.at);
        else if (entry.failure) machine.abort(entry.failure, entry.at);
        break;
    }
  }

  if (!machine.isTerminal) {
    machine.close("run log ended without a terminal entry", log.endedAt);
  }

  return aggregateRunResult(machine.snapshot(), log.header, log.endedAt);
}
