/**
 * Run-level data model: tool call records, the run log, and the final
 * RunResult.
 */

import type {
  AgentEvent,
  Conversation,
  Frame,
  Message,
} from "@agent-ledger/stream-client";

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

/** State machine states. The last three are terminal. */
export const RunState = {
  IDLE: "idle",
  STREAMING: "streaming",
  COMPLETED: "completed",
  FAILED: "failed",
  TIMED_OUT: "timed_out",
} as const satisfies Record<string, string>;

export type RunState = (typeof RunState)[keyof typeof RunState];

/** Terminal states, as reported on a RunResult. */
export type RunStatus = Exclude<RunState, "idle" | "streaming">;

export const ToolCallState = {
  STARTED: "started",
  COMPLETED: "completed",
  FAILED: "failed",
} as const satisfies Record<string, string>;

export type ToolCallState = (typeof ToolCallState)[keyof typeof ToolCallState];

/** Non-event inputs to the state machine. */
export const RunSignal = {
  /** The frame sequence ended. */
  CLOSED: "closed",
  /** The run deadline passed. */
  EXPIRED: "expired",
  /** The run failed before any event, e.g. connection retries exhausted. */
  ABORTED: "aborted",
} as const satisfies Record<string, string>;

export type RunSignal = (typeof RunSignal)[keyof typeof RunSignal];

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Why a run did not complete. `kind` is an ErrorKind or the agent's own code. */
export interface RunFailure {
  readonly kind: string;
  readonly message: string;
}

export interface ToolCallRecord {
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
  readonly state: ToolCallState;
  /** Present once the call has a result. */
  readonly payload?: unknown;
  /** Log sequence number of the start event. */
  readonly startedSeq: number;
  readonly finishedSeq?: number;
}

// ---------------------------------------------------------------------------
// Run log
// ---------------------------------------------------------------------------

interface LogEntryBase {
  /** Position in the log, starting at 0. */
  readonly seq: number;
  /** ISO timestamp of when the entry was processed. */
  readonly at: string;
}

export interface EventLogEntry extends LogEntryBase {
  readonly type: "event";
  readonly event: AgentEvent;
}

/** A frame dropped by a non-strict decoder. Ignored on replay. */
export interface DroppedLogEntry extends LogEntryBase {
  readonly type: "dropped";
  readonly frame: Frame;
  readonly reason: string;
}

export interface SignalLogEntry extends LogEntryBase {
  readonly type: "signal";
  readonly signal: RunSignal;
  readonly failure?: RunFailure;
  /** Free-form context, e.g. why the stream closed. */
  readonly detail?: string;
}

export type RunLogEntry = EventLogEntry | DroppedLogEntry | SignalLogEntry;

/** Identity and inputs of a run, written as the first line of the log. */
export interface RunHeader {
  readonly runId: string;
  readonly conversationId: string;
  readonly startedAt: string;
  /** Whether decode failures were promoted to errors. */
  readonly strict: boolean;
  /** Deadline in milliseconds, needed to rebuild a timeout failure. */
  readonly timeoutMs: number;
  readonly messages: readonly Message[];
}

/** Everything needed to rebuild a RunResult without any live state. */
export interface RunLog {
  readonly header: RunHeader;
  readonly entries: readonly RunLogEntry[];
  readonly endedAt: string;
}

// ---------------------------------------------------------------------------
// RunResult
// ---------------------------------------------------------------------------

export interface RunResult {
  readonly runId: string;
  readonly conversationId: string;
  readonly status: RunStatus;
  /** Ordered concatenation of every text delta before the terminal state. */
  readonly answer: string;
  /** Every tool call observed, in start order, whatever its state. */
  readonly toolCalls: readonly ToolCallRecord[];
  /** Decoded events in arrival order. */
  readonly events: readonly AgentEvent[];
  readonly error?: RunFailure;
  /** Last status phase the agent reported. */
  readonly lastPhase?: string;
  readonly droppedFrames: number;
  /** Input messages followed by the messages this run produced. */
  readonly conversation: Required<Conversation>;
  readonly startedAt: string;
  readonly endedAt: string;
}
