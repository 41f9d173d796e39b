/**
 * ConversationStateMachine consumes decoded events in arrival order and
 * tracks the running answer, open tool calls and terminal state.
 *
 *   idle ──first event──▶ streaming ──▶ completed | failed | timed_out
 *
 * Every processed input is appended to the run log; once a terminal state is
 * reached further input is ignored and not logged.
 */

import type { Logger } from "pino";
import {
  AgentEventKind,
  ErrorKind,
  IncompleteToolCallError,
  ProtocolError,
  RunTimeoutError,
  UnexpectedEndOfStreamError,
  type AgentEvent,
  type DecodeError,
  type Frame,
} from "@agent-ledger/stream-client";
import { silentLogger } from "./logger.js";
import {
  RunSignal,
  RunState,
  ToolCallState,
  type DroppedLogEntry,
  type EventLogEntry,
  type RunFailure,
  type RunLogEntry,
  type SignalLogEntry,
  type ToolCallRecord,
} from "./types.js";

export interface StateMachineOptions {
  /** Promote undecodable frames to an error event. Default: false. */
  strict?: boolean;
  /** Deadline reported in the timeout failure. */
  timeoutMs?: number;
  logger?: Logger;
  /** Timestamp source for log entries. */
  now?: () => string;
}

/** Everything the aggregator needs, copied out at a point in time. */
export interface MachineSnapshot {
  readonly state: RunState;
  readonly answer: string;
  readonly toolCalls: readonly ToolCallRecord[];
  readonly failure?: RunFailure;
  readonly lastPhase?: string;
  readonly entries: readonly RunLogEntry[];
}

type EntryBody =
  | Omit<EventLogEntry, "seq" | "at">
  | Omit<DroppedLogEntry, "seq" | "at">
  | Omit<SignalLogEntry, "seq" | "at">;

function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

export class ConversationStateMachine {
  private current: RunState = RunState.IDLE;
  private readonly textChunks: string[] = [];
  private readonly toolCalls = new Map<string, ToolCallRecord>();
  private readonly entries: RunLogEntry[] = [];
  private failure: RunFailure | undefined;
  private lastPhase: string | undefined;

  private readonly strict: boolean;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => string;

  constructor(options: StateMachineOptions = {}) {
    this.strict = options.strict ?? false;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  get state(): RunState {
    return this.current;
  }

  get isTerminal(): boolean {
    return (
      this.current === RunState.COMPLETED ||
      this.current === RunState.FAILED ||
      this.current === RunState.TIMED_OUT
    );
  }

  /** Text accumulated so far. */
  get answer(): string {
    return this.textChunks.join("");
  }

  // -----------------------------------------------------------------------
  // Inputs
  // -----------------------------------------------------------------------

  /**
   * Apply one decoded event. Returns the state after the transition.
   *
   * @param at - Timestamp to record instead of the current time (replay).
   */
  apply(event: AgentEvent, at?: string): RunState {
    if (this.isTerminal) return this.current;

    const seq = this.append({ type: "event", event }, at);
    if (this.current === RunState.IDLE) this.current = RunState.STREAMING;

    switch (event.kind) {
      case AgentEventKind.TEXT_DELTA:
        this.textChunks.push(event.text);
        break;

      case AgentEventKind.TOOL_CALL_START:
        if (this.toolCalls.has(event.id)) {
          return this.fail(
            new ProtocolError(`Duplicate tool call start for id "${event.id}"`),
          );
        }
        this.toolCalls.set(event.id, {
          id: event.id,
          name: event.name,
          arguments: event.arguments,
          state: ToolCallState.STARTED,
          startedSeq: seq,
        });
        break;

      case AgentEventKind.TOOL_CALL_RESULT: {
        const call = this.toolCalls.get(event.id);
        if (!call || call.state !== ToolCallState.STARTED) {
          return this.fail(
            new ProtocolError(
              call
                ? `Tool call "${event.id}" already has a result`
                : `Tool call result for unknown id "${event.id}"`,
            ),
          );
        }
        this.toolCalls.set(event.id, {
          ...call,
          state: event.isError ? ToolCallState.FAILED : ToolCallState.COMPLETED,
          payload: event.payload,
          finishedSeq: seq,
        });
        break;
      }

      case AgentEventKind.STATUS:
        this.lastPhase = event.phase;
        break;

      case AgentEventKind.ERROR:
        return this.fail({ kind: event.errorKind, message: event.message });

      case AgentEventKind.FINAL: {
        const open = this.openToolCallIds();
        if (open.length > 0) {
          return this.fail(new IncompleteToolCallError(open));
        }
        this.current = RunState.COMPLETED;
        break;
      }

      default:
        return assertNever(event);
    }

    return this.current;
  }

  /**
   * Handle a frame the decoder rejected.
   *
   * Non-strict: the frame is logged and dropped. Strict: it becomes an error
   * event and fails the run.
   */
  reject(error: DecodeError, at?: string): RunState {
    if (this.isTerminal) return this.current;

    if (this.strict) {
      const promoted: AgentEvent = {
        kind: AgentEventKind.ERROR,
        errorKind: ErrorKind.DECODE,
        message: error.message,
      };
      return this.apply(promoted, at);
    }

    this.logger.warn(
      { frame: error.frame, reason: error.message },
      "dropped undecodable frame",
    );
    return this.recordDropped(error.frame, error.message, at);
  }

  /** Log a dropped frame without changing state. */
  recordDropped(frame: Frame, reason: string, at?: string): RunState {
    if (this.isTerminal) return this.current;
    this.append({ type: "dropped", frame, reason }, at);
    return this.current;
  }

  /** The frame sequence ended. Without a terminal event that is a failure. */
  close(detail?: string, at?: string): RunState {
    if (this.isTerminal) return this.current;
    this.append(
      detail !== undefined
        ? { type: "signal", signal: RunSignal.CLOSED, detail }
        : { type: "signal", signal: RunSignal.CLOSED },
      at,
    );
    const error = new UnexpectedEndOfStreamError(
      detail !== undefined
        ? `Stream closed without a final or error event: ${detail}`
        : undefined,
    );
    return this.fail(error);
  }

  /** The run deadline passed. */
  expire(at?: string): RunState {
    if (this.isTerminal) return this.current;
    this.append({ type: "signal", signal: RunSignal.EXPIRED }, at);
    const error = new RunTimeoutError(this.timeoutMs);
    this.failure = { kind: error.kind, message: error.message };
    this.current = RunState.TIMED_OUT;
    return this.current;
  }

  /** Fail before any event was seen, e.g. the connection never opened. */
  abort(failure: RunFailure, at?: string): RunState {
    if (this.isTerminal) return this.current;
    this.append({ type: "signal", signal: RunSignal.ABORTED, failure }, at);
    return this.fail(failure);
  }

  // -----------------------------------------------------------------------
  // Snapshot
  // -----------------------------------------------------------------------

  snapshot(): MachineSnapshot {
    return {
      state: this.current,
      answer: this.answer,
      toolCalls: [...this.toolCalls.values()],
      failure: this.failure,
      lastPhase: this.lastPhase,
      entries: [...this.entries],
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private openToolCallIds(): string[] {
    return [...this.toolCalls.values()]
      .filter((call) => call.state === ToolCallState.STARTED)
      .map((call) => call.id);
  }

  private append(body: EntryBody, at?: string): number {
    const seq = this.entries.length;
    this.entries.push({ ...body, seq, at: at ?? this.now() });
    return seq;
  }

  private fail(failure: RunFailure): RunState {
    this.failure = { kind: failure.kind, message: failure.message };
    this.current = RunState.FAILED;
    return this.current;
  }
}
