/**
 * Decoded agent events.
 *
 * The set is closed: every wire tag the decoder does not recognise becomes a
 * `status` event with phase "unknown", so consumers can switch exhaustively
 * on `kind`.
 */

import type { AgentEventKind } from "./enums.js";

export interface TextDeltaEvent {
  readonly kind: typeof AgentEventKind.TEXT_DELTA;
  readonly text: string;
}

export interface ToolCallStartEvent {
  readonly kind: typeof AgentEventKind.TOOL_CALL_START;
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
}

export interface ToolCallResultEvent {
  readonly kind: typeof AgentEventKind.TOOL_CALL_RESULT;
  readonly id: string;
  readonly payload: unknown;
  /** The tool reported a failure instead of a result. */
  readonly isError: boolean;
}

export interface StatusEvent {
  readonly kind: typeof AgentEventKind.STATUS;
  readonly phase: string;
  readonly message?: string;
  /** Original wire tag, set only when phase is "unknown". */
  readonly tag?: string;
}

export interface ErrorEvent {
  readonly kind: typeof AgentEventKind.ERROR;
  readonly errorKind: string;
  readonly message: string;
}

export interface FinalEvent {
  readonly kind: typeof AgentEventKind.FINAL;
}

export type AgentEvent =
  | TextDeltaEvent
  | ToolCallStartEvent
  | ToolCallResultEvent
  | StatusEvent
  | ErrorEvent
  | FinalEvent;
