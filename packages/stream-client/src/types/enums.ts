/**
 * Core enums for the agent stream client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Who authored a message in a conversation. Values are the wire names. */
export const Role = {
  /** The pipeline (or a person behind it) asking the agent. */
  CALLER: "user",
  /** Agent output: text and tool invocations. */
  AGENT: "assistant",
  /** Tool results, linked to a tool_use id. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// ContentType
// ---------------------------------------------------------------------------

/** Discriminator tags for ContentPart. */
export const ContentType = {
  TEXT: "text",
  /** An agent-initiated tool invocation. */
  TOOL_USE: "tool_use",
  /** Structured result payload of a tool invocation. */
  TOOL_RESULT: "tool_result",
} as const satisfies Record<string, string>;

export type ContentType = (typeof ContentType)[keyof typeof ContentType];

// ---------------------------------------------------------------------------
// AgentEventKind
// ---------------------------------------------------------------------------

/** Discriminator tags for AgentEvent. */
export const AgentEventKind = {
  /** Incremental answer text. */
  TEXT_DELTA: "text_delta",
  /** The agent started a tool call. Includes id, name and arguments. */
  TOOL_CALL_START: "tool_call_start",
  /** A tool call produced its result payload. */
  TOOL_CALL_RESULT: "tool_call_result",
  /** Progress report. Unrecognised wire tags also land here. */
  STATUS: "status",
  /** The agent reported a failure. Terminates the run. */
  ERROR: "error",
  /** The agent finished its answer. */
  FINAL: "final",
} as const satisfies Record<string, string>;

export type AgentEventKind = (typeof AgentEventKind)[keyof typeof AgentEventKind];

// ---------------------------------------------------------------------------
// WireTag
// ---------------------------------------------------------------------------

/** SSE `event:` names emitted by the agent service. */
export const WireTag = {
  TEXT_DELTA: "response.text.delta",
  TOOL_USE: "response.tool_use",
  TOOL_RESULT: "response.tool_result",
  STATUS: "response.status",
  ERROR: "error",
  RESPONSE: "response",
} as const satisfies Record<string, string>;

export type WireTag = (typeof WireTag)[keyof typeof WireTag];

/** Phase reported for events whose wire tag is not recognised. */
export const UNKNOWN_PHASE = "unknown";
