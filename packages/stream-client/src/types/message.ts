/**
 * Message and ContentPart types for agent conversations.
 */

import { ContentType, Role } from "./enums.js";

// ---------------------------------------------------------------------------
// Content data structures
// ---------------------------------------------------------------------------

/** Data for a tool invocation content part. */
export interface ToolUseData {
  /** Identifier assigned by the agent, unique within a run. */
  readonly id: string;
  /** Tool name, e.g. "search" or "analyst". */
  readonly name: string;
  readonly input: Record<string, unknown>;
}

/** Data for a tool result content part. */
export interface ToolResultData {
  /** The ToolUseData.id this result answers. */
  readonly tool_use_id: string;
  readonly content: unknown;
  readonly status: "success" | "error";
}

// ---------------------------------------------------------------------------
// ContentPart: discriminated union on `type`
// ---------------------------------------------------------------------------

export interface TextContentPart {
  readonly type: typeof ContentType.TEXT;
  readonly text: string;
}

export interface ToolUseContentPart {
  readonly type: typeof ContentType.TOOL_USE;
  readonly tool_use: ToolUseData;
}

export interface ToolResultContentPart {
  readonly type: typeof ContentType.TOOL_RESULT;
  readonly tool_result: ToolResultData;
}

export type ContentPart =
  | TextContentPart
  | ToolUseContentPart
  | ToolResultContentPart;

// ---------------------------------------------------------------------------
// Message / Conversation
// ---------------------------------------------------------------------------

/** One turn of a conversation. Content is append-only within a run. */
export interface Message {
  readonly role: Role;
  readonly content: readonly ContentPart[];
}

/** The ordered messages exchanged so far. */
export interface Conversation {
  /** Caller-supplied id. Generated per run when omitted. */
  readonly id?: string;
  readonly messages: readonly Message[];
}

/**
 * Restricts which tools the agent may call.
 *
 * `mode: "none"` forbids tool use entirely; `allowedTools` narrows the
 * automatic mode to the listed names.
 */
export interface ToolConstraint {
  readonly mode: "auto" | "none";
  readonly allowedTools?: readonly string[];
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a caller message from plain text. */
export function createCallerMessage(text: string): Message {
  return {
    role: Role.CALLER,
    content: [{ type: ContentType.TEXT, text }],
  };
}

/** Create an agent message from plain text. */
export function createAgentMessage(text: string): Message {
  return {
    role: Role.AGENT,
    content: [{ type: ContentType.TEXT, text }],
  };
}

/** Create a tool-result message. */
export function createToolResultMessage(
  tool_use_id: string,
  content: unknown,
  isError = false,
): Message {
  return {
    role: Role.TOOL,
    content: [
      {
        type: ContentType.TOOL_RESULT,
        tool_result: {
          tool_use_id,
          content,
          status: isError ? "error" : "success",
        },
      },
    ],
  };
}

/**
 * Concatenate text from all TEXT content parts of a message.
 * Returns empty string if no text parts exist.
 */
export function getMessageText(message: Message): string {
  return message.content
    .filter((part): part is TextContentPart => part.type === ContentType.TEXT)
    .map((part) => part.text)
    .join("");
}
