/**
 * Builds the JSON body that opens a streamed agent run.
 */

import type {
  Conversation,
  ContentPart,
  Message,
  ToolConstraint,
} from "./types/index.js";
import { ContentType } from "./types/index.js";

/** Optional agent settings forwarded verbatim to the service. */
export interface AgentRequestOptions {
  /** Model that drives the agent's orchestration. */
  model?: string;
  /** Instructions shaping the final answer. */
  instructions?: string;
  /** Tool specifications, in the service's own format. */
  tools?: readonly Record<string, unknown>[];
  /** Per-tool configuration keyed by tool name. */
  toolResources?: Record<string, unknown>;
}

/** A fully-formed run request: everything the transport needs but credentials. */
export interface AgentRequest {
  readonly conversation: Conversation;
  readonly toolConstraint?: ToolConstraint;
  readonly options?: AgentRequestOptions;
}

export type WireContentPart =
  | { type: "text"; text: string }
  | {
      type: "tool_use";
      tool_use: { tool_use_id: string; name: string; input: Record<string, unknown> };
    }
  | {
      type: "tool_results";
      tool_results: {
        tool_use_id: string;
        status: "success" | "error";
        content: unknown;
      };
    };

export interface WireMessage {
  role: string;
  content: WireContentPart[];
}

/** Request body as sent on the wire. */
export interface AgentRequestBody {
  messages: WireMessage[];
  stream: true;
  tool_choice?: { type: "auto" | "none"; name?: string[] };
  model?: string;
  response_instruction?: string;
  tools?: Record<string, unknown>[];
  tool_resources?: Record<string, unknown>;
}

function toWirePart(part: ContentPart): WireContentPart {
  switch (part.type) {
    case ContentType.TEXT:
      return { type: "text", text: part.text };
    case ContentType.TOOL_USE:
      return {
        type: "tool_use",
        tool_use: {
          tool_use_id: part.tool_use.id,
          name: part.tool_use.name,
          input: part.tool_use.input,
        },
      };
    case ContentType.TOOL_RESULT:
      return {
        type: "tool_results",
        tool_results: {
          tool_use_id: part.tool_result.tool_use_id,
          status: part.tool_result.status,
          content: part.tool_result.content,
        },
      };
  }
}

function toWireMessage(message: Message): WireMessage {
  return { role: message.role, content: message.content.map(toWirePart) };
}

/**
 * Translate a request into its wire body.
 *
 * `tool_choice` is left out when no constraint is given, and its `name`
 * list is left out when no tools are named.
 */
export function buildRequestBody(request: AgentRequest): AgentRequestBody {
  const body: AgentRequestBody = {
    messages: request.conversation.messages.map(toWireMessage),
    stream: true,
  };

  const constraint = request.toolConstraint;
  if (constraint) {
    body.tool_choice = { type: constraint.mode };
    if (constraint.allowedTools && constraint.allowedTools.length > 0) {
      body.tool_choice.name = [...constraint.allowedTools];
    }
  }

  const options = request.options;
  if (options?.model !== undefined) body.model = options.model;
  if (options?.instructions !== undefined) {
    body.response_instruction = options.instructions;
  }
  if (options?.tools) body.tools = [...options.tools];
  if (options?.toolResources) body.tool_resources = options.toolResources;

  return body;
}
