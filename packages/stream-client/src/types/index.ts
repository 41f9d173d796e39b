/**
 * Barrel re-export for all type modules.
 */

// Enums
export {
  Role,
  ContentType,
  AgentEventKind,
  WireTag,
  UNKNOWN_PHASE,
} from "./enums.js";

// Message types
export type {
  ToolUseData,
  ToolResultData,
  TextContentPart,
  ToolUseContentPart,
  ToolResultContentPart,
  ContentPart,
  Message,
  Conversation,
  ToolConstraint,
} from "./message.js";
export {
  createCallerMessage,
  createAgentMessage,
  createToolResultMessage,
  getMessageText,
} from "./message.js";

// Event types
export type {
  TextDeltaEvent,
  ToolCallStartEvent,
  ToolCallResultEvent,
  StatusEvent,
  ErrorEvent,
  FinalEvent,
  AgentEvent,
} from "./events.js";

// Errors
export {
  ErrorKind,
  AgentRunError,
  ConnectionError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  NetworkError,
  DecodeError,
  ProtocolError,
  IncompleteToolCallError,
  UnexpectedEndOfStreamError,
  RunTimeoutError,
  PersistenceError,
  ConfigurationError,
} from "./errors.js";
export type { ConnectionErrorOptions } from "./errors.js";
