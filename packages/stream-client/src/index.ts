export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export transport utilities
export * from "./utils/index.js";

export { decodeFrame } from "./decoder.js";
export type { DecodeResult } from "./decoder.js";

export { buildRequestBody } from "./request.js";
export type {
  AgentRequest,
  AgentRequestBody,
  AgentRequestOptions,
  WireContentPart,
  WireMessage,
} from "./request.js";

export { HttpTransport, END_MARKER } from "./transport.js";
export type {
  Credentials,
  FrameStream,
  OpenOptions,
  Transport,
  HttpTransportConfig,
} from "./transport.js";

export {
  HttpSqlExecutor,
  HttpSemanticSearch,
  HttpSemanticQueryExecutor,
} from "./collaborators.js";
export type {
  SqlResult,
  SqlExecutor,
  SearchQuery,
  SearchHit,
  SemanticSearch,
  SemanticAnswer,
  SemanticQueryExecutor,
  HttpCollaboratorConfig,
} from "./collaborators.js";
