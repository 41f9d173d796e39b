export { runConversation, MAX_TIMEOUT_MS } from "./session.js";
export type { RunConversationOptions, ConversationRun } from "./session.js";

export { ConversationStateMachine } from "./state-machine.js";
export type { StateMachineOptions, MachineSnapshot } from "./state-machine.js";

export { aggregateRunResult, buildAgentMessage, replayRunLog } from "./aggregator.js";

export { serializeRunLog, parseRunLog, parseRunResult } from "./run-log.js";

export {
  RunArtifactWriter,
  readRunArtifact,
  reconstructRunResult,
  EVENTS_FILE,
  RESULT_FILE,
} from "./persistence.js";
export type { ArtifactWriter, ArtifactLocation, RunArtifact } from "./persistence.js";

export { RunEventEmitter } from "./events.js";
export type {
  RunEvent,
  RunEventListener,
  ListenerErrorHandler,
  RunStartedEvent,
  ConnectionRetryingEvent,
  StreamOpenedEvent,
  FrameDroppedEvent,
  RunFinishedEvent,
  ArtifactSavedEvent,
  ArtifactFailedEvent,
} from "./events.js";

export { loadSessionConfig } from "./config.js";
export type { SessionConfig } from "./config.js";

export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

export { RunState, ToolCallState, RunSignal } from "./types.js";
export type {
  RunStatus,
  RunFailure,
  ToolCallRecord,
  EventLogEntry,
  DroppedLogEntry,
  SignalLogEntry,
  RunLogEntry,
  RunHeader,
  RunLog,
  RunResult,
} from "./types.js";
