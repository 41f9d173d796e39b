import { pino, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  /** pino level name. Default: "info". */
  level?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ level: options.level ?? "info", name: options.name ?? "agent-ledger" });
}

/** Discards everything; the default when no logger is supplied. */
export const silentLogger: Logger = pino({ level: "silent" });
