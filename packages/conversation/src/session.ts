/**
 * Session controller: drives one run end to end.
 *
 * Connect (with bounded retries) → pull frames one at a time through the
 * decoder into the state machine → aggregate → persist. A single deadline
 * covers the whole run; each pull is raced against it.
 *
 * Retries only happen before the stream is open. Once frames flow, any
 * failure ends the run, since tools may already have run on the agent side.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  ConfigurationError,
  ErrorKind,
  HttpTransport,
  PersistenceError,
  RunTimeoutError,
  classifyError,
  decodeFrame,
  withRetries,
  type AgentRequest,
  type AgentRequestOptions,
  type AttemptOutcome,
  type Conversation,
  type Credentials,
  type Frame,
  type FrameStream,
  type RetryPolicy,
  type RetryResult,
  type ToolConstraint,
  type Transport,
} from "@agent-ledger/stream-client";
import { aggregateRunResult } from "./aggregator.js";
import { RunEventEmitter, type RunEventListener } from "./events.js";
import { createLogger, type Logger } from "./logger.js";
import { RunArtifactWriter, type ArtifactWriter } from "./persistence.js";
import { ConversationStateMachine } from "./state-machine.js";
import type { RunHeader, RunResult } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunConversationOptions {
  /** Agent run endpoint (absolute URL). */
  endpoint: string;
  credentials: Credentials;
  conversation: Conversation;
  toolConstraint?: ToolConstraint;
  /** Overall deadline for the run, connection attempts included. */
  timeoutMs: number;
  /** Directory that receives one artifact directory per run. */
  outputDir: string;
  /** Default: a random UUID. */
  runId?: string;
  /** Fail the run on undecodable frames instead of dropping them. */
  strict?: boolean;
  retry?: Partial<RetryPolicy>;
  /** Agent settings forwarded in the request body. */
  request?: AgentRequestOptions;
  /** Default: an HttpTransport for `endpoint` and `credentials`. */
  transport?: Transport;
  /** Default: a RunArtifactWriter under `outputDir`. */
  writer?: ArtifactWriter;
  logger?: Logger;
  /** Level for the default logger. Ignored when `logger` is given. */
  logLevel?: string;
  onEvent?: RunEventListener;
}

export interface ConversationRun {
  result: RunResult;
  /** Published artifact directory, when persistence succeeded. */
  artifactDir?: string;
  persistenceError?: PersistenceError;
  /** Connection attempts made, including the successful one. */
  attempts: number;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const optionsSchema = z.object({
  endpoint: z.string().url(),
  credentials: z.object({ token: z.string().min(1) }),
  conversation: z.object({
    messages: z.array(z.unknown()).min(1, "conversation has no messages"),
  }),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
  outputDir: z.string().min(1),
  runId: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "must be a plain directory name")
    .optional(),
});

function validateOptions(options: RunConversationOptions): void {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid run options: ${problems}`, {
      cause: parsed.error,
    });
  }
}

// ---------------------------------------------------------------------------
// Deadline
// ---------------------------------------------------------------------------

export const EXPIRED: unique symbol = Symbol("expired");

/** One timer bounding a whole run. */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;

  constructor(readonly timeoutMs: number) {
    this.timer = setTimeout(
      () => this.controller.abort(new RunTimeoutError(timeoutMs)),
      timeoutMs,
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get passed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Settle with `work`, or with EXPIRED if the deadline passes first. The
   * abort listener lives only as long as this one race.
   */
  race<T>(work: Promise<T>): Promise<T | typeof EXPIRED> {
    const { signal } = this.controller;
    if (signal.aborted) return Promise.resolve(EXPIRED);
    return new Promise((resolve, reject) => {
      const onAbort = () => resolve(EXPIRED);
      signal.addEventListener("abort", onAbort, { once: true });
      void work.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }

  dispose(): void {
    clearTimeout(this.timer);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run a conversation against the remote agent and persist the outcome.
 *
 * Every outcome other than invalid options comes back as a RunResult: a
 * failed or timed-out run is a result, not an exception. The artifact writer
 * is called exactly once; its failure is reported on the returned object and
 * does not change the result.
 *
 * @throws {ConfigurationError} When the options are invalid. Nothing has run
 *   and nothing is written in that case.
 */
export async function runConversation(
  options: RunConversationOptions,
): Promise<ConversationRun> {
  validateOptions(options);

  const runId = options.runId ?? randomUUID();
  const conversationId = options.conversation.id ?? randomUUID();
  const strict = options.strict ?? false;
  const logger = (options.logger ?? createLogger({ level: options.logLevel })).child({
    runId,
  });

  const emitter = new RunEventEmitter((err, event) =>
    logger.warn({ err, event: event.type }, "run event listener failed"),
  );
  if (options.onEvent) emitter.on(options.onEvent);

  const transport =
    options.transport ??
    new HttpTransport({ endpoint: options.endpoint, credentials: options.credentials });
  const writer = options.writer ?? new RunArtifactWriter(options.outputDir, { logger });

  const header: RunHeader = {
    runId,
    conversationId,
    startedAt: new Date().toISOString(),
    strict,
    timeoutMs: options.timeoutMs,
    messages: structuredClone(options.conversation.messages),
  };
  const request: AgentRequest = {
    conversation: { id: conversationId, messages: header.messages },
    toolConstraint: options.toolConstraint,
    options: options.request,
  };

  const machine = new ConversationStateMachine({
    strict,
    timeoutMs: options.timeoutMs,
    logger,
  });
  const deadline = new Deadline(options.timeoutMs);
  const startMs = Date.now();

  logger.info({ conversationId, endpoint: options.endpoint }, "run started");
  emitter.emitRunStarted(runId, conversationId);

  let attempts = 0;
  try {
    const connected = await connect(transport, request, options, deadline, logger, emitter);
    attempts = connected.attempts;

    if (!connected.ok) {
      if (deadline.passed) {
        machine.expire();
      } else {
        const noun = connected.attempts === 1 ? "attempt" : "attempts";
        machine.abort({
          kind: ErrorKind.CONNECTION,
          message: `Connection failed after ${connected.attempts} ${noun}: ${connected.error.message}`,
        });
      }
    } else {
      emitter.emitStreamOpened(connected.attempts);
      await consume(connected.value, machine, deadline, logger, emitter, strict);
    }
  } finally {
    deadline.dispose();
  }

  const endedAt = new Date().toISOString();
  const snapshot = machine.snapshot();
  const result = aggregateRunResult(snapshot, header, endedAt);

  logger.info(
    {
      status: result.status,
      error: result.error,
      toolCalls: result.toolCalls.length,
      droppedFrames: result.droppedFrames,
    },
    "run finished",
  );
  emitter.emitRunFinished(result.status, Date.now() - startMs);

  const run: ConversationRun = { result, attempts };
  try {
    const location = await writer.write({ header, entries: snapshot.entries, endedAt }, result);
    run.artifactDir = location.dir;
    emitter.emitArtifactSaved(location.dir);
  } catch (err) {
    const error =
      err instanceof PersistenceError
        ? err
        : new PersistenceError(`Failed to persist run: ${describe(err)}`, { cause: err });
    logger.error({ err: error }, "run artifact was not persisted");
    run.persistenceError = error;
    emitter.emitArtifactFailed(error.message);
  }

  return run;
}

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

async function connect(
  transport: Transport,
  request: AgentRequest,
  options: RunConversationOptions,
  deadline: Deadline,
  logger: Logger,
  emitter: RunEventEmitter,
): Promise<RetryResult<FrameStream>> {
  const openOnce = async (): Promise<AttemptOutcome<FrameStream>> => {
    const opening = transport.open(request, { signal: deadline.signal });
    let first: FrameStream | typeof EXPIRED;
    try {
      first = await deadline.race(opening);
    } catch (err) {
      return classifyError(err);
    }
    if (first === EXPIRED) {
      // A stream that opens after the deadline is closed unread.
      void opening
        .then((late) => late.close())
        .catch((err: unknown) =>
          logger.debug({ err }, "connection attempt ended after the deadline"),
        );
      return { type: "terminal", error: new RunTimeoutError(deadline.timeoutMs) };
    }
    return { type: "ok", value: first };
  };

  return withRetries(
    openOnce,
    {
      ...options.retry,
      onRetry: (error, attempt, delay) => {
        logger.warn(
          { attempt: attempt + 1, delay: Math.round(delay), err: error },
          "connection attempt failed, retrying",
        );
        emitter.emitConnectionRetrying(attempt + 1, delay, error.message);
        try {
          options.retry?.onRetry?.(error, attempt, delay);
        } catch (err) {
          logger.warn({ err }, "onRetry callback failed");
        }
      },
    },
    deadline.signal,
  );
}

async function consume(
  stream: FrameStream,
  machine: ConversationStateMachine,
  deadline: Deadline,
  logger: Logger,
  emitter: RunEventEmitter,
  strict: boolean,
): Promise<void> {
  const frames = stream[Symbol.asyncIterator]();
  try {
    while (!machine.isTerminal) {
      const pending = frames.next();
      let step: IteratorResult<Frame> | typeof EXPIRED;
      try {
        step = await deadline.race(pending);
      } catch (err) {
        if (deadline.passed) machine.expire();
        else machine.close(describe(err));
        break;
      }

      if (step === EXPIRED) {
        void pending.catch((err: unknown) =>
          logger.debug({ err }, "read abandoned at the deadline failed"),
        );
        machine.expire();
        break;
      }
      if (step.done) {
        machine.close();
        break;
      }

      const decoded = decodeFrame(step.value);
      if (decoded.ok) {
        machine.apply(decoded.event);
      } else {
        machine.reject(decoded.error);
        if (!strict) emitter.emitFrameDropped(decoded.error.message);
      }
    }
  } finally {
    try {
      await stream.close();
    } catch (err) {
      logger.debug({ err }, "closing the frame stream failed");
    }
  }
}
