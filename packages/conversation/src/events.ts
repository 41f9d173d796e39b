/**
 * Run observability events.
 *
 * The session emits typed events while a run progresses, for UIs, logging
 * and metrics. They are separate from the agent events in the run log.
 */

import type { RunStatus } from "./types.js";

// ---------- Event Types ----------

export interface RunStartedEvent {
  type: "RunStarted";
  runId: string;
  conversationId: string;
  timestamp: string;
}

export interface ConnectionRetryingEvent {
  type: "ConnectionRetrying";
  attempt: number;
  delay: number;
  error: string;
  timestamp: string;
}

export interface StreamOpenedEvent {
  type: "StreamOpened";
  attempt: number;
  timestamp: string;
}

export interface FrameDroppedEvent {
  type: "FrameDropped";
  reason: string;
  timestamp: string;
}

export interface RunFinishedEvent {
  type: "RunFinished";
  status: RunStatus;
  duration: number;
  timestamp: string;
}

export interface ArtifactSavedEvent {
  type: "ArtifactSaved";
  dir: string;
  timestamp: string;
}

export interface ArtifactFailedEvent {
  type: "ArtifactFailed";
  error: string;
  timestamp: string;
}

export type RunEvent =
  | RunStartedEvent
  | ConnectionRetryingEvent
  | StreamOpenedEvent
  | FrameDroppedEvent
  | RunFinishedEvent
  | ArtifactSavedEvent
  | ArtifactFailedEvent;

// ---------- Event Emitter ----------

export type RunEventListener = (event: RunEvent) => void;

/** Receives what a listener threw. Without one, the error propagates. */
export type ListenerErrorHandler = (err: unknown, event: RunEvent) => void;

export class RunEventEmitter {
  private listeners: RunEventListener[] = [];

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on(listener: RunEventListener): void {
    this.listeners.push(listener);
  }

  off(listener: RunEventListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  emit(event: RunEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        if (!this.onListenerError) throw err;
        this.onListenerError(err, event);
      }
    }
  }

  clear(): void {
    this.listeners = [];
  }

  emitRunStarted(runId: string, conversationId: string): void {
    this.emit({
      type: "RunStarted",
      runId,
      conversationId,
      timestamp: new Date().toISOString(),
    });
  }

  emitConnectionRetrying(attempt: number, delay: number, error: string): void {
    this.emit({
      type: "ConnectionRetrying",
      attempt,
      delay,
      error,
      timestamp: new Date().toISOString(),
    });
  }

  emitStreamOpened(attempt: number): void {
    this.emit({ type: "StreamOpened", attempt, timestamp: new Date().toISOString() });
  }

  emitFrameDropped(reason: string): void {
    this.emit({ type: "FrameDropped", reason, timestamp: new Date().toISOString() });
  }

  emitRunFinished(status: RunStatus, duration: number): void {
    this.emit({
      type: "RunFinished",
      status,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitArtifactSaved(dir: string): void {
    this.emit({ type: "ArtifactSaved", dir, timestamp: new Date().toISOString() });
  }

  emitArtifactFailed(error: string): void {
    this.emit({ type: "ArtifactFailed", error, timestamp: new Date().toISOString() });
  }
}
