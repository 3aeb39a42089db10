/**
 * Lifecycle notifications and the bus that fans them out.
 *
 * One bus per orchestrator: the run loop, the rollback coordinator and the
 * operations themselves (through their context) all publish here, so a single
 * subscription sees everything in firing order.
 */

import type { AttemptError, OperationError, RollbackFailedError } from "./errors";
import { messageOf } from "./result";

export type LogLevel = "debug" | "info" | "warn" | "error";

// =============================================================================
// Event Types
// =============================================================================

export type OrchestratorEvent =
  | { type: "run_started"; runId: string; ts: number; operationCount: number }
  | {
      type: "operation_started";
      runId: string;
      ts: number;
      operationName: string;
      index: number;
      parallel: boolean;
    }
  | {
      type: "operation_completed";
      runId: string;
      ts: number;
      operationName: string;
      index: number;
      durationMs: number;
      attempts: number;
    }
  | {
      type: "operation_failed";
      runId: string;
      ts: number;
      operationName: string;
      index: number;
      durationMs: number;
      attempts: number;
      error: OperationError;
    }
  | {
      type: "operation_skipped";
      runId: string;
      ts: number;
      operationName: string;
      index: number;
    }
  | {
      type: "operation_retry";
      runId: string;
      ts: number;
      operationName: string;
      attempt: number;
      maxAttempts: number;
      delayMs: number;
      error: AttemptError;
    }
  | {
      /** Progress reported by an operation about its own work */
      type: "operation_progress";
      runId: string;
      ts: number;
      operationName: string;
      percentage: number;
      message: string;
    }
  | {
      /** Run-level progress: completed / (registered - skipped) */
      type: "progress_changed";
      runId: string;
      ts: number;
      percentage: number;
      message: string;
      operationName?: string;
    }
  | { type: "rollback_started"; runId: string; ts: number; operationNames: string[] }
  | {
      type: "rollback_completed";
      runId: string;
      ts: number;
      durationMs: number;
      compensated: string[];
      failures: RollbackFailedError[];
    }
  | {
      type: "log";
      runId: string;
      ts: number;
      level: LogLevel;
      message: string;
      operationName?: string;
    }
  | { type: "run_completed"; runId: string; ts: number; durationMs: number }
  | {
      type: "run_failed";
      runId: string;
      ts: number;
      durationMs: number;
      errorCount: number;
      cancelled: boolean;
    };

export type OrchestratorEventType = OrchestratorEvent["type"];

export type EventOfType<K extends OrchestratorEventType> = Extract<OrchestratorEvent, { type: K }>;

export type OrchestratorListener = (event: OrchestratorEvent) => void;

/** Called when a listener throws; see `EventBus`. */
export type ListenerErrorHandler = (error: unknown, event: OrchestratorEvent) => void;

export function isEventOfType<K extends OrchestratorEventType>(
  event: OrchestratorEvent,
  type: K
): event is EventOfType<K> {
  return event.type === type;
}

// =============================================================================
// EventBus
// =============================================================================

/**
 * Synchronous fan-out. Listeners run in subscription order; a listener that
 * throws does not stop delivery to the others and never reaches the emitter.
 * Its error goes to `onListenerError` when provided, otherwise it is published
 * to every listener as an error-level `log` event. A throwing
 * `onListenerError` is published the same way.
 */
export class EventBus {
  private readonly listeners = new Set<OrchestratorListener>();
  private readonly typedWrappers = new Map<
    OrchestratorEventType,
    Map<(event: never) => void, OrchestratorListener>
  >();
  private reporting = false;

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  get listenerCount(): number {
    return this.listeners.size;
  }

  subscribe(listener: OrchestratorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  on<K extends OrchestratorEventType>(
    type: K,
    listener: (event: EventOfType<K>) => void
  ): () => void {
    let byListener = this.typedWrappers.get(type);
    if (!byListener) {
      byListener = new Map();
      this.typedWrappers.set(type, byListener);
    }
    if (!byListener.has(listener)) {
      const wrapped: OrchestratorListener = (event) => {
        if (isEventOfType(event, type)) listener(event);
      };
      byListener.set(listener, wrapped);
      this.listeners.add(wrapped);
    }
    return () => this.off(type, listener);
  }

  off<K extends OrchestratorEventType>(type: K, listener: (event: EventOfType<K>) => void): void {
    const byListener = this.typedWrappers.get(type);
    const wrapped = byListener?.get(listener);
    if (!byListener || !wrapped) return;
    byListener.delete(listener);
    this.listeners.delete(wrapped);
  }

  emit(event: OrchestratorEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.reportListenerError(error, event);
      }
    }
  }

  private reportListenerError(error: unknown, event: OrchestratorEvent): void {
    if (this.onListenerError) {
      try {
        this.onListenerError(error, event);
      } catch (handlerError) {
        this.publishListenerError(`Listener error handler threw: ${messageOf(handlerError)}`, event);
      }
      return;
    }
    this.publishListenerError(`Listener for "${event.type}" threw: ${messageOf(error)}`, event);
  }

  private publishListenerError(message: string, event: OrchestratorEvent): void {
    // A listener failing while a failure is being reported is not reported again.
    if (this.reporting) return;

    this.reporting = true;
    try {
      this.emit({ type: "log", runId: event.runId, ts: Date.now(), level: "error", message });
    } finally {
      this.reporting = false;
    }
  }
}
