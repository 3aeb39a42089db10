import type { ExecutionOptions, ExecutionOptionsInput } from "../config";
import type { SharedContext } from "../context/shared-context";
import type { LogLevel } from "../events";
import type { MaybeAsyncResult } from "../result";

// =============================================================================
// Operation context
// =============================================================================

/**
 * What an execute or rollback action sees of the run it belongs to.
 * Logging and progress go through the orchestrator's event bus.
 */
export interface OperationContext {
  readonly runId: string;
  readonly operationName: string;
  /** 1-based execute attempt; always 1 during rollback */
  readonly attempt: number;
  readonly phase: "execute" | "rollback";
  readonly shared: SharedContext;
  /** Same signal as the action's second argument */
  readonly signal: AbortSignal;
  log(message: string, level?: LogLevel): void;
  /** Percentage is clamped to 0..100 */
  reportProgress(percentage: number, message?: string): void;
}

// =============================================================================
// Actions
// =============================================================================

/**
 * Forward work. Return `ok(value)` or `err(error)`; a throw counts as a
 * failed attempt. Must stop promptly when `signal` aborts.
 */
export type ExecuteAction<T = unknown, E = unknown> = (
  context: OperationContext,
  signal: AbortSignal
) => MaybeAsyncResult<T, E>;

/**
 * Compensation for a started operation. Runs at most once per run and must
 * tolerate the execute action having been interrupted part way.
 */
export type RollbackAction = (
  context: OperationContext,
  signal: AbortSignal
) => MaybeAsyncResult<unknown, unknown>;

// =============================================================================
// Definitions
// =============================================================================

/**
 * Immutable operation definition. `options` are kept as written so the
 * orchestrator can merge its own defaults underneath at registration.
 */
export interface Operation<T = unknown, E = unknown> {
  readonly name?: string;
  readonly execute: ExecuteAction<T, E>;
  readonly rollback?: RollbackAction;
  readonly options: Readonly<ExecutionOptionsInput>;
}

/** An operation after registration: named, indexed, options resolved. */
export interface RegisteredOperation {
  readonly name: string;
  /** 1-based registration index */
  readonly index: number;
  readonly execute: ExecuteAction;
  readonly rollback?: RollbackAction;
  readonly options: ExecutionOptions;
}
