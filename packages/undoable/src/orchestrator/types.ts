import type {
  ExecutionOptionsInput,
  ParallelFailurePolicy,
  RollbackStrategy,
} from "../config";
import type { SharedContext } from "../context/shared-context";
import { describeError, type RunError } from "../errors";
import type { ListenerErrorHandler } from "../events";

// =============================================================================
// State
// =============================================================================

/**
 * `idle -> running -> (completed | failed | rolling_back -> rolled_back) -> idle`
 */
export type RunState = "idle" | "running" | "completed" | "failed" | "rolling_back" | "rolled_back";

export type TerminalRunState = Extract<RunState, "completed" | "failed" | "rolled_back">;

// =============================================================================
// Options
// =============================================================================

export interface OrchestratorOptions {
  /** Used by log sinks. @default 'orchestrator' */
  name?: string;
  /** Execution options applied under every operation's own options */
  defaults?: ExecutionOptionsInput;
  /** @default 'respect-operation' */
  parallelFailurePolicy?: ParallelFailurePolicy;
  /** @default 'parallel' */
  rollbackStrategy?: RollbackStrategy;
  /** Receives errors thrown by event listeners instead of a `log` event */
  onListenerError?: ListenerErrorHandler;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Seed values for the run's SharedContext */
  initialValues?: Record<string, unknown>;
}

export interface RunWithResultsOptions<T> extends RunOptions {
  /** Rejected values fail the run with RESULT_TYPE_MISMATCH */
  guard?: (value: unknown) => value is T;
}

/**
 * Decides whether the operation registered under the same name runs.
 * A throw is recorded as a failure of that operation.
 */
export type BranchPredicate = (shared: SharedContext, signal: AbortSignal) => boolean | Promise<boolean>;

// =============================================================================
// Reports
// =============================================================================

export type ExecutionRecord =
  | {
      operationName: string;
      index: number;
      outcome: "completed" | "failed" | "cancelled";
      /** 0 when the branch predicate failed */
      attempts: number;
      durationMs: number;
    }
  | { operationName: string; index: number; outcome: "skipped" };

export interface RunReport {
  runId: string;
  durationMs: number;
  /** In the order operations finished */
  records: ExecutionRecord[];
  completed: string[];
  skipped: string[];
}

export const ORCHESTRATION_FAILED = "ORCHESTRATION_FAILED" as const;

/**
 * Aggregated failure of a run. `errors` lists operation-phase errors in the
 * order they occurred, then rollback failures in registration order.
 */
export type OrchestrationFailure = {
  type: typeof ORCHESTRATION_FAILED;
  runId: string;
  message: string;
  errors: RunError[];
  cancelled: boolean;
  /** Operations compensated during rollback */
  rolledBack: string[];
  state: Extract<RunState, "failed" | "rolled_back">;
  records: ExecutionRecord[];
  durationMs: number;
};

export const isOrchestrationFailure = (e: unknown): e is OrchestrationFailure =>
  typeof e === "object" && e !== null && "type" in e && e.type === ORCHESTRATION_FAILED;

/**
 * One error renders as itself, several as `"<n> errors: a; b"`.
 */
export function summarizeErrors(errors: readonly RunError[]): string {
  if (errors.length === 1) return describeError(errors[0]);
  return `${errors.length} errors: ${errors.map(describeError).join("; ")}`;
}
