/**
 * undoable/errors
 *
 * Failure taxonomy for orchestrated runs. Every error is a plain object with
 * a `type` discriminant so it can be switched on exhaustively and serialized.
 *
 * @example
 * ```typescript
 * import { describeError, isRetryExhaustedError } from 'undoable/errors';
 *
 * if (!result.ok) {
 *   for (const error of result.error.errors) {
 *     console.log(describeError(error));
 *   }
 * }
 * ```
 */

import { messageOf } from "./result";

// =============================================================================
// Discriminants
// =============================================================================

export const OPERATION_FAILED = "OPERATION_FAILED" as const;
export const OPERATION_TIMEOUT = "OPERATION_TIMEOUT" as const;
export const OPERATION_CANCELLED = "OPERATION_CANCELLED" as const;
export const RETRY_EXHAUSTED = "RETRY_EXHAUSTED" as const;
export const ROLLBACK_FAILED = "ROLLBACK_FAILED" as const;
export const RESULT_TYPE_MISMATCH = "RESULT_TYPE_MISMATCH" as const;
export const CONTEXT_KEY_NOT_FOUND = "CONTEXT_KEY_NOT_FOUND" as const;
export const CONTEXT_TYPE_MISMATCH = "CONTEXT_TYPE_MISMATCH" as const;

// =============================================================================
// Error Types
// =============================================================================

/**
 * The execute action returned an Err, threw, or its branch predicate threw.
 */
export type OperationFailedError = {
  type: typeof OPERATION_FAILED;
  operationName: string;
  /** 1-based attempt number; 0 when the branch predicate failed */
  attempt: number;
  origin: "result" | "throw" | "predicate";
  error: unknown;
  cause?: unknown;
};

/**
 * An execute attempt or a rollback exceeded its time bound.
 */
export type OperationTimeoutError = {
  type: typeof OPERATION_TIMEOUT;
  operationName: string;
  phase: "execute" | "rollback";
  timeoutMs: number;
  attempt?: number;
};

/**
 * Cancellation was observed. `operationName` is absent when the run was
 * cancelled between operations.
 */
export type OperationCancelledError = {
  type: typeof OPERATION_CANCELLED;
  operationName?: string;
  reason?: unknown;
};

/**
 * Every attempt of an operation configured with retries failed.
 */
export type RetryExhaustedError = {
  type: typeof RETRY_EXHAUSTED;
  operationName: string;
  attempts: number;
  lastError: AttemptError;
};

export type RollbackFailedError = {
  type: typeof ROLLBACK_FAILED;
  operationName: string;
  origin: "result" | "throw" | "timeout" | "cancelled";
  error: unknown;
  cause?: unknown;
};

/**
 * A typed-results run received no value, or a value its guard rejected.
 */
export type ResultTypeMismatchError = {
  type: typeof RESULT_TYPE_MISMATCH;
  operationName: string;
  value: unknown;
};

export type ContextKeyNotFoundError = {
  type: typeof CONTEXT_KEY_NOT_FOUND;
  key: string;
};

export type ContextTypeMismatchError = {
  type: typeof CONTEXT_TYPE_MISMATCH;
  key: string;
  issues: string[];
};

/** Failure of a single execute attempt. */
export type AttemptError = OperationFailedError | OperationTimeoutError;

/** Anything recorded against an operation during the execute phase. */
export type OperationError =
  | AttemptError
  | OperationCancelledError
  | RetryExhaustedError
  | ResultTypeMismatchError;

/** Any entry of an aggregated run failure. */
export type RunError = OperationError | RollbackFailedError;

export type ContextLookupError = ContextKeyNotFoundError | ContextTypeMismatchError;

// =============================================================================
// Type Guards
// =============================================================================

const hasType = (e: unknown, type: string): boolean =>
  typeof e === "object" && e !== null && "type" in e && e.type === type;

export const isOperationFailedError = (e: unknown): e is OperationFailedError =>
  hasType(e, OPERATION_FAILED);

export const isOperationTimeoutError = (e: unknown): e is OperationTimeoutError =>
  hasType(e, OPERATION_TIMEOUT);

export const isOperationCancelledError = (e: unknown): e is OperationCancelledError =>
  hasType(e, OPERATION_CANCELLED);

export const isRetryExhaustedError = (e: unknown): e is RetryExhaustedError =>
  hasType(e, RETRY_EXHAUSTED);

export const isRollbackFailedError = (e: unknown): e is RollbackFailedError =>
  hasType(e, ROLLBACK_FAILED);

export const isResultTypeMismatchError = (e: unknown): e is ResultTypeMismatchError =>
  hasType(e, RESULT_TYPE_MISMATCH);

export const isContextLookupError = (e: unknown): e is ContextLookupError =>
  hasType(e, CONTEXT_KEY_NOT_FOUND) || hasType(e, CONTEXT_TYPE_MISMATCH);

// =============================================================================
// Messages
// =============================================================================

/**
 * Render any taxonomy error as a single human readable line.
 *
 * @example
 * ```typescript
 * describeError({ type: 'OPERATION_TIMEOUT', operationName: 'charge', phase: 'execute', timeoutMs: 500 });
 * // 'Operation "charge" timed out after 500ms'
 * ```
 */
export function describeError(error: RunError | ContextLookupError): string {
  switch (error.type) {
    case OPERATION_FAILED:
      return error.origin === "predicate"
        ? `Condition for operation "${error.operationName}" failed: ${messageOf(error.error)}`
        : `Operation "${error.operationName}" failed: ${messageOf(error.error)}`;
    case OPERATION_TIMEOUT:
      return error.phase === "rollback"
        ? `Rollback of "${error.operationName}" timed out after ${error.timeoutMs}ms`
        : `Operation "${error.operationName}" timed out after ${error.timeoutMs}ms`;
    case OPERATION_CANCELLED: {
      const subject =
        error.operationName !== undefined
          ? `Operation "${error.operationName}" was cancelled`
          : "Run was cancelled";
      return error.reason !== undefined ? `${subject}: ${messageOf(error.reason)}` : subject;
    }
    case RETRY_EXHAUSTED:
      return `Operation "${error.operationName}" failed after ${error.attempts} attempts: ${describeError(error.lastError)}`;
    case ROLLBACK_FAILED:
      return isOperationTimeoutError(error.error) || isOperationCancelledError(error.error)
        ? describeError(error.error)
        : `Rollback of "${error.operationName}" failed: ${messageOf(error.error)}`;
    case RESULT_TYPE_MISMATCH:
      return `Operation "${error.operationName}" did not produce a typed result`;
    case CONTEXT_KEY_NOT_FOUND:
      return `Key "${error.key}" not found in shared context`;
    case CONTEXT_TYPE_MISMATCH:
      return `Key "${error.key}" holds a value of the wrong type: ${error.issues.join("; ")}`;
  }
}

// =============================================================================
// Definition errors
// =============================================================================

/**
 * Thrown when an operation is registered without an execute action, with a
 * duplicate name, or with invalid execution options.
 */
export class OperationDefinitionError extends Error {
  public readonly operationName?: string;

  constructor(message: string, operationName?: string) {
    super(message);
    this.name = "OperationDefinitionError";
    this.operationName = operationName;
  }
}

/**
 * Thrown when orchestrator options fail validation.
 */
export class InvalidOptionsError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
    this.issues = issues;
  }
}
