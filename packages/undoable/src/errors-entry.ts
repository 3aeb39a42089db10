/**
 * undoable/errors entry point
 *
 * Failure taxonomy, type guards and message formatting.
 */
export {
  // Discriminants
  OPERATION_FAILED,
  OPERATION_TIMEOUT,
  OPERATION_CANCELLED,
  RETRY_EXHAUSTED,
  ROLLBACK_FAILED,
  RESULT_TYPE_MISMATCH,
  CONTEXT_KEY_NOT_FOUND,
  CONTEXT_TYPE_MISMATCH,
  // Error types
  type OperationFailedError,
  type OperationTimeoutError,
  type OperationCancelledError,
  type RetryExhaustedError,
  type RollbackFailedError,
  type ResultTypeMismatchError,
  type ContextKeyNotFoundError,
  type ContextTypeMismatchError,
  // Unions
  type AttemptError,
  type OperationError,
  type RunError,
  type ContextLookupError,
  // Type guards
  isOperationFailedError,
  isOperationTimeoutError,
  isOperationCancelledError,
  isRetryExhaustedError,
  isRollbackFailedError,
  isResultTypeMismatchError,
  isContextLookupError,
  // Formatting
  describeError,
  // Definition errors
  OperationDefinitionError,
  InvalidOptionsError,
} from "./errors";
export {
  ORCHESTRATION_FAILED,
  isOrchestrationFailure,
  type OrchestrationFailure,
} from "./orchestrator/types";
export {
  ROLLBACK_INCOMPLETE,
  type RollbackIncompleteError,
} from "./rollback/coordinator";
