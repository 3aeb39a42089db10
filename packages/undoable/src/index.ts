/**
 * undoable
 *
 * Transactional operation orchestrator: run an ordered list of operations,
 * and when one fails, compensate everything that started.
 *
 * @example
 * ```typescript
 * import { createOrchestrator, operation, ok, err } from 'undoable';
 *
 * const orchestrator = createOrchestrator()
 *   .add(
 *     operation('create-account')
 *       .execute(async ({ shared }) => {
 *         const id = await accounts.create(user);
 *         shared.set('accountId', id);
 *         return ok(id);
 *       })
 *       .rollback(async ({ shared }) => {
 *         const id = shared.get('accountId', z.string());
 *         return id.ok ? ok(await accounts.remove(id.value)) : id;
 *       })
 *       .build()
 *   )
 *   .add('send-welcome', async () => mailer.welcome(user), undefined, { maxRetries: 2 });
 *
 * const result = await orchestrator.run();
 * ```
 *
 * Granular entry points: `undoable/errors`, `undoable/context`.
 */

// =============================================================================
// Result
// =============================================================================
export {
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  type MaybeAsyncResult,
  type Outcome,
  ok,
  err,
  isOk,
  isErr,
  isResult,
  unwrap,
  unwrapOr,
  UnwrapError,
  map,
  mapError,
  tryAsync,
  toOutcome,
  messageOf,
} from "./result";

// =============================================================================
// Orchestrator
// =============================================================================
export {
  Orchestrator,
  createOrchestrator,
  ORCHESTRATION_FAILED,
  isOrchestrationFailure,
  summarizeErrors,
  type BranchPredicate,
  type ExecutionRecord,
  type OrchestrationFailure,
  type OrchestratorOptions,
  type RunOptions,
  type RunReport,
  type RunState,
  type RunWithResultsOptions,
  type TerminalRunState,
} from "./orchestrator";

// =============================================================================
// Operations
// =============================================================================
export {
  defineOperation,
  isOperation,
  operation,
  OperationBuilder,
  type ExecuteAction,
  type Operation,
  type OperationContext,
  type OperationDefinition,
  type RegisteredOperation,
  type RetrySettings,
  type RollbackAction,
} from "./operation";

// =============================================================================
// Shared context
// =============================================================================
export { SharedContext, contextKey, type ContextKey, type LookupResult } from "./context";

// =============================================================================
// Rollback
// =============================================================================
export {
  createRollbackCoordinator,
  ROLLBACK_INCOMPLETE,
  type RollbackCoordinator,
  type RollbackCoordinatorOptions,
  type RollbackIncompleteError,
  type RollbackReport,
  type RollbackTarget,
} from "./rollback";

// =============================================================================
// Events
// =============================================================================
export {
  EventBus,
  isEventOfType,
  type EventOfType,
  type ListenerErrorHandler,
  type LogLevel,
  type OrchestratorEvent,
  type OrchestratorEventType,
  type OrchestratorListener,
} from "./events";

// =============================================================================
// Configuration and utilities
// =============================================================================
export {
  parseDuration,
  MAX_TIMER_DELAY_MS,
  resolveExecutionOptions,
  ExecutionOptionsSchema,
  OrchestratorSettingsSchema,
  type BackoffStrategy,
  type DurationInput,
  type ExecutionOptions,
  type ExecutionOptionsInput,
  type OrchestratorSettings,
  type ParallelFailurePolicy,
  type RollbackStrategy,
} from "./config";
export { calculateRetryDelay, executeWithTimeout, linkSignals, sleep, type AttemptOutcome } from "./retry";
export { PauseGate } from "./pause-gate";
export * from "./errors";
