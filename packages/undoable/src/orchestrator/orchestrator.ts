/**
 * Registration and control surface. Each `run()` snapshots the operation
 * list and branch predicates, so registering during a run only affects the
 * next one.
 *
 * @example
 * ```typescript
 * const orchestrator = createOrchestrator({ defaults: { executeTimeout: '30s' } })
 *   .add(reserveStock)
 *   .add(chargeCard)
 *   .add('send-receipt', sendReceipt, undefined, { continueOnFailure: true });
 *
 * orchestrator.on('progress_changed', (e) => console.log(`${e.percentage}%`));
 *
 * const result = await orchestrator.run();
 * if (!result.ok) {
 *   console.error(result.error.message);
 * }
 * ```
 */

import { randomUUID } from "node:crypto";
import {
  resolveExecutionOptions,
  resolveOrchestratorSettings,
  validateExecutionDefaults,
  type ExecutionOptionsInput,
  type OrchestratorSettings,
} from "../config";
import { SharedContext } from "../context/shared-context";
import { OperationDefinitionError } from "../errors";
import {
  EventBus,
  type EventOfType,
  type OrchestratorEventType,
  type OrchestratorListener,
} from "../events";
import { defineOperation } from "../operation/define";
import type {
  ExecuteAction,
  Operation,
  RegisteredOperation,
  RollbackAction,
} from "../operation/types";
import { PauseGate } from "../pause-gate";
import { ok, type AsyncResult, type Result } from "../result";
import { linkSignals } from "../retry";
import { RunSession, type SessionSuccess } from "./run-session";
import type {
  BranchPredicate,
  OrchestrationFailure,
  OrchestratorOptions,
  RunOptions,
  RunReport,
  RunState,
  RunWithResultsOptions,
  TerminalRunState,
} from "./types";

export class Orchestrator {
  readonly name: string;

  private readonly settings: OrchestratorSettings;
  private readonly defaults: ExecutionOptionsInput;
  private readonly operations: RegisteredOperation[] = [];
  private readonly branches = new Map<string, BranchPredicate>();
  private readonly bus: EventBus;
  private readonly gate = new PauseGate();
  private controller?: AbortController;
  private currentState: RunState = "idle";
  private lastState?: TerminalRunState;

  /**
   * @throws InvalidOptionsError when the options fail validation
   */
  constructor(options: OrchestratorOptions = {}) {
    this.settings = resolveOrchestratorSettings({
      name: options.name,
      parallelFailurePolicy: options.parallelFailurePolicy,
      rollbackStrategy: options.rollbackStrategy,
    });
    this.defaults = validateExecutionDefaults(options.defaults);
    this.bus = new EventBus(options.onListenerError);
    this.name = this.settings.name;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register an operation. Unnamed operations are called `operation-<n>`
   * after their 1-based position.
   *
   * @throws OperationDefinitionError on a missing execute action, a name
   * already registered (case-insensitive) or invalid options
   */
  add<T, E>(operation: Operation<T, E>): this;
  add<T, E>(
    name: string | undefined,
    execute: ExecuteAction<T, E>,
    rollback?: RollbackAction,
    options?: ExecutionOptionsInput
  ): this;
  add<T, E>(
    first: Operation<T, E> | string | undefined,
    execute?: ExecuteAction<T, E>,
    rollback?: RollbackAction,
    options?: ExecutionOptionsInput
  ): this {
    let definition: Operation<T, E>;
    if (typeof first === "object") {
      definition = first;
    } else {
      if (!execute) {
        const label = first !== undefined ? `"${first}"` : "(unnamed)";
        throw new OperationDefinitionError(`Operation ${label} has no execute action`, first);
      }
      definition = defineOperation({ name: first, execute, rollback, options });
    }

    const index = this.operations.length + 1;
    const name = definition.name ?? `operation-${index}`;
    if (this.operations.some((existing) => existing.name.toLowerCase() === name.toLowerCase())) {
      throw new OperationDefinitionError(`Operation "${name}" is already registered`, name);
    }

    this.operations.push(
      Object.freeze({
        name,
        index,
        execute: definition.execute,
        rollback: definition.rollback,
        options: Object.freeze(resolveExecutionOptions(definition.options, this.defaults, name)),
      })
    );
    return this;
  }

  /**
   * Gate the operation named `operationName` on `predicate`, evaluated
   * against the run's shared context just before the operation would start.
   * The operation need not be registered yet; a later call replaces an
   * earlier one.
   */
  addConditionalBranch(operationName: string, predicate: BranchPredicate): this {
    if (typeof predicate !== "function") {
      throw new OperationDefinitionError(
        `Condition for operation "${operationName}" must be a function`,
        operationName
      );
    }
    this.branches.set(operationName.toLowerCase(), predicate);
    return this;
  }

  /** Registered names in execution order. */
  get operationNames(): string[] {
    return this.operations.map((operation) => operation.name);
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Run every registered operation. On any failure, compensations run for
   * everything that started and the aggregated failure is returned.
   */
  async run(options: RunOptions = {}): AsyncResult<RunReport, OrchestrationFailure> {
    const result = await this.execute(options, undefined);
    return result.ok ? ok(result.value.report) : result;
  }

  /**
   * Like `run()`, also returning each executed operation's value in
   * registration order. An `undefined` value, or one the guard rejects,
   * fails that operation with RESULT_TYPE_MISMATCH.
   */
  runWithResults<T>(
    options: RunWithResultsOptions<T> & { guard: (value: unknown) => value is T }
  ): AsyncResult<RunReport & { values: T[] }, OrchestrationFailure>;
  runWithResults(options?: RunOptions): AsyncResult<RunReport & { values: unknown[] }, OrchestrationFailure>;
  async runWithResults<T>(
    options: RunWithResultsOptions<T> = {}
  ): AsyncResult<RunReport & { values: unknown[] }, OrchestrationFailure> {
    const result = await this.execute(options, { guard: options.guard });
    return result.ok ? ok({ ...result.value.report, values: result.value.values }) : result;
  }

  private async execute(
    options: RunOptions,
    results: { guard?: (value: unknown) => boolean } | undefined
  ): Promise<Result<SessionSuccess, OrchestrationFailure>> {
    const runId = randomUUID();
    const operations = [...this.operations];

    if (operations.length === 0) {
      this.lastState = "completed";
      return ok({
        report: { runId, durationMs: 0, records: [], completed: [], skipped: [] },
        values: [],
      });
    }

    const controller = new AbortController();
    this.controller = controller;
    const linked = linkSignals(options.signal, controller.signal);

    const session = new RunSession({
      runId,
      operations,
      branches: new Map(this.branches),
      settings: this.settings,
      bus: this.bus,
      gate: this.gate,
      signal: linked.signal,
      shared: new SharedContext(options.initialValues),
      results,
      onStateChange: (state) => {
        this.currentState = state;
      },
    });

    try {
      return await session.execute();
    } finally {
      linked.dispose();
      if (this.controller === controller) this.controller = undefined;
      if (isTerminal(this.currentState)) this.lastState = this.currentState;
      this.currentState = "idle";
    }
  }

  // ===========================================================================
  // Control
  // ===========================================================================

  /** Hold the run at its next checkpoint. Work in flight is not interrupted. */
  pause(): void {
    this.gate.pause();
  }

  resume(): void {
    this.gate.resume();
  }

  /**
   * Abort the current run. In-flight attempts see their signal abort and
   * started operations are rolled back. No-op while idle.
   */
  cancel(reason?: unknown): void {
    this.controller?.abort(reason);
  }

  get isPaused(): boolean {
    return this.gate.isPaused;
  }

  get state(): RunState {
    return this.currentState;
  }

  /** Terminal state of the most recent run, if any. */
  get lastRunState(): TerminalRunState | undefined {
    return this.lastState;
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  /** Receive every event. Returns an unsubscribe function. */
  subscribe(listener: OrchestratorListener): () => void {
    return this.bus.subscribe(listener);
  }

  on<K extends OrchestratorEventType>(type: K, listener: (event: EventOfType<K>) => void): () => void {
    return this.bus.on(type, listener);
  }

  off<K extends OrchestratorEventType>(type: K, listener: (event: EventOfType<K>) => void): void {
    this.bus.off(type, listener);
  }
}

function isTerminal(state: RunState): state is TerminalRunState {
  return state === "completed" || state === "failed" || state === "rolled_back";
}

/**
 * @throws InvalidOptionsError when the options fail validation
 */
export function createOrchestrator(options?: OrchestratorOptions): Orchestrator {
  return new Orchestrator(options);
}
