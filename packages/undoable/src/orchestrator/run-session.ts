/**
 * One execution of an orchestrator's operation list.
 *
 * A session owns everything that lives for a single run: the shared context,
 * the rollback set, the error list and the progress tally. The orchestrator
 * creates a fresh session per `run()` and discards it afterwards.
 */

import type { OrchestratorSettings } from "../config";
import type { SharedContext } from "../context/shared-context";
import {
  OPERATION_CANCELLED,
  OPERATION_FAILED,
  OPERATION_TIMEOUT,
  RESULT_TYPE_MISMATCH,
  RETRY_EXHAUSTED,
  describeError,
  type AttemptError,
  type OperationError,
  type RunError,
} from "../errors";
import type { EventBus, LogLevel, OrchestratorEvent } from "../events";
import type { OperationContext, RegisteredOperation } from "../operation/types";
import type { PauseGate } from "../pause-gate";
import { err, ok, type Result } from "../result";
import { calculateRetryDelay, executeWithTimeout, sleep } from "../retry";
import { createRollbackCoordinator, type RollbackTarget } from "../rollback/coordinator";
import {
  ORCHESTRATION_FAILED,
  summarizeErrors,
  type BranchPredicate,
  type ExecutionRecord,
  type OrchestrationFailure,
  type RunReport,
  type RunState,
} from "./types";

export interface RunSessionConfig {
  runId: string;
  operations: readonly RegisteredOperation[];
  /** Keyed by lower-cased operation name */
  branches: ReadonlyMap<string, BranchPredicate>;
  settings: OrchestratorSettings;
  bus: EventBus;
  gate: PauseGate;
  signal: AbortSignal;
  shared: SharedContext;
  /** Present when the caller wants execute values back */
  results?: { guard?: (value: unknown) => boolean };
  onStateChange: (state: RunState) => void;
}

export interface SessionSuccess {
  report: RunReport;
  values: unknown[];
}

type OperationStatus = "completed" | "failed" | "cancelled";

type ExecutionOutcome =
  | { status: "completed"; value: unknown; attempts: number }
  | { status: "failed" | "cancelled"; error: OperationError; attempts: number };

type PendingMember = { operation: RegisteredOperation; done: Promise<OperationStatus> };

export class RunSession {
  private readonly errors: OperationError[] = [];
  private readonly records: ExecutionRecord[] = [];
  private readonly started: RegisteredOperation[] = [];
  private readonly values = new Map<number, unknown>();
  private pending: PendingMember[] = [];
  private completedCount = 0;
  private denominator: number;
  private lastPercentage = 0;
  private cancelled = false;
  private readonly startedAt = performance.now();

  constructor(private readonly config: RunSessionConfig) {
    this.denominator = config.operations.length;
  }

  async execute(): Promise<Result<SessionSuccess, OrchestrationFailure>> {
    const { operations } = this.config;
    this.config.onStateChange("running");
    this.emitRunStarted(operations.length);

    for (const operation of operations) {
      if (!operation.options.allowParallel && (await this.joinPending())) break;
      if (!(await this.checkpoint(operation))) break;

      const decision = await this.evaluateBranch(operation);
      if (decision === "skip") continue;
      if (decision === "failed") {
        if (operation.options.continueOnFailure) continue;
        break;
      }

      if (operation.options.allowParallel) {
        this.pending.push({ operation, done: this.runOperation(operation, true) });
        continue;
      }

      const status = await this.runOperation(operation, false);
      if (status === "cancelled") break;
      if (status === "failed" && !operation.options.continueOnFailure) break;
    }
    await this.joinPending();

    return this.errors.length === 0 ? this.succeed() : this.fail();
  }

  // ===========================================================================
  // Loop steps
  // ===========================================================================

  /**
   * Pause and cancellation checkpoint. Returns false when the run was
   * cancelled, after recording it.
   */
  private async checkpoint(operation: RegisteredOperation): Promise<boolean> {
    const { gate, signal } = this.config;
    if (gate.isPaused && !signal.aborted) {
      this.log("info", `Execution paused before operation "${operation.name}"`, operation.name);
      await gate.wait(signal);
    }
    if (!signal.aborted) return true;

    this.cancelled = true;
    this.errors.push({ type: OPERATION_CANCELLED, reason: signal.reason });
    return false;
  }

  private async evaluateBranch(operation: RegisteredOperation): Promise<"run" | "skip" | "failed"> {
    const predicate = this.config.branches.get(operation.name.toLowerCase());
    if (!predicate) return "run";

    try {
      if (await predicate(this.config.shared, this.config.signal)) return "run";
    } catch (error) {
      const failure: OperationError = {
        type: OPERATION_FAILED,
        operationName: operation.name,
        attempt: 0,
        origin: "predicate",
        error,
        cause: error,
      };
      this.errors.push(failure);
      this.records.push({
        operationName: operation.name,
        index: operation.index,
        outcome: "failed",
        attempts: 0,
        durationMs: 0,
      });
      this.emitFailed(operation, failure, 0, 0);
      return "failed";
    }

    this.records.push({ operationName: operation.name, index: operation.index, outcome: "skipped" });
    this.emit({
      type: "operation_skipped",
      runId: this.config.runId,
      ts: Date.now(),
      operationName: operation.name,
      index: operation.index,
    });
    this.log("info", `Skipping operation "${operation.name}": condition evaluated to false`, operation.name);

    this.denominator -= 1;
    if (this.percentage() > this.lastPercentage) {
      this.emitProgress(`Operation "${operation.name}" skipped (${this.progressLabel()})`, operation.name);
    }
    return "skip";
  }

  /**
   * Join the current parallel group. Returns true when the group's failures
   * stop the run under the configured policy.
   */
  private async joinPending(): Promise<boolean> {
    const group = this.pending;
    this.pending = [];
    if (group.length === 0) return false;

    const statuses = await Promise.all(group.map((member) => member.done));
    if (statuses.includes("cancelled")) return true;

    const failed = group.filter((_, i) => statuses[i] === "failed");
    if (failed.length === 0) return false;

    switch (this.config.settings.parallelFailurePolicy) {
      case "continue":
        return false;
      case "abort":
        return true;
      case "respect-operation":
        return failed.some((member) => !member.operation.options.continueOnFailure);
    }
  }

  private async runOperation(operation: RegisteredOperation, parallel: boolean): Promise<OperationStatus> {
    this.started.push(operation);
    this.emit({
      type: "operation_started",
      runId: this.config.runId,
      ts: Date.now(),
      operationName: operation.name,
      index: operation.index,
      parallel,
    });

    const begin = performance.now();
    const outcome = await this.executeWithRetry(operation);
    const durationMs = performance.now() - begin;

    if (outcome.status === "completed") {
      const mismatch = this.checkValue(operation, outcome.value);
      if (!mismatch) {
        this.recordSuccess(operation, outcome.value, outcome.attempts, durationMs);
        return "completed";
      }
      this.recordFailure(operation, "failed", mismatch, outcome.attempts, durationMs);
      return "failed";
    }

    if (outcome.status === "cancelled") this.cancelled = true;
    this.recordFailure(operation, outcome.status, outcome.error, outcome.attempts, durationMs);
    return outcome.status;
  }

  private async executeWithRetry(operation: RegisteredOperation): Promise<ExecutionOutcome> {
    const { options, name } = operation;
    const { signal } = this.config;
    const maxAttempts = options.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      const outcome = await executeWithTimeout(
        (attemptSignal) =>
          operation.execute(this.createContext(name, attempt, "execute", attemptSignal), attemptSignal),
        options.executeTimeout,
        signal
      );

      if (outcome.status === "ok") {
        return { status: "completed", value: outcome.value, attempts: attempt };
      }
      if (outcome.status === "cancelled") {
        return {
          status: "cancelled",
          error: { type: OPERATION_CANCELLED, operationName: name, reason: outcome.reason },
          attempts: attempt,
        };
      }

      const attemptError: AttemptError =
        outcome.status === "timeout"
          ? {
              type: OPERATION_TIMEOUT,
              operationName: name,
              phase: "execute",
              timeoutMs: outcome.timeoutMs,
              attempt,
            }
          : {
              type: OPERATION_FAILED,
              operationName: name,
              attempt,
              origin: outcome.origin,
              error: outcome.error,
              cause: outcome.origin === "throw" ? outcome.error : outcome.cause,
            };

      if (attempt >= maxAttempts) {
        return {
          status: "failed",
          error:
            options.maxRetries > 0
              ? { type: RETRY_EXHAUSTED, operationName: name, attempts: attempt, lastError: attemptError }
              : attemptError,
          attempts: attempt,
        };
      }

      const delayMs = calculateRetryDelay(attempt, options);
      this.emit({
        type: "operation_retry",
        runId: this.config.runId,
        ts: Date.now(),
        operationName: name,
        attempt,
        maxAttempts,
        delayMs,
        error: attemptError,
      });
      this.log(
        "warn",
        `Retrying operation "${name}" in ${delayMs}ms (attempt ${attempt + 1} of ${maxAttempts}): ${describeError(attemptError)}`,
        name
      );

      await sleep(delayMs, signal);
      if (signal.aborted) {
        return {
          status: "cancelled",
          error: { type: OPERATION_CANCELLED, operationName: name, reason: signal.reason },
          attempts: attempt,
        };
      }
    }
  }

  private checkValue(operation: RegisteredOperation, value: unknown): OperationError | undefined {
    const { results } = this.config;
    if (!results) return undefined;
    if (value !== undefined && (!results.guard || results.guard(value))) return undefined;
    return { type: RESULT_TYPE_MISMATCH, operationName: operation.name, value };
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  private recordSuccess(
    operation: RegisteredOperation,
    value: unknown,
    attempts: number,
    durationMs: number
  ): void {
    this.completedCount += 1;
    if (this.config.results) this.values.set(operation.index, value);
    this.records.push({
      operationName: operation.name,
      index: operation.index,
      outcome: "completed",
      attempts,
      durationMs,
    });
    this.emit({
      type: "operation_completed",
      runId: this.config.runId,
      ts: Date.now(),
      operationName: operation.name,
      index: operation.index,
      durationMs,
      attempts,
    });
    this.log("info", `Operation "${operation.name}" completed in ${Math.round(durationMs)}ms`, operation.name);
    this.emitProgress(`Operation "${operation.name}" completed (${this.progressLabel()})`, operation.name);
  }

  private recordFailure(
    operation: RegisteredOperation,
    outcome: "failed" | "cancelled",
    error: OperationError,
    attempts: number,
    durationMs: number
  ): void {
    this.errors.push(error);
    this.records.push({
      operationName: operation.name,
      index: operation.index,
      outcome,
      attempts,
      durationMs,
    });
    this.emitFailed(operation, error, attempts, durationMs);
  }

  // ===========================================================================
  // Completion
  // ===========================================================================

  private succeed(): Result<SessionSuccess, OrchestrationFailure> {
    const durationMs = this.elapsed();
    this.config.onStateChange("completed");
    this.log("info", `All operations completed in ${Math.round(durationMs)}ms`);
    this.emit({ type: "run_completed", runId: this.config.runId, ts: Date.now(), durationMs });

    const values = [...this.values.entries()].sort(([a], [b]) => a - b).map(([, value]) => value);
    return ok({ report: this.report(durationMs), values });
  }

  private async fail(): Promise<Result<SessionSuccess, OrchestrationFailure>> {
    const { runId, settings, onStateChange } = this.config;
    onStateChange("rolling_back");

    const targets: RollbackTarget[] = this.started.map((operation) => ({
      name: operation.name,
      index: operation.index,
      rollback: operation.rollback,
      timeoutMs: operation.options.rollbackTimeout,
    }));
    this.emit({
      type: "rollback_started",
      runId,
      ts: Date.now(),
      operationNames: targets.map((target) => target.name),
    });
    if (targets.length > 0) {
      this.log("info", `Rolling back ${targets.length} operation${targets.length === 1 ? "" : "s"}`);
    }

    const coordinator = createRollbackCoordinator({
      strategy: settings.rollbackStrategy,
      createContext: (target, signal) => this.createContext(target.name, 1, "rollback", signal),
    });
    const rollback = await coordinator.rollbackAll(targets);
    const report = rollback.ok ? rollback.value : rollback.error.report;

    for (const failure of report.failures) {
      this.log("error", describeError(failure), failure.operationName);
    }
    this.emit({
      type: "rollback_completed",
      runId,
      ts: Date.now(),
      durationMs: report.durationMs,
      compensated: report.compensated,
      failures: report.failures,
    });

    const errors: RunError[] = [...this.errors, ...report.failures];
    const state = targets.length > 0 && rollback.ok ? "rolled_back" : "failed";
    onStateChange(state);

    const durationMs = this.elapsed();
    this.emit({
      type: "run_failed",
      runId,
      ts: Date.now(),
      durationMs,
      errorCount: errors.length,
      cancelled: this.cancelled,
    });

    return err({
      type: ORCHESTRATION_FAILED,
      runId,
      message: summarizeErrors(errors),
      errors,
      cancelled: this.cancelled,
      rolledBack: report.compensated,
      state,
      records: this.records,
      durationMs,
    });
  }

  private report(durationMs: number): RunReport {
    return {
      runId: this.config.runId,
      durationMs,
      records: this.records,
      completed: this.records.filter((r) => r.outcome === "completed").map((r) => r.operationName),
      skipped: this.records.filter((r) => r.outcome === "skipped").map((r) => r.operationName),
    };
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  private createContext(
    operationName: string,
    attempt: number,
    phase: "execute" | "rollback",
    signal: AbortSignal
  ): OperationContext {
    const { runId, shared } = this.config;
    return {
      runId,
      operationName,
      attempt,
      phase,
      shared,
      signal,
      log: (message, level = "info") => this.log(level, message, operationName),
      reportProgress: (percentage, message = "") =>
        this.emit({
          type: "operation_progress",
          runId,
          ts: Date.now(),
          operationName,
          percentage: Math.min(100, Math.max(0, percentage)),
          message,
        }),
    };
  }

  private emit(event: OrchestratorEvent): void {
    this.config.bus.emit(event);
  }

  private log(level: LogLevel, message: string, operationName?: string): void {
    this.emit({ type: "log", runId: this.config.runId, ts: Date.now(), level, message, operationName });
  }

  private emitRunStarted(operationCount: number): void {
    this.emit({ type: "run_started", runId: this.config.runId, ts: Date.now(), operationCount });
    this.log("info", `Running ${operationCount} operation${operationCount === 1 ? "" : "s"}`);
  }

  private emitFailed(
    operation: RegisteredOperation,
    error: OperationError,
    attempts: number,
    durationMs: number
  ): void {
    this.emit({
      type: "operation_failed",
      runId: this.config.runId,
      ts: Date.now(),
      operationName: operation.name,
      index: operation.index,
      durationMs,
      attempts,
      error,
    });
    this.log("error", describeError(error), operation.name);
  }

  private emitProgress(message: string, operationName?: string): void {
    const percentage = this.percentage();
    this.lastPercentage = percentage;
    this.emit({
      type: "progress_changed",
      runId: this.config.runId,
      ts: Date.now(),
      percentage,
      message,
      operationName,
    });
  }

  private percentage(): number {
    if (this.denominator <= 0) return 100;
    return (this.completedCount * 100) / this.denominator;
  }

  private progressLabel(): string {
    return `${this.completedCount}/${this.denominator}`;
  }

  private elapsed(): number {
    return performance.now() - this.startedAt;
  }
}
