/**
 * Runs compensations for every operation that started in a failed run.
 *
 * Every rollback is attempted; one failing or timing out never prevents the
 * others. The coordinator itself never throws.
 */

import type { RollbackStrategy } from "../config";
import {
  OPERATION_CANCELLED,
  OPERATION_TIMEOUT,
  ROLLBACK_FAILED,
  type RollbackFailedError,
} from "../errors";
import type { OperationContext, RollbackAction } from "../operation/types";
import { err, ok, type AsyncResult } from "../result";
import { executeWithTimeout, type AttemptOutcome } from "../retry";

// =============================================================================
// Types
// =============================================================================

export interface RollbackTarget {
  readonly name: string;
  /** Registration index; failures are reported in this order */
  readonly index: number;
  readonly rollback?: RollbackAction;
  readonly timeoutMs: number;
}

export interface RollbackReport {
  /** Operations whose rollback succeeded or that had none */
  compensated: string[];
  /** Subset of `compensated` with no rollback action */
  withoutRollback: string[];
  failures: RollbackFailedError[];
  durationMs: number;
}

export const ROLLBACK_INCOMPLETE = "ROLLBACK_INCOMPLETE" as const;

export type RollbackIncompleteError = {
  type: typeof ROLLBACK_INCOMPLETE;
  failures: RollbackFailedError[];
  report: RollbackReport;
};

export interface RollbackCoordinatorOptions {
  strategy: RollbackStrategy;
  createContext: (target: RollbackTarget, signal: AbortSignal) => OperationContext;
}

export interface RollbackCoordinator {
  /**
   * Compensate `targets`, given in start order. `signal` is optional; the
   * orchestrator passes none so that cancelling a run still compensates it.
   */
  rollbackAll(
    targets: readonly RollbackTarget[],
    signal?: AbortSignal
  ): AsyncResult<RollbackReport, RollbackIncompleteError>;
}

type Settled = { target: RollbackTarget; failure?: RollbackFailedError };

// =============================================================================
// Coordinator
// =============================================================================

/**
 * @example
 * ```typescript
 * const coordinator = createRollbackCoordinator({ strategy: 'reverse', createContext });
 * const result = await coordinator.rollbackAll(started);
 * if (!result.ok) console.log(result.error.failures.map(describeError));
 * ```
 */
export function createRollbackCoordinator(options: RollbackCoordinatorOptions): RollbackCoordinator {
  const { strategy, createContext } = options;

  async function compensate(target: RollbackTarget, signal?: AbortSignal): Promise<Settled> {
    const action = target.rollback;
    if (!action) return { target };

    const outcome = await executeWithTimeout(
      (attemptSignal) => action(createContext(target, attemptSignal), attemptSignal),
      target.timeoutMs,
      signal
    );
    return { target, failure: toFailure(target, outcome) };
  }

  return {
    async rollbackAll(targets, signal) {
      const startedAt = performance.now();
      let settled: Settled[];

      if (strategy === "reverse") {
        settled = [];
        for (const target of [...targets].reverse()) {
          settled.push(await compensate(target, signal));
        }
      } else {
        settled = await Promise.all(targets.map((target) => compensate(target, signal)));
      }

      const report: RollbackReport = {
        compensated: [],
        withoutRollback: [],
        failures: [],
        durationMs: performance.now() - startedAt,
      };
      for (const { target, failure } of settled) {
        if (!failure) {
          report.compensated.push(target.name);
          if (!target.rollback) report.withoutRollback.push(target.name);
        }
      }
      report.failures = settled
        .flatMap(({ target, failure }) => (failure ? [{ index: target.index, failure }] : []))
        .sort((a, b) => a.index - b.index)
        .map(({ failure }) => failure);

      return report.failures.length === 0
        ? ok(report)
        : err({ type: ROLLBACK_INCOMPLETE, failures: report.failures, report });
    },
  };
}

function toFailure(
  target: RollbackTarget,
  outcome: AttemptOutcome<unknown>
): RollbackFailedError | undefined {
  const base = { type: ROLLBACK_FAILED, operationName: target.name };
  switch (outcome.status) {
    case "ok":
      return undefined;
    case "error":
      return {
        ...base,
        origin: outcome.origin,
        error: outcome.error,
        cause: outcome.origin === "throw" ? outcome.error : outcome.cause,
      };
    case "timeout":
      return {
        ...base,
        origin: "timeout",
        error: {
          type: OPERATION_TIMEOUT,
          operationName: target.name,
          phase: "rollback",
          timeoutMs: outcome.timeoutMs,
        },
      };
    case "cancelled":
      return {
        ...base,
        origin: "cancelled",
        error: { type: OPERATION_CANCELLED, operationName: target.name, reason: outcome.reason },
      };
  }
}
