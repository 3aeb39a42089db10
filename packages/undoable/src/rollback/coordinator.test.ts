import { describe, it, expect } from "vitest";
import type { OperationContext, RollbackAction } from "../operation/types";
import { SharedContext } from "../context/shared-context";
import { err, ok } from "../result";
import { createRollbackCoordinator, type RollbackTarget } from "./coordinator";

function contextFactory(target: RollbackTarget, signal: AbortSignal): OperationContext {
  return {
    runId: "run-1",
    operationName: target.name,
    attempt: 1,
    phase: "rollback",
    shared: new SharedContext(),
    signal,
    log: () => {},
    reportProgress: () => {},
  };
}

function target(name: string, index: number, rollback?: RollbackAction, timeoutMs = 1_000): RollbackTarget {
  return { name, index, rollback, timeoutMs };
}

describe("createRollbackCoordinator", () => {
  it("compensates every target and counts missing rollbacks as compensated", async () => {
    const calls: string[] = [];
    const coordinator = createRollbackCoordinator({ strategy: "parallel", createContext: contextFactory });

    const result = await coordinator.rollbackAll([
      target("a", 1, ({ operationName }) => {
        calls.push(operationName);
        return ok(undefined);
      }),
      target("b", 2),
    ]);

    expect(calls).toEqual(["a"]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.compensated).toEqual(["a", "b"]);
      expect(result.value.withoutRollback).toEqual(["b"]);
      expect(result.value.failures).toEqual([]);
    }
  });

  it("runs rollbacks in reverse start order under the reverse strategy", async () => {
    const calls: string[] = [];
    const record: RollbackAction = async ({ operationName }) => {
      calls.push(operationName);
      return ok(undefined);
    };
    const coordinator = createRollbackCoordinator({ strategy: "reverse", createContext: contextFactory });

    await coordinator.rollbackAll([target("a", 1, record), target("b", 2, record), target("c", 3, record)]);
    expect(calls).toEqual(["c", "b", "a"]);
  });

  it("attempts every rollback and reports failures in registration order", async () => {
    const coordinator = createRollbackCoordinator({ strategy: "reverse", createContext: contextFactory });
    const thrown = new Error("refund api down");

    const result = await coordinator.rollbackAll([
      target("a", 1, () => err("ALREADY_RELEASED")),
      target("b", 2, () => ok(undefined)),
      target("c", 3, () => {
        throw thrown;
      }),
    ]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe("ROLLBACK_INCOMPLETE");
      expect(result.error.failures).toEqual([
        { type: "ROLLBACK_FAILED", operationName: "a", origin: "result", error: "ALREADY_RELEASED", cause: undefined },
        { type: "ROLLBACK_FAILED", operationName: "c", origin: "throw", error: thrown, cause: thrown },
      ]);
      expect(result.error.report.compensated).toEqual(["b"]);
    }
  });

  it("bounds each rollback by its timeout", async () => {
    const coordinator = createRollbackCoordinator({ strategy: "parallel", createContext: contextFactory });

    const result = await coordinator.rollbackAll([
      target("slow", 1, () => new Promise<never>(() => {}), 20),
    ]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.failures).toEqual([
        {
          type: "ROLLBACK_FAILED",
          operationName: "slow",
          origin: "timeout",
          error: { type: "OPERATION_TIMEOUT", operationName: "slow", phase: "rollback", timeoutMs: 20 },
        },
      ]);
    }
  });

  it("reports cancellation when given an aborted signal", async () => {
    const coordinator = createRollbackCoordinator({ strategy: "parallel", createContext: contextFactory });
    const controller = new AbortController();
    controller.abort("shutdown");

    const result = await coordinator.rollbackAll([target("a", 1, () => ok(undefined))], controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.failures[0]).toEqual({
        type: "ROLLBACK_FAILED",
        operationName: "a",
        origin: "cancelled",
        error: { type: "OPERATION_CANCELLED", operationName: "a", reason: "shutdown" },
      });
    }
  });
});
