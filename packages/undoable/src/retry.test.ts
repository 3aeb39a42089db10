import { describe, it, expect, vi } from "vitest";
import { err, ok } from "./result";
import { calculateRetryDelay, executeWithTimeout, linkSignals, sleep } from "./retry";

describe("calculateRetryDelay", () => {
  it("keeps a fixed delay", () => {
    const options = { backoff: "fixed", retryDelay: 100, maxRetryDelay: 30_000 } as const;
    expect([1, 2, 3].map((attempt) => calculateRetryDelay(attempt, options))).toEqual([100, 100, 100]);
  });

  it("doubles an exponential delay up to the cap", () => {
    const options = { backoff: "exponential", retryDelay: 100, maxRetryDelay: 1_000 } as const;
    expect([1, 2, 3, 4, 5].map((attempt) => calculateRetryDelay(attempt, options))).toEqual([
      100, 200, 400, 800, 1_000,
    ]);
  });

  it("never caps below the base delay", () => {
    expect(calculateRetryDelay(1, { backoff: "fixed", retryDelay: 500, maxRetryDelay: 100 })).toBe(500);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    try {
      let done = false;
      const pending = sleep(1_000).then(() => {
        done = true;
      });
      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});

describe("linkSignals", () => {
  it("aborts with the first source's reason", () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkSignals(a.signal, undefined, b.signal);
    b.abort("second");
    a.abort("first");
    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe("second");
  });

  it("is aborted immediately when a source already is", () => {
    const a = new AbortController();
    a.abort("early");
    expect(linkSignals(a.signal).signal.reason).toBe("early");
  });

  it("stops following sources after dispose", () => {
    const a = new AbortController();
    const linked = linkSignals(a.signal);
    linked.dispose();
    a.abort();
    expect(linked.signal.aborted).toBe(false);
  });
});

describe("executeWithTimeout", () => {
  it("returns the value of an Ok result", async () => {
    expect(await executeWithTimeout(async () => ok(7), 1_000)).toEqual({ status: "ok", value: 7 });
  });

  it("reports an Err result with its cause", async () => {
    const outcome = await executeWithTimeout(() => err("DECLINED", { cause: "insufficient funds" }), 1_000);
    expect(outcome).toEqual({
      status: "error",
      origin: "result",
      error: "DECLINED",
      cause: "insufficient funds",
    });
  });

  it("folds sync and async throws into error outcomes", async () => {
    const failure = new Error("exploded");
    expect(
      await executeWithTimeout(() => {
        throw failure;
      }, 1_000)
    ).toEqual({ status: "error", origin: "throw", error: failure });
    expect(await executeWithTimeout(async () => Promise.reject(failure), 1_000)).toEqual({
      status: "error",
      origin: "throw",
      error: failure,
    });
  });

  it("times out and aborts the action's signal", async () => {
    let seen: AbortSignal | undefined;
    const outcome = await executeWithTimeout((signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    }, 20);
    expect(outcome).toEqual({ status: "timeout", timeoutMs: 20 });
    expect(seen?.aborted).toBe(true);
  });

  it("does not call the action when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort("stop");
    const action = vi.fn(() => ok(1));
    expect(await executeWithTimeout(action, 1_000, parent.signal)).toEqual({
      status: "cancelled",
      reason: "stop",
    });
    expect(action).not.toHaveBeenCalled();
  });

  it("settles as cancelled when the parent aborts mid-flight", async () => {
    const parent = new AbortController();
    let seen: AbortSignal | undefined;
    const pending = executeWithTimeout((signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    }, 60_000, parent.signal);
    parent.abort("user");
    expect(await pending).toEqual({ status: "cancelled", reason: "user" });
    expect(seen?.aborted).toBe(true);
  });
});
