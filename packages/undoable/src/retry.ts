/**
 * Retry and timeout utilities used by the run loop and the rollback
 * coordinator. Nothing here throws: every way an attempt can end is folded
 * into an `AttemptOutcome`.
 */

import type { BackoffStrategy } from "./config";
import type { MaybeAsyncResult } from "./result";

// =============================================================================
// Attempt outcome
// =============================================================================

export type AttemptOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "error"; origin: "result" | "throw"; error: unknown; cause?: unknown }
  | { status: "timeout"; timeoutMs: number }
  | { status: "cancelled"; reason: unknown };

// =============================================================================
// Signals
// =============================================================================

/**
 * A signal that aborts when any of the given signals aborts, carrying the
 * first reason. `dispose` detaches the listeners.
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    detachers.push(() => source.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const detach of detachers) detach();
    },
  };
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * Delay before the attempt following `attempt` (1-based).
 *
 * @example
 * ```typescript
 * calculateRetryDelay(3, { backoff: 'exponential', retryDelay: 100, maxRetryDelay: 30_000 }); // 400
 * ```
 */
export function calculateRetryDelay(
  attempt: number,
  options: { backoff: BackoffStrategy; retryDelay: number; maxRetryDelay: number }
): number {
  const { backoff, retryDelay, maxRetryDelay } = options;

  const delay =
    backoff === "exponential" ? retryDelay * Math.pow(2, attempt - 1) : retryDelay;

  return Math.floor(Math.min(delay, Math.max(maxRetryDelay, retryDelay)));
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Callers check
 * `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Run one attempt of `action` bounded by `timeoutMs`.
 *
 * The action receives a signal that aborts on the first of: `parentSignal`
 * aborting, or the timeout elapsing. The attempt settles at that moment even
 * if the action ignores its signal; a late rejection is absorbed.
 */
export async function executeWithTimeout<T>(
  action: (signal: AbortSignal) => MaybeAsyncResult<T, unknown>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<AttemptOutcome<T>> {
  if (parentSignal?.aborted) {
    return { status: "cancelled", reason: parentSignal.reason };
  }

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const timeoutPromise = new Promise<AttemptOutcome<T>>((resolve) => {
    timeoutId = setTimeout(() => {
      resolve({ status: "timeout", timeoutMs });
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  const cancelPromise = new Promise<AttemptOutcome<T>>((resolve) => {
    if (!parentSignal) return;
    const signal = parentSignal;
    onParentAbort = () => {
      resolve({ status: "cancelled", reason: signal.reason });
      controller.abort(signal.reason);
    };
    signal.addEventListener("abort", onParentAbort, { once: true });
  });

  const actionPromise = Promise.resolve()
    .then(() => action(controller.signal))
    .then(
      (result): AttemptOutcome<T> =>
        result.ok
          ? { status: "ok", value: result.value }
          : { status: "error", origin: "result", error: result.error, cause: result.cause },
      (thrown: unknown): AttemptOutcome<T> => ({ status: "error", origin: "throw", error: thrown })
    );

  try {
    return await Promise.race([actionPromise, timeoutPromise, cancelPromise]);
  } finally {
    clearTimeout(timeoutId);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}
