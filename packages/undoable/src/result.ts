/**
 * undoable/result
 *
 * Result primitives shared by every action the orchestrator runs.
 * Execute and rollback actions return a `Result` instead of throwing, and
 * the orchestrator reports its own outcome the same way.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown, C = unknown> = Promise<Result<T, E, C>>;

export type MaybeAsyncResult<T, E, C = unknown> = Result<T, E, C> | Promise<Result<T, E, C>>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(error: E, options?: { cause?: C }): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

/**
 * Checks whether an arbitrary value has the shape of a Result.
 */
export const isResult = (value: unknown): value is Result<unknown, unknown, unknown> =>
  typeof value === "object" &&
  value !== null &&
  "ok" in value &&
  typeof value.ok === "boolean";

// =============================================================================
// Unwrap Utilities
// =============================================================================

/**
 * Error thrown when attempting to unwrap an Err result.
 */
export class UnwrapError extends Error {
  public readonly error: unknown;
  public readonly cause?: unknown;

  constructor(result: Err<unknown, unknown>) {
    super(`Attempted to unwrap an Err: ${messageOf(result.error)}`);
    this.name = "UnwrapError";
    this.error = result.error;
    this.cause = result.cause;
  }
}

/**
 * Extracts the value from an Ok result, or throws UnwrapError if it's an Err.
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError(r);
};

/**
 * Extracts the value from an Ok result, or returns a default value if it's an Err.
 */
export const unwrapOr = <T, E, C>(r: Result<T, E, C>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

// =============================================================================
// Transformers
// =============================================================================

/**
 * Transforms the value inside an Ok result.
 */
export function map<T, U, E, C>(r: Result<T, E, C>, fn: (value: T) => U): Result<U, E, C> {
  return r.ok ? ok(fn(r.value)) : r;
}

/**
 * Transforms the error inside an Err result.
 */
export function mapError<T, E, F, C>(
  r: Result<T, E, C>,
  fn: (error: E, cause?: C) => F
): Result<T, F, C> {
  return r.ok ? r : err(fn(r.error, r.cause), { cause: r.cause });
}

/**
 * Wraps an async function that might throw into an AsyncResult.
 */
export async function tryAsync<T>(fn: () => Promise<T>): AsyncResult<T, unknown> {
  try {
    return ok(await fn());
  } catch (cause) {
    return err(cause);
  }
}

// =============================================================================
// Outcome view
// =============================================================================

/**
 * Flat view of a Result for callers that expect `isSuccess` / `errorMessage`
 * style wrappers rather than a discriminated union.
 */
export interface Outcome<T> {
  isSuccess: boolean;
  value?: T;
  errorMessage?: string;
  underlyingFault?: unknown;
}

export function toOutcome<T, E, C>(r: Result<T, E, C>): Outcome<T> {
  if (r.ok) {
    return { isSuccess: true, value: r.value };
  }
  return {
    isSuccess: false,
    errorMessage: messageOf(r.error),
    underlyingFault: r.cause ?? r.error,
  };
}

/**
 * Best-effort human readable message for an arbitrary error payload.
 */
export function messageOf(error: unknown): string {
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  if (error === undefined) return "undefined";
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
