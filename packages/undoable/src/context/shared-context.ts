import { Mutex } from "async-mutex";
import type { z, ZodError, ZodTypeAny } from "zod";
import {
  CONTEXT_KEY_NOT_FOUND,
  CONTEXT_TYPE_MISMATCH,
  type ContextLookupError,
  type ContextTypeMismatchError,
} from "../errors";
import { err, ok, type AsyncResult, type Result } from "../result";

/**
 * A key name bundled with the schema its value must satisfy.
 *
 * @example
 * ```typescript
 * const customerId = contextKey('customerId', z.string().uuid());
 * context.set(customerId, id);
 * const result = context.get(customerId); // Result<string, ContextLookupError>
 * ```
 */
export interface ContextKey<S extends ZodTypeAny> {
  readonly name: string;
  readonly schema: S;
}

export function contextKey<S extends ZodTypeAny>(name: string, schema: S): ContextKey<S> {
  return Object.freeze({ name, schema });
}

export type LookupResult<T> = { found: true; value: T } | { found: false };

type Entry = { key: string; value: unknown };

/**
 * Per-run key/value store shared by operations and branch predicates.
 *
 * Keys are case-insensitive. Reads are validated against a zod schema and a
 * mismatch is reported, never coerced. `update()` serialises async
 * read-modify-write cycles so parallel operations can accumulate into one key.
 */
export class SharedContext {
  private readonly entries = new Map<string, Entry>();
  private readonly mutex = new Mutex();

  constructor(initial?: Record<string, unknown>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) this.set(key, value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys as they were first written. */
  keys(): string[] {
    return [...this.entries.values()].map((entry) => entry.key);
  }

  has(key: string | ContextKey<ZodTypeAny>): boolean {
    return this.entries.has(normalize(nameOf(key)));
  }

  delete(key: string | ContextKey<ZodTypeAny>): boolean {
    return this.entries.delete(normalize(nameOf(key)));
  }

  /**
   * Store a value. `undefined` is ignored and leaves any existing value.
   */
  set<S extends ZodTypeAny>(key: ContextKey<S>, value: z.input<S>): this;
  set(key: string, value: unknown): this;
  set(key: string | ContextKey<ZodTypeAny>, value: unknown): this {
    if (value === undefined) return this;
    const name = nameOf(key);
    const normalized = normalize(name);
    const existing = this.entries.get(normalized);
    this.entries.set(normalized, { key: existing?.key ?? name, value });
    return this;
  }

  get<S extends ZodTypeAny>(key: ContextKey<S>): Result<z.output<S>, ContextLookupError>;
  get<S extends ZodTypeAny>(key: string, schema: S): Result<z.output<S>, ContextLookupError>;
  get(key: string): Result<unknown, ContextLookupError>;
  get(key: string | ContextKey<ZodTypeAny>, schema?: ZodTypeAny): Result<unknown, ContextLookupError> {
    return this.lookup(key, schema);
  }

  /**
   * Like `get()`, but a missing key and a type mismatch both come back as
   * `{ found: false }`.
   */
  tryGet<S extends ZodTypeAny>(key: ContextKey<S>): LookupResult<z.output<S>>;
  tryGet<S extends ZodTypeAny>(key: string, schema: S): LookupResult<z.output<S>>;
  tryGet(key: string): LookupResult<unknown>;
  tryGet(key: string | ContextKey<ZodTypeAny>, schema?: ZodTypeAny): LookupResult<unknown> {
    const result = this.lookup(key, schema);
    return result.ok ? { found: true, value: result.value } : { found: false };
  }

  /**
   * Replace a value with `updater(current)` under the context lock; `current`
   * is undefined when the key is absent. Both the stored and the new value
   * are checked against the key's schema. Concurrent calls run one at a time.
   */
  update<S extends ZodTypeAny>(
    key: ContextKey<S>,
    updater: (current: z.output<S> | undefined) => z.input<S> | Promise<z.input<S>>
  ): AsyncResult<z.output<S>, ContextTypeMismatchError> {
    return this.mutex.runExclusive(async (): AsyncResult<z.output<S>, ContextTypeMismatchError> => {
      const entry = this.entries.get(normalize(key.name));
      let current: z.output<S> | undefined;
      if (entry) {
        const parsed = key.schema.safeParse(entry.value);
        if (!parsed.success) {
          return err({ type: CONTEXT_TYPE_MISMATCH, key: key.name, issues: formatIssues(parsed.error) });
        }
        current = parsed.data;
      }
      const next: unknown = await updater(current);
      const checked = key.schema.safeParse(next);
      if (!checked.success) {
        return err({ type: CONTEXT_TYPE_MISMATCH, key: key.name, issues: formatIssues(checked.error) });
      }
      this.set(key.name, next);
      return ok(checked.data);
    });
  }

  private lookup(
    key: string | ContextKey<ZodTypeAny>,
    schema?: ZodTypeAny
  ): Result<unknown, ContextLookupError> {
    const name = nameOf(key);
    const entry = this.entries.get(normalize(name));
    if (!entry) {
      return err({ type: CONTEXT_KEY_NOT_FOUND, key: name });
    }
    const effectiveSchema = typeof key === "string" ? schema : key.schema;
    if (!effectiveSchema) return ok(entry.value);

    const parsed = effectiveSchema.safeParse(entry.value);
    if (!parsed.success) {
      return err({
        type: CONTEXT_TYPE_MISMATCH,
        key: name,
        issues: formatIssues(parsed.error),
      });
    }
    return ok(parsed.data);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function normalize(key: string): string {
  return key.toLowerCase();
}

function nameOf(key: string | ContextKey<ZodTypeAny>): string {
  return typeof key === "string" ? key : key.name;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
