/**
 * Option schemas and defaults.
 *
 * Durations accept milliseconds or a shorthand string ("100ms", "5s", "2m",
 * "1h", "1d"). Schemas carry the defaults so a parsed object is complete.
 */

import { z } from "zod";
import { InvalidOptionsError, OperationDefinitionError } from "./errors";

// =============================================================================
// Durations
// =============================================================================

const DURATION_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/**
 * Parse a duration string like "100ms", "5s", "2m", "1h", "1d" into
 * milliseconds. Returns undefined for anything else.
 */
export function parseDuration(input: string): number | undefined {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) return undefined;
  const [, amount, unit] = match;
  const multiplier = DURATION_MULTIPLIERS[unit.toLowerCase()];
  return multiplier === undefined ? undefined : parseFloat(amount) * multiplier;
}

export type DurationInput = number | string;

/** Longest delay a Node.js timer honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const DurationSchema = z
  .union([z.number().finite().nonnegative(), z.string()])
  .transform((value, ctx) => {
    const ms = typeof value === "number" ? value : parseDuration(value);
    if (ms === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${value}"` });
      return z.NEVER;
    }
    if (ms > MAX_TIMER_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duration must be at most ${MAX_TIMER_DELAY_MS}ms`,
      });
      return z.NEVER;
    }
    return ms;
  });

const TimeoutSchema = DurationSchema.refine((ms) => ms > 0, {
  message: "Timeout must be greater than 0",
});

// =============================================================================
// Execution options
// =============================================================================

export const BackoffStrategySchema = z.enum(["fixed", "exponential"]);

/**
 * Backoff between retry attempts.
 * - 'fixed': `retryDelay` every time
 * - 'exponential': `retryDelay * 2^(attempt-1)`, capped at `maxRetryDelay`
 */
export type BackoffStrategy = z.infer<typeof BackoffStrategySchema>;

export const ExecutionOptionsSchema = z
  .object({
    /** Bound for each execute attempt. @default '1m' */
    executeTimeout: TimeoutSchema.default(60_000),
    /** Bound for the rollback action. @default '1m' */
    rollbackTimeout: TimeoutSchema.default(60_000),
    /** Keep running later operations when this one fails. @default false */
    continueOnFailure: z.boolean().default(false),
    /** Extra attempts after the first. @default 0 */
    maxRetries: z.number().int().nonnegative().default(0),
    /** Base delay between attempts. @default '1s' */
    retryDelay: DurationSchema.default(1_000),
    backoff: BackoffStrategySchema.default("fixed"),
    /** Upper bound for exponential backoff. @default '30s' */
    maxRetryDelay: DurationSchema.default(30_000),
    /** Dispatch without waiting for the previous parallel operations. @default false */
    allowParallel: z.boolean().default(false),
  })
  .strict();

/** Execution options as callers write them; every field is optional. */
export type ExecutionOptionsInput = z.input<typeof ExecutionOptionsSchema>;

/** Fully resolved execution options, durations in milliseconds. */
export type ExecutionOptions = z.output<typeof ExecutionOptionsSchema>;

// =============================================================================
// Orchestrator options
// =============================================================================

export const ParallelFailurePolicySchema = z.enum(["respect-operation", "abort", "continue"]);

/**
 * What happens after a parallel group that had failures is joined.
 * - 'respect-operation': stop unless every failed member has `continueOnFailure`
 * - 'abort': stop on any failure in the group
 * - 'continue': keep going regardless
 */
export type ParallelFailurePolicy = z.infer<typeof ParallelFailurePolicySchema>;

export const RollbackStrategySchema = z.enum(["parallel", "reverse"]);

/**
 * How compensations are dispatched.
 * - 'parallel': all at once
 * - 'reverse': one at a time, most recently started first
 */
export type RollbackStrategy = z.infer<typeof RollbackStrategySchema>;

export const OrchestratorSettingsSchema = z
  .object({
    name: z.string().min(1).default("orchestrator"),
    parallelFailurePolicy: ParallelFailurePolicySchema.default("respect-operation"),
    rollbackStrategy: RollbackStrategySchema.default("parallel"),
  })
  .strict();

export type OrchestratorSettings = z.output<typeof OrchestratorSettingsSchema>;

// =============================================================================
// Resolution
// =============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

function withoutUndefined(input: ExecutionOptionsInput): ExecutionOptionsInput {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Merge per-operation options over orchestrator defaults and validate.
 * Fields left undefined fall through to the defaults.
 *
 * @throws OperationDefinitionError when validation fails
 */
export function resolveExecutionOptions(
  input: ExecutionOptionsInput = {},
  defaults: ExecutionOptionsInput = {},
  operationName?: string
): ExecutionOptions {
  const parsed = ExecutionOptionsSchema.safeParse({
    ...withoutUndefined(defaults),
    ...withoutUndefined(input),
  });
  if (!parsed.success) {
    const subject = operationName !== undefined ? `operation "${operationName}"` : "operation";
    throw new OperationDefinitionError(
      `Invalid execution options for ${subject}: ${formatIssues(parsed.error).join("; ")}`,
      operationName
    );
  }
  return parsed.data;
}

/**
 * Validate orchestrator-wide execution defaults without applying schema
 * defaults, so per-operation resolution still sees which fields were set.
 *
 * @throws InvalidOptionsError when validation fails
 */
export function validateExecutionDefaults(input: ExecutionOptionsInput = {}): ExecutionOptionsInput {
  const parsed = ExecutionOptionsSchema.safeParse(withoutUndefined(input));
  if (!parsed.success) {
    throw new InvalidOptionsError("Invalid default execution options", formatIssues(parsed.error));
  }
  return withoutUndefined(input);
}

/**
 * @throws InvalidOptionsError when validation fails
 */
export function resolveOrchestratorSettings(input: z.input<typeof OrchestratorSettingsSchema>): OrchestratorSettings {
  const parsed = OrchestratorSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOptionsError("Invalid orchestrator options", formatIssues(parsed.error));
  }
  return parsed.data;
}
