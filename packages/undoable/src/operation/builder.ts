import type { BackoffStrategy, DurationInput, ExecutionOptionsInput } from "../config";
import { OperationDefinitionError } from "../errors";
import { defineOperation } from "./define";
import type { ExecuteAction, Operation, RollbackAction } from "./types";

interface BuilderState {
  name?: string;
  rollback?: RollbackAction;
  options: ExecutionOptionsInput;
}

export interface RetrySettings {
  delay?: DurationInput;
  backoff?: BackoffStrategy;
  maxDelay?: DurationInput;
}

/**
 * Fluent alternative to `defineOperation()`. Every call returns a new
 * builder, so a partially configured builder can be shared as a template.
 *
 * @example
 * ```typescript
 * const charge = operation('charge-card')
 *   .execute(async (ctx, signal) => payments.charge(order, { signal }))
 *   .rollback(async ({ shared }) => payments.refund(order))
 *   .executeTimeout('10s')
 *   .retry(3, { delay: '200ms', backoff: 'exponential' })
 *   .build();
 * ```
 */
export class OperationBuilder<T = unknown, E = unknown> {
  constructor(
    private readonly state: BuilderState = { options: {} },
    private readonly action?: ExecuteAction<T, E>
  ) {}

  named(name: string): OperationBuilder<T, E> {
    return new OperationBuilder({ ...this.state, name }, this.action);
  }

  execute<U, F>(action: ExecuteAction<U, F>): OperationBuilder<U, F> {
    return new OperationBuilder(this.state, action);
  }

  rollback(action: RollbackAction): OperationBuilder<T, E> {
    return new OperationBuilder({ ...this.state, rollback: action }, this.action);
  }

  executeTimeout(timeout: DurationInput): OperationBuilder<T, E> {
    return this.withOptions({ executeTimeout: timeout });
  }

  rollbackTimeout(timeout: DurationInput): OperationBuilder<T, E> {
    return this.withOptions({ rollbackTimeout: timeout });
  }

  continueOnFailure(enabled = true): OperationBuilder<T, E> {
    return this.withOptions({ continueOnFailure: enabled });
  }

  retry(maxRetries: number, settings: RetrySettings = {}): OperationBuilder<T, E> {
    return this.withOptions({
      maxRetries,
      retryDelay: settings.delay,
      backoff: settings.backoff,
      maxRetryDelay: settings.maxDelay,
    });
  }

  parallel(enabled = true): OperationBuilder<T, E> {
    return this.withOptions({ allowParallel: enabled });
  }

  /**
   * @throws OperationDefinitionError when no execute action was given or the
   * options are invalid
   */
  build(): Operation<T, E> {
    if (!this.action) {
      const label = this.state.name !== undefined ? `"${this.state.name}"` : "(unnamed)";
      throw new OperationDefinitionError(`Operation ${label} has no execute action`, this.state.name);
    }
    return defineOperation({
      name: this.state.name,
      execute: this.action,
      rollback: this.state.rollback,
      options: this.state.options,
    });
  }

  private withOptions(options: ExecutionOptionsInput): OperationBuilder<T, E> {
    const merged: ExecutionOptionsInput = { ...this.state.options };
    for (const [key, value] of Object.entries(options)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
    return new OperationBuilder({ ...this.state, options: merged }, this.action);
  }
}

/** Start a fluent operation definition. */
export function operation(name?: string): OperationBuilder {
  return new OperationBuilder(name !== undefined ? { name, options: {} } : { options: {} });
}
