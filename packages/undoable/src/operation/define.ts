import { resolveExecutionOptions, type ExecutionOptionsInput } from "../config";
import { OperationDefinitionError } from "../errors";
import type { ExecuteAction, Operation, RollbackAction } from "./types";

export interface OperationDefinition<T, E> {
  name?: string;
  execute: ExecuteAction<T, E>;
  rollback?: RollbackAction;
  options?: ExecutionOptionsInput;
}

/**
 * Validate and freeze an operation definition.
 *
 * @example
 * ```typescript
 * const reserve = defineOperation({
 *   name: 'reserve-stock',
 *   execute: async ({ shared }) => {
 *     const id = await inventory.reserve(sku);
 *     shared.set('reservationId', id);
 *     return ok(id);
 *   },
 *   rollback: async ({ shared }) => {
 *     const id = shared.get('reservationId', z.string());
 *     if (id.ok) await inventory.release(id.value);
 *     return ok(undefined);
 *   },
 *   options: { executeTimeout: '5s', maxRetries: 2, backoff: 'exponential' },
 * });
 * ```
 *
 * @throws OperationDefinitionError when the name is blank, the execute
 * action is missing or the options are invalid
 */
export function defineOperation<T, E>(definition: OperationDefinition<T, E>): Operation<T, E> {
  const { name, execute, rollback, options = {} } = definition;
  const label = name !== undefined ? `"${name}"` : "(unnamed)";

  if (name !== undefined && name.trim().length === 0) {
    throw new OperationDefinitionError("Operation name must not be blank", name);
  }
  if (typeof execute !== "function") {
    throw new OperationDefinitionError(`Operation ${label} has no execute action`, name);
  }
  if (rollback !== undefined && typeof rollback !== "function") {
    throw new OperationDefinitionError(`Rollback of operation ${label} must be a function`, name);
  }
  resolveExecutionOptions(options, {}, name);

  return Object.freeze({
    name,
    execute,
    rollback,
    options: Object.freeze({ ...options }),
  });
}

export function isOperation(value: unknown): value is Operation {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function" &&
    "options" in value
  );
}
