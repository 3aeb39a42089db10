export { defineOperation, isOperation, type OperationDefinition } from "./define";
export { OperationBuilder, operation, type RetrySettings } from "./builder";
export type {
  ExecuteAction,
  Operation,
  OperationContext,
  RegisteredOperation,
  RollbackAction,
} from "./types";
