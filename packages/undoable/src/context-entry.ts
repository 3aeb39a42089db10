/**
 * undoable/context entry point
 *
 * The per-run shared store and typed keys, without the orchestrator.
 */
export { SharedContext, contextKey, type ContextKey, type LookupResult } from "./context";
export {
  CONTEXT_KEY_NOT_FOUND,
  CONTEXT_TYPE_MISMATCH,
  isContextLookupError,
  type ContextKeyNotFoundError,
  type ContextLookupError,
  type ContextTypeMismatchError,
} from "./errors";
