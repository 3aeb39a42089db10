export { SharedContext, contextKey, type ContextKey, type LookupResult } from "./shared-context";
