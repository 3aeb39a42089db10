export { Orchestrator, createOrchestrator } from "./orchestrator";
export {
  ORCHESTRATION_FAILED,
  isOrchestrationFailure,
  summarizeErrors,
  type BranchPredicate,
  type ExecutionRecord,
  type OrchestrationFailure,
  type OrchestratorOptions,
  type RunOptions,
  type RunReport,
  type RunState,
  type RunWithResultsOptions,
  type TerminalRunState,
} from "./types";
