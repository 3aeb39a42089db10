export {
  createRollbackCoordinator,
  ROLLBACK_INCOMPLETE,
  type RollbackCoordinator,
  type RollbackCoordinatorOptions,
  type RollbackIncompleteError,
  type RollbackReport,
  type RollbackTarget,
} from "./coordinator";
