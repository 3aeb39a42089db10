/**
 * undoable-pino
 *
 * Structured logging for undoable orchestrators, backed by pino.
 */

export {
  attachPinoLogger,
  createOrchestratorLogger,
  toLogEntry,
  LOG_LEVEL_ENV,
  type AttachOptions,
  type EventSource,
  type OrchestratorLoggerOptions,
} from "./pino-sink";
export type { Logger } from "pino";
