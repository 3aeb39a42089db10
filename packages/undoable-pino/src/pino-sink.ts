import pino, { type DestinationStream, type Level, type Logger } from "pino";
import {
  describeError,
  type LogLevel,
  type OrchestratorEvent,
  type OrchestratorListener,
} from "undoable";

// =============================================================================
// Logger factory
// =============================================================================

export interface OrchestratorLoggerOptions {
  /** @default process.env.UNDOABLE_LOG_LEVEL ?? 'info' */
  level?: string;
  /** Human readable output through pino-pretty, for development */
  pretty?: boolean;
  /** Bound as `name` on every line */
  name?: string;
  /** Write here instead of stdout; ignored when `pretty` is set */
  destination?: DestinationStream;
}

export const LOG_LEVEL_ENV = "UNDOABLE_LOG_LEVEL";

/**
 * @example
 * ```typescript
 * const logger = createOrchestratorLogger({ pretty: process.env.NODE_ENV !== 'production' });
 * attachPinoLogger(orchestrator, logger);
 * ```
 */
export function createOrchestratorLogger(options: OrchestratorLoggerOptions = {}): Logger {
  const config = {
    level: options.level ?? process.env[LOG_LEVEL_ENV] ?? "info",
    name: options.name,
  };

  if (options.pretty) {
    return pino({
      ...config,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return options.destination ? pino(config, options.destination) : pino(config);
}

// =============================================================================
// Event mapping
// =============================================================================

export interface EventSource {
  subscribe(listener: OrchestratorListener): () => void;
}

export interface AttachOptions {
  /**
   * Also write free-text `log` events. Off when another sink already handles
   * them. @default true
   */
  includeLogEvents?: boolean;
}

type LogEntry = { level: Level; fields: Record<string, unknown>; message: string };

const LEVELS: Record<LogLevel, Level> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

/**
 * Level, structured fields and message for one event.
 */
export function toLogEntry(event: OrchestratorEvent): LogEntry {
  switch (event.type) {
    case "run_started":
      return {
        level: "info",
        fields: { operationCount: event.operationCount },
        message: "Run started",
      };
    case "operation_started":
      return {
        level: "debug",
        fields: { index: event.index, parallel: event.parallel },
        message: "Operation started",
      };
    case "operation_completed":
      return {
        level: "info",
        fields: { durationMs: event.durationMs, attempts: event.attempts },
        message: "Operation completed",
      };
    case "operation_failed":
      return {
        level: "error",
        fields: { durationMs: event.durationMs, attempts: event.attempts, errorType: event.error.type },
        message: describeError(event.error),
      };
    case "operation_skipped":
      return { level: "info", fields: { index: event.index }, message: "Operation skipped" };
    case "operation_retry":
      return {
        level: "warn",
        fields: {
          attempt: event.attempt,
          maxAttempts: event.maxAttempts,
          delayMs: event.delayMs,
          errorType: event.error.type,
        },
        message: `Retrying: ${describeError(event.error)}`,
      };
    case "operation_progress":
      return {
        level: "debug",
        fields: { percentage: event.percentage },
        message: event.message.length > 0 ? event.message : "Operation progress",
      };
    case "progress_changed":
      return { level: "debug", fields: { percentage: event.percentage }, message: event.message };
    case "rollback_started":
      return {
        level: "warn",
        fields: { operations: event.operationNames },
        message: "Rollback started",
      };
    case "rollback_completed":
      return {
        level: event.failures.length > 0 ? "error" : "info",
        fields: {
          durationMs: event.durationMs,
          compensated: event.compensated,
          failures: event.failures.map(describeError),
        },
        message: event.failures.length > 0 ? "Rollback incomplete" : "Rollback completed",
      };
    case "log":
      return { level: LEVELS[event.level], fields: {}, message: event.message };
    case "run_completed":
      return { level: "info", fields: { durationMs: event.durationMs }, message: "Run completed" };
    case "run_failed":
      return {
        level: "error",
        fields: {
          durationMs: event.durationMs,
          errorCount: event.errorCount,
          cancelled: event.cancelled,
        },
        message: "Run failed",
      };
  }
}

function operationOf(event: OrchestratorEvent): string | undefined {
  return "operationName" in event ? event.operationName : undefined;
}

/**
 * Write every event from `source` to `logger`. Each line carries `runId` and,
 * for operation events, `operation`. Returns an unsubscribe function.
 */
export function attachPinoLogger(
  source: EventSource,
  logger: Logger,
  options: AttachOptions = {}
): () => void {
  const includeLogEvents = options.includeLogEvents ?? true;
  const children = new Map<string, Logger>();

  const loggerFor = (runId: string): Logger => {
    let child = children.get(runId);
    if (!child) {
      child = logger.child({ runId });
      children.set(runId, child);
    }
    return child;
  };

  return source.subscribe((event) => {
    if (event.type === "log" && !includeLogEvents) return;
    const entry = toLogEntry(event);

    const operation = operationOf(event);
    const fields = operation !== undefined ? { operation, ...entry.fields } : entry.fields;
    loggerFor(event.runId)[entry.level](fields, entry.message);

    if (event.type === "run_completed" || event.type === "run_failed") {
      children.delete(event.runId);
    }
  });
}
