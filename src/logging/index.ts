/**
 * Logging and run tracing utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogContext,
  type LogLevel,
  type LogWriter,
  type LoggerOptions,
} from "./logger.js";
