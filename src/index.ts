/**
 * rowflow: lazy, row-oriented extract/transform/load pipelines.
 */

export * from "./types/index.js";
export * from "./pipeline/index.js";
export * from "./transforms/index.js";
export { ValidationError, type ValidationIssue } from "./config/validation.js";
export {
  createLogger,
  generateRunId,
  initRunId,
  getRunId,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
