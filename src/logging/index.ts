/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, isRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
