/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type ChildLoggerOptions,
} from "./logger.js";
