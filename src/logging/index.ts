/**
 * Logging Module Index
 */

export {
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LoggerOptions,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  StderrTransport,
  MemoryTransport,
  RestoreLogger,
  createLogger,
  silentLogger,
} from "./logger.js";
