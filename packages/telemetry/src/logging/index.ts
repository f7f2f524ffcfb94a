/**
 * Logging Module
 */

export {
  ConsoleTransport,
  configureLogger,
  createConsoleTransport,
  createLogger,
  createMemoryTransport,
  createSubsystemLogger,
  getLogger,
  isLogLevel,
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  Logger,
  MemoryTransport,
  resetLogger,
  type ConsoleTransportOptions,
  type ILogTransport,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
} from "./logger";
