/**
 * Logging Module
 *
 * Structured logging shared by every Burrow package.
 */

export {
  type ConsoleTransportOptions,
  ConsoleTransport,
  configureLogger,
  createConsoleTransport,
  createLogger,
  createMemoryTransport,
  getLogger,
  type ILogTransport,
  isLogLevel,
  type LogContext,
  type LogData,
  type LogEntry,
  Logger,
  type LoggerConfig,
  type LogLevel,
  MemoryTransport,
  resetLogger,
} from "./logger";
export { createSubsystemLogger } from "./subsystem";
