export {
  createServiceLogger,
  type Logger,
  type LogLevel,
  resolveLogLevel,
  type ServiceLoggerOptions,
  silentLogger,
} from "./service-logger.js"
export {
  createErrorLogger,
  type ErrorLogContext,
  type ErrorLogEntry,
  type ErrorLogger,
  type ErrorLogLevel,
  type ErrorLogSink,
  errorLogger,
} from "./error-logger.js"
