/**
 * Prefixed loggers for consistent output across the deployment pipeline
 * Eliminates repeated "[Service runId]" prefix patterns
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export interface ServiceLoggerOptions {
  /** Minimum level written. Defaults to LOG_LEVEL, then "info". */
  level?: LogLevel
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error"
}

export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  return isLogLevel(value) ? value : "info"
}

/**
 * Create a logger with a service prefix and optional run/request id
 *
 * @example
 * const logger = createServiceLogger("Deploy", runId)
 * logger.info("Starting run")   // [Deploy 3f2a...] Starting run
 * logger.error("Failed:", err)  // [Deploy 3f2a...] Failed: Error...
 */
export function createServiceLogger(service: string, id?: string, options: ServiceLoggerOptions = {}): Logger {
  const prefix = id ? `[${service} ${id}]` : `[${service}]`
  const threshold = LEVEL_ORDER[options.level ?? resolveLogLevel()]
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold

  return {
    debug: (...args: unknown[]) => {
      if (enabled("debug")) console.debug(prefix, ...args)
    },
    info: (...args: unknown[]) => {
      if (enabled("info")) console.log(prefix, ...args)
    },
    warn: (...args: unknown[]) => {
      if (enabled("warn")) console.warn(prefix, ...args)
    },
    error: (...args: unknown[]) => {
      if (enabled("error")) console.error(prefix, ...args)
    },
  }
}

/** Discards everything. Handy default in tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
