/**
 * Structured logger with TraceID support
 */

import type { TraceContext } from './trace'

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.SILENT]: Number.POSITIVE_INFINITY, // suppresses all logs
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  traceId?: string
  spanId?: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  enableConsole: boolean
  enableJson: boolean
  /** Receives every entry that passes the level filter */
  sink?: (entry: LogEntry) => void
}

/**
 * Parse a level name such as the LOG_LEVEL environment variable.
 * Anything unrecognised (including undefined) means silent.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG
    case 'info':
      return LogLevel.INFO
    case 'warn':
    case 'warning':
      return LogLevel.WARN
    case 'error':
      return LogLevel.ERROR
    default:
      return LogLevel.SILENT
  }
}

/**
 * Logger class with TraceID support
 */
export class Logger {
  private config: LoggerConfig
  private traceContext?: TraceContext
  private readonly bindings: Record<string, unknown>

  constructor(config: Partial<LoggerConfig> = {}, bindings: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      enableConsole: config.enableConsole ?? true,
      enableJson: config.enableJson ?? false,
      sink: config.sink,
    }
    this.bindings = bindings
  }

  get level(): LogLevel {
    return this.config.level
  }

  setLevel(level: LogLevel): void {
    this.config.level = level
  }

  /**
   * Set trace context for all subsequent logs
   */
  setTraceContext(context: TraceContext): void {
    this.traceContext = context
  }

  /**
   * Clear trace context
   */
  clearTraceContext(): void {
    this.traceContext = undefined
  }

  /**
   * Create a child logger sharing this logger's configuration.
   * Bindings are attached to the context of every entry it writes.
   */
  child(bindings: Record<string, unknown>, trace?: Partial<TraceContext>): Logger {
    const childLogger = new Logger(this.config, { ...this.bindings, ...bindings })
    childLogger.config = this.config
    if (this.traceContext) {
      childLogger.setTraceContext({
        ...this.traceContext,
        ...trace,
      })
    }
    return childLogger
  }

  /**
   * Debug level log
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  /**
   * Info level log
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context)
  }

  /**
   * Warning level log
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context)
  }

  /**
   * Error level log
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error)
  }

  /**
   * Internal log method
   */
  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    // Check if log level is enabled
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return
    }

    const merged = { ...this.bindings, ...context }
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      traceId: this.traceContext?.traceId,
      spanId: this.traceContext?.spanId,
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error: describeError(error),
    }

    this.config.sink?.(entry)

    if (this.config.enableConsole) {
      this.writeToConsole(entry)
    }
  }

  /**
   * Write log entry to console
   */
  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableJson) {
      console.log(JSON.stringify(entry))
      return
    }

    const { level, message, timestamp, traceId, context, error } = entry
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''
    const traceStr = traceId ? ` [trace:${traceId}]` : ''
    const errorStr = error ? ` (${error.name}: ${error.message})` : ''

    const coloredMessage = this.colorizeLog(
      level,
      `[${timestamp}] ${level.toUpperCase()}:${traceStr} ${message}${contextStr}${errorStr}`
    )

    console.log(coloredMessage)
  }

  /**
   * Add color to log messages (for terminal output)
   */
  private colorizeLog(level: LogLevel, message: string): string {
    const colors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m', // Green
      [LogLevel.WARN]: '\x1b[33m', // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.SILENT]: '',
    }
    const reset = '\x1b[0m'
    return `${colors[level]}${message}${reset}`
  }
}

function describeError(error: unknown): LogEntry['error'] {
  if (error === undefined) {
    return undefined
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return { name: error.name, message: error.message, code, stack: error.stack }
  }
  return { name: 'NonError', message: String(error) }
}

/**
 * Create a default logger instance
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config)
}
