/**
 * Shared logger system for media-relay
 *
 * This module provides a structured logging system with:
 * - Multiple log levels (debug, info, warn, error, silent)
 * - TraceID support for correlating one transfer session
 * - JSON and human-readable output formats
 * - Child loggers carrying component bindings
 */

export {
  LogLevel,
  Logger,
  createLogger,
  parseLogLevel,
  type LogEntry,
  type LoggerConfig,
} from './logger'
export {
  generateTraceId,
  createTraceContext,
  createChildSpan,
  type TraceContext,
} from './trace'
