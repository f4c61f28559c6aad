/**
 * Process-wide default logger for the SDK
 * Controls log output level via LOG_LEVEL environment variable
 * Supports: DEBUG, INFO, WARN, ERROR
 * Default: SILENT (no logs output)
 */

import { Logger, createLogger, parseLogLevel } from '@media-relay/shared/logger'

export const logger: Logger = createLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  enableJson: process.env.LOG_FORMAT === 'json',
})

/**
 * Component logger: the given one, or a child of the default
 */
export function componentLogger(component: string, base?: Logger): Logger {
  return (base ?? logger).child({ component })
}
