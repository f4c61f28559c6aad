import { ErrorCode, ERROR_CATEGORY, isRetryableCode, type ErrorCategory } from './codes'
import type { ErrorContext } from './context'

/**
 * A user-facing failure: what went wrong and a description of it.
 * The core never formats beyond supplying the raw description.
 */
export interface Alert {
  title: string
  message: string
}

/**
 * Default alert titles per category
 */
const CATEGORY_TITLES: Record<ErrorCategory, string> = {
  connectivity: 'Connection Error',
  protocol: 'Unexpected Server Response',
  filesystem: 'Storage Error',
  cancellation: 'Transfer Cancelled',
  validity: 'Files Skipped',
  configuration: 'Configuration Error',
  internal: 'Unexpected Error Occurred',
}

/**
 * Error suggestions for common error codes
 */
const ERROR_SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CONNECTION_TIMEOUT]: 'Check network connectivity and server availability',
  [ErrorCode.CONNECTION_REFUSED]: 'Verify that the processing server is running and the port is correct',
  [ErrorCode.NOT_CONNECTED]: 'Wait for the connection to be re-established',
  [ErrorCode.DEVICE_UNAVAILABLE]: 'Reconnect the device and resume the download',
  [ErrorCode.DIRECTORY_UNAVAILABLE]: 'Check that the media directory exists and is writable',
  [ErrorCode.PROJECT_NOT_LOADED]: 'Open a project before uploading media',
}

export interface RelayErrorOptions {
  details?: ErrorContext
  suggestion?: string
  traceId?: string
  cause?: unknown
}

/**
 * Base error class for media-relay operations
 */
export class RelayError extends Error {
  public readonly code: ErrorCode
  public readonly category: ErrorCategory
  public readonly retryable: boolean
  public readonly details?: ErrorContext
  public readonly suggestion?: string
  public readonly traceId?: string

  constructor(message: string, code: ErrorCode, options?: RelayErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'RelayError'
    this.code = code
    this.category = ERROR_CATEGORY[code]
    this.retryable = isRetryableCode(code)
    this.details = options?.details
    this.suggestion = options?.suggestion ?? ERROR_SUGGESTIONS[code]
    this.traceId = options?.traceId

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * Convert error to the (title, message) pair handed to the alert collaborator
   */
  toAlert(title?: string): Alert {
    return {
      title: title ?? CATEGORY_TITLES[this.category],
      message: this.message,
    }
  }

  /**
   * Convert error to JSON format
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      retryable: this.retryable,
      details: this.details,
      suggestion: this.suggestion,
      traceId: this.traceId,
    }
  }
}

/**
 * Node system error codes mapped to connectivity codes
 */
const SYSTEM_ERROR_CODES: Record<string, ErrorCode> = {
  ECONNRESET: ErrorCode.CONNECTION_LOST,
  EPIPE: ErrorCode.CONNECTION_LOST,
  ERR_STREAM_DESTROYED: ErrorCode.CONNECTION_LOST,
  ERR_STREAM_WRITE_AFTER_END: ErrorCode.CONNECTION_LOST,
  ECONNREFUSED: ErrorCode.CONNECTION_REFUSED,
  ETIMEDOUT: ErrorCode.CONNECTION_TIMEOUT,
  ENOTCONN: ErrorCode.NOT_CONNECTED,
  EHOSTUNREACH: ErrorCode.CONNECTION_FAILED,
  ENETUNREACH: ErrorCode.CONNECTION_FAILED,
  ENOTFOUND: ErrorCode.CONNECTION_FAILED,
  EAI_AGAIN: ErrorCode.CONNECTION_FAILED,
  ENOENT: ErrorCode.FILE_NOT_FOUND,
  EACCES: ErrorCode.FILE_WRITE_ERROR,
  ENOSPC: ErrorCode.FILE_WRITE_ERROR,
  EISDIR: ErrorCode.FILE_READ_ERROR,
}

/**
 * Read the `code` property Node attaches to system errors
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Check if an error is a RelayError
 */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError
}

/**
 * Convert unknown error to RelayError
 */
export function toRelayError(error: unknown, traceId?: string): RelayError {
  if (isRelayError(error)) {
    return error
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new RelayError(error.message, ErrorCode.TRANSFER_CANCELLED, { traceId, cause: error })
    }

    const systemCode = systemErrorCode(error)
    const code = systemCode === undefined ? undefined : SYSTEM_ERROR_CODES[systemCode]
    return new RelayError(error.message, code ?? ErrorCode.INTERNAL_ERROR, {
      traceId,
      cause: error,
    })
  }

  return new RelayError(String(error), ErrorCode.UNKNOWN_ERROR, { traceId })
}
