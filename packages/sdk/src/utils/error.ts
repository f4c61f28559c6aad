/**
 * Error classes for the SDK, one per handling category
 */

import {
  ErrorCode,
  RelayError,
  systemErrorCode,
  toRelayError,
  type ConnectionErrorContext,
  type FileErrorContext,
  type ProtocolErrorContext,
  type TransferErrorContext,
  type ValidationErrorContext,
} from '@media-relay/shared/errors'

export class ConnectionError extends RelayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONNECTION_FAILED,
    options?: { details?: ConnectionErrorContext; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'ConnectionError'
  }
}

export class ProtocolError extends RelayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.MALFORMED_RESPONSE,
    options?: { details?: ProtocolErrorContext; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'ProtocolError'
  }
}

export class FileOperationError extends RelayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FILE_WRITE_ERROR,
    options?: { details?: FileErrorContext; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'FileOperationError'
  }
}

export class TransferCancelledError extends RelayError {
  constructor(message: string, details?: TransferErrorContext) {
    super(message, ErrorCode.TRANSFER_CANCELLED, { details })
    this.name = 'TransferCancelledError'
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, details?: ValidationErrorContext) {
    super(message, ErrorCode.INVALID_CONFIG, { details })
    this.name = 'ConfigurationError'
  }
}

/**
 * Wrap a failed filesystem call, keeping the system code in the message
 */
export function fileError(
  error: unknown,
  path: string,
  operation: FileErrorContext['operation']
): RelayError {
  if (error instanceof RelayError) {
    return error
  }
  const systemCode = systemErrorCode(error)
  const reason = error instanceof Error ? error.message : String(error)
  const code =
    systemCode === 'ENOENT'
      ? ErrorCode.FILE_NOT_FOUND
      : operation === 'move'
        ? ErrorCode.FILE_MOVE_ERROR
        : operation === 'read' || operation === 'stat'
          ? ErrorCode.FILE_READ_ERROR
          : ErrorCode.FILE_WRITE_ERROR
  return new FileOperationError(`Failed to ${operation} ${path}: ${reason}`, code, {
    details: { path, operation, reason: systemCode },
    cause: error,
  })
}

/**
 * Wrap a failed socket call as a connectivity error
 */
export function connectionError(error: unknown, details: ConnectionErrorContext): RelayError {
  if (error instanceof RelayError) {
    return error
  }
  const normalized = toRelayError(error)
  const code =
    normalized.category === 'connectivity' ? normalized.code : ErrorCode.CONNECTION_FAILED
  return new ConnectionError(normalized.message, code, {
    details: { ...details, systemCode: systemErrorCode(error), lastError: normalized.message },
    cause: error,
  })
}

export { ErrorCode, RelayError, toRelayError, isRelayError } from '@media-relay/shared/errors'
