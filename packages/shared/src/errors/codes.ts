/**
 * Error codes for media-relay operations
 * Organized by the category that decides how a failure is handled
 */
export enum ErrorCode {
  // ============================================
  // Connectivity (retryable, triggers reconnection)
  // ============================================
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  CONNECTION_LOST = 'CONNECTION_LOST',
  NOT_CONNECTED = 'NOT_CONNECTED',
  DEVICE_UNAVAILABLE = 'DEVICE_UNAVAILABLE',

  // ============================================
  // Protocol (operation abandoned)
  // ============================================
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  UNEXPECTED_STATUS = 'UNEXPECTED_STATUS',
  INVALID_RESPONSE_BODY = 'INVALID_RESPONSE_BODY',

  // ============================================
  // Filesystem (dropped or force-paused per file)
  // ============================================
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_READ_ERROR = 'FILE_READ_ERROR',
  FILE_WRITE_ERROR = 'FILE_WRITE_ERROR',
  FILE_MOVE_ERROR = 'FILE_MOVE_ERROR',
  DIRECTORY_UNAVAILABLE = 'DIRECTORY_UNAVAILABLE',

  // ============================================
  // Cancellation (not reported to the user)
  // ============================================
  TRANSFER_CANCELLED = 'TRANSFER_CANCELLED',

  // ============================================
  // Capacity & Validity (silently excluded)
  // ============================================
  FILE_INVALID = 'FILE_INVALID',
  FILE_ALREADY_PRESENT = 'FILE_ALREADY_PRESENT',

  // ============================================
  // Configuration
  // ============================================
  INVALID_CONFIG = 'INVALID_CONFIG',
  PROJECT_NOT_LOADED = 'PROJECT_NOT_LOADED',

  // ============================================
  // General Errors
  // ============================================
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorCategory =
  | 'connectivity'
  | 'protocol'
  | 'filesystem'
  | 'cancellation'
  | 'validity'
  | 'configuration'
  | 'internal'

/**
 * Map error codes to their handling category
 */
export const ERROR_CATEGORY: Record<ErrorCode, ErrorCategory> = {
  // Connectivity
  [ErrorCode.CONNECTION_FAILED]: 'connectivity',
  [ErrorCode.CONNECTION_TIMEOUT]: 'connectivity',
  [ErrorCode.CONNECTION_REFUSED]: 'connectivity',
  [ErrorCode.CONNECTION_LOST]: 'connectivity',
  [ErrorCode.NOT_CONNECTED]: 'connectivity',
  [ErrorCode.DEVICE_UNAVAILABLE]: 'connectivity',

  // Protocol
  [ErrorCode.MALFORMED_RESPONSE]: 'protocol',
  [ErrorCode.UNEXPECTED_STATUS]: 'protocol',
  [ErrorCode.INVALID_RESPONSE_BODY]: 'protocol',

  // Filesystem
  [ErrorCode.FILE_NOT_FOUND]: 'filesystem',
  [ErrorCode.FILE_READ_ERROR]: 'filesystem',
  [ErrorCode.FILE_WRITE_ERROR]: 'filesystem',
  [ErrorCode.FILE_MOVE_ERROR]: 'filesystem',
  [ErrorCode.DIRECTORY_UNAVAILABLE]: 'filesystem',

  // Cancellation
  [ErrorCode.TRANSFER_CANCELLED]: 'cancellation',

  // Capacity & Validity
  [ErrorCode.FILE_INVALID]: 'validity',
  [ErrorCode.FILE_ALREADY_PRESENT]: 'validity',

  // Configuration
  [ErrorCode.INVALID_CONFIG]: 'configuration',
  [ErrorCode.PROJECT_NOT_LOADED]: 'configuration',

  // General Errors
  [ErrorCode.INTERNAL_ERROR]: 'internal',
  [ErrorCode.UNKNOWN_ERROR]: 'internal',
}

/**
 * Only connectivity failures are worth another attempt
 */
export function isRetryableCode(code: ErrorCode): boolean {
  return ERROR_CATEGORY[code] === 'connectivity'
}
