/**
 * Shared error system for media-relay
 *
 * This module provides a centralized error handling system with:
 * - Error codes grouped by handling category
 * - Retryability derived from the category
 * - Error context for detailed information
 * - Alerts as (title, message) pairs for the display collaborator
 */

export { ErrorCode, ERROR_CATEGORY, isRetryableCode, type ErrorCategory } from './codes'
export type {
  FileErrorContext,
  ConnectionErrorContext,
  ProtocolErrorContext,
  TransferErrorContext,
  ValidationErrorContext,
  ErrorContext,
} from './context'
export {
  type Alert,
  type RelayErrorOptions,
  RelayError,
  isRelayError,
  systemErrorCode,
  toRelayError,
} from './relay-error'
