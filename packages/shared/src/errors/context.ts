/**
 * Error context interfaces providing detailed information about errors
 * Each context type corresponds to a specific category of operations
 */

/**
 * File operation error context
 */
export interface FileErrorContext {
  path: string
  operation: 'open' | 'read' | 'write' | 'delete' | 'copy' | 'move' | 'stat'
  reason?: string
  size?: number
}

/**
 * Connection error context
 */
export interface ConnectionErrorContext {
  host: string
  port: number
  attempt?: number
  maxAttempts?: number
  lastError?: string
  systemCode?: string
}

/**
 * Protocol error context
 */
export interface ProtocolErrorContext {
  path?: string
  statusCode?: number
  expectedStatus?: number
  serverCode?: number
  serverMessage?: string
}

/**
 * Transfer error context
 */
export interface TransferErrorContext {
  leg: 'download' | 'upload'
  fileName: string
  offset?: number
  size?: number
}

/**
 * Validation error context
 */
export interface ValidationErrorContext {
  field: string
  value: unknown
  constraint: string
}

/**
 * Union type of all error contexts
 */
export type ErrorContext =
  | FileErrorContext
  | ConnectionErrorContext
  | ProtocolErrorContext
  | TransferErrorContext
  | ValidationErrorContext
