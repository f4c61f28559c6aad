/**
 * Retry strategy utilities
 * Exponential backoff used by the transport to re-establish a lost connection
 */

import { isRelayError, systemErrorCode } from '@media-relay/shared/errors'

export interface RetryOptions {
  /** Maximum number of retries */
  maxRetries: number
  /** Initial delay time in milliseconds */
  initialDelay: number
  /** Maximum delay time in milliseconds */
  maxDelay: number
  /** Delay growth factor (exponential backoff) */
  factor: number
  /** Custom retry condition function */
  shouldRetry?: (error: unknown) => boolean
  /** Callback before retry */
  onRetry?: (error: unknown, attempt: number, delay: number) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 5,
  initialDelay: 500,
  maxDelay: 10000,
  factor: 2,
}

/**
 * Calculate retry delay time
 */
export function calculateDelay(attempt: number, opts: RetryOptions): number {
  return Math.min(opts.initialDelay * opts.factor ** attempt, opts.maxDelay)
}

/**
 * Execute async operation with retry
 *
 * @example
 * ```ts
 * await withRetry(() => connection.reconnect(), { maxRetries: 5, initialDelay: 500 })
 * ```
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options }

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation()
    } catch (error) {
      // Last attempt, throw error directly
      if (attempt >= opts.maxRetries) {
        throw error
      }

      const shouldRetry = opts.shouldRetry ? opts.shouldRetry(error) : isRetryable(error)
      if (!shouldRetry) {
        throw error
      }

      const delay = calculateDelay(attempt, opts)
      opts.onRetry?.(error, attempt + 1, delay)
      await sleep(delay)
    }
  }
}

const RETRYABLE_SYSTEM_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'EPIPE',
])

/**
 * Determine if error is retryable
 */
export function isRetryable(error: unknown): boolean {
  if (isRelayError(error)) {
    return error.retryable
  }
  const code = systemErrorCode(error)
  return code !== undefined && RETRYABLE_SYSTEM_CODES.has(code)
}

/**
 * Sleep/delay function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
