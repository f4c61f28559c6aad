/**
 * Transport type definitions
 */

import type { Duplex } from 'node:stream'
import type { Logger } from '@media-relay/shared/logger'
import type { ConnectionState, Endpoint } from '@media-relay/shared/types'
import type { MetricsCollector } from '../monitoring/metrics'
import type { RetryOptions } from '../utils/retry'

export interface ConnectOptions {
  /** Connect timeout in milliseconds */
  timeout: number
  keepAlive: boolean
}

/**
 * Opens the byte stream a connection runs over. Resolves once the stream
 * is usable; rejects with a connectivity error otherwise.
 */
export type Connector = (endpoint: Endpoint, options: ConnectOptions) => Promise<Duplex>

export type ConnectionObserver = (state: ConnectionState) => void

export interface HttpConnectionOptions {
  connector?: Connector
  chunkSize?: number
  reconnect?: Partial<Omit<RetryOptions, 'shouldRetry' | 'onRetry'>>
  logger?: Logger
  metrics?: MetricsCollector
}

export interface UploadOptions {
  /** Called after every chunk written to the connection */
  onBytesSent?: (bytes: number) => void
  signal?: AbortSignal
}

export interface DownloadOptions {
  /** Called after every chunk written to the destination */
  onBytesReceived?: (bytes: number) => void
  signal?: AbortSignal
}

/**
 * Where a streamed response body goes
 */
export interface ByteSink {
  write(chunk: Buffer): Promise<void>
}
