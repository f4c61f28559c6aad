/**
 * Persistent HTTP connection
 * One long-lived stream with hand-rolled HTTP/1.1 framing, streaming file
 * upload and download, and automatic reconnection after an unexpected drop.
 */

import { createConnection } from 'node:net'
import type { Duplex, Writable } from 'node:stream'
import type { FileHandle } from 'node:fs/promises'
import { ErrorCode, type ConnectionErrorContext } from '@media-relay/shared/errors'
import type { Logger } from '@media-relay/shared/logger'
import { ConnectionState, type Endpoint, type HttpRequest } from '@media-relay/shared/types'
import { DEFAULT_CONFIG } from '../core/constants'
import type { MetricsCollector } from '../monitoring/metrics'
import {
  ConnectionError,
  RelayError,
  TransferCancelledError,
  connectionError,
  fileError,
} from '../utils/error'
import { componentLogger } from '../utils/logger'
import { withRetry, type RetryOptions } from '../utils/retry'
import { ChunkReader } from './chunk-reader'
import { parseContentLength } from './parser'
import { HEADER_TERMINATOR, encodeRequest, encodeRequestHead } from './request'
import type {
  ByteSink,
  ConnectOptions,
  ConnectionObserver,
  Connector,
  DownloadOptions,
  HttpConnectionOptions,
  UploadOptions,
} from './types'

/**
 * Plain TCP connector
 */
export const tcpConnector: Connector = (endpoint, options) =>
  new Promise((resolve, reject) => {
    const socket = createConnection({ host: endpoint.host, port: endpoint.port })
    const details = { host: endpoint.host, port: endpoint.port }

    const timer = setTimeout(() => {
      socket.destroy()
      reject(
        new ConnectionError(
          `Connection to ${endpoint.host}:${endpoint.port} timed out after ${options.timeout}ms`,
          ErrorCode.CONNECTION_TIMEOUT,
          { details }
        )
      )
    }, options.timeout)

    const onError = (error: Error) => {
      clearTimeout(timer)
      reject(connectionError(error, details))
    }

    socket.once('error', onError)
    socket.once('connect', () => {
      clearTimeout(timer)
      socket.off('error', onError)
      socket.setKeepAlive(options.keepAlive)
      socket.setNoDelay(true)
      resolve(socket)
    })
  })

function writeTo(stream: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, error => (error ? reject(error) : resolve()))
  })
}

type TransferKind = 'upload' | 'download'

export class HttpConnection {
  private readonly connector: Connector
  private readonly chunkSize: number
  private readonly reconnectOptions: Omit<RetryOptions, 'shouldRetry' | 'onRetry'>
  private readonly logger: Logger
  private readonly metrics?: MetricsCollector
  private readonly observers = new Set<ConnectionObserver>()
  private readonly transfers: Partial<Record<TransferKind, AbortController>> = {}

  private currentState = ConnectionState.Started
  private lastNotified: ConnectionState = ConnectionState.Started
  private endpoint?: Endpoint
  private connectOptions: ConnectOptions = {
    timeout: DEFAULT_CONFIG.TRANSPORT.CONNECT_TIMEOUT,
    keepAlive: DEFAULT_CONFIG.TRANSPORT.KEEP_ALIVE,
  }
  private socket?: Duplex
  private reader?: ChunkReader
  private closeIntent?: 'close' | 'restart'
  private stopped = false
  private reconnecting?: Promise<void>
  private lane: Promise<unknown> = Promise.resolve()

  constructor(options: HttpConnectionOptions = {}) {
    const reconnect = DEFAULT_CONFIG.TRANSPORT.RECONNECT
    this.connector = options.connector ?? tcpConnector
    this.chunkSize = options.chunkSize ?? DEFAULT_CONFIG.TRANSPORT.CHUNK_SIZE
    this.reconnectOptions = {
      maxRetries: options.reconnect?.maxRetries ?? reconnect.MAX_RETRIES,
      initialDelay: options.reconnect?.initialDelay ?? reconnect.INITIAL_DELAY,
      maxDelay: options.reconnect?.maxDelay ?? reconnect.MAX_DELAY,
      factor: options.reconnect?.factor ?? reconnect.FACTOR,
    }
    this.logger = componentLogger('transport', options.logger)
    this.metrics = options.metrics
  }

  get state(): ConnectionState {
    return this.currentState
  }

  get remote(): Endpoint | undefined {
    return this.endpoint
  }

  /**
   * Establish the connection; resolves once it is usable
   */
  async open(endpoint: Endpoint, options: Partial<ConnectOptions> = {}): Promise<void> {
    if (this.socket) {
      throw new ConnectionError('Connection is already open', ErrorCode.CONNECTION_FAILED, {
        details: this.describe(),
      })
    }
    this.endpoint = endpoint
    this.connectOptions = { ...this.connectOptions, ...options }
    this.stopped = false
    this.setState(ConnectionState.Started)

    try {
      await this.connect()
    } catch (error) {
      this.setState(ConnectionState.Disconnected)
      throw connectionError(error, this.describe())
    }
  }

  /**
   * Close the connection. With `tryRestart` a fresh connection is opened
   * with the same parameters and observers see `lost` in the gap.
   */
  terminate(tryRestart = false): void {
    if (!tryRestart) {
      this.stopped = true
    }
    if (this.socket) {
      this.closeIntent = tryRestart ? 'restart' : 'close'
      this.socket.destroy()
      return
    }
    if (!tryRestart) {
      this.setState(ConnectionState.Disconnected)
    } else if (this.endpoint && !this.stopped) {
      this.setState(ConnectionState.Lost)
      this.reconnect()
    }
  }

  /**
   * Register for distinct state transitions; the observer immediately
   * receives the current state. Returns the unsubscribe function.
   */
  addObserver(observer: ConnectionObserver): () => void {
    this.observers.add(observer)
    observer(this.currentState)
    return () => this.removeObserver(observer)
  }

  removeObserver(observer: ConnectionObserver): void {
    this.observers.delete(observer)
  }

  /**
   * Send a request and return the raw response bytes
   */
  send(request: HttpRequest): Promise<Buffer> {
    return this.exclusive(async () => {
      const { socket, reader } = this.requireConnected()
      reader.discard()
      try {
        await writeTo(socket, encodeRequest(request))
        return await this.receive(reader)
      } catch (error) {
        throw this.failExchange(socket, error)
      }
    })
  }

  /**
   * Send a request whose body is streamed from a file in fixed-size chunks.
   * The cancel flag is checked before every chunk.
   */
  sendFile(request: HttpRequest, file: FileHandle, options: UploadOptions = {}): Promise<Buffer> {
    return this.exclusive(async () => {
      const { socket, reader } = this.requireConnected()
      const controller = this.beginTransfer('upload', options.signal)
      reader.discard()
      try {
        const size = await fileSize(file)
        const head = encodeRequestHead(request.method, request.path, {
          ...request.headers,
          'Content-Length': String(size),
        })
        await writeTo(socket, head)

        let position = 0
        while (position < size) {
          if (controller.signal.aborted) {
            throw new TransferCancelledError('Upload was cancelled.')
          }
          const chunk = Buffer.alloc(Math.min(this.chunkSize, size - position))
          const bytesRead = await readChunk(file, chunk, position)
          await writeTo(socket, chunk.subarray(0, bytesRead))
          position += bytesRead
          options.onBytesSent?.(bytesRead)
        }

        return await this.receive(reader)
      } catch (error) {
        throw this.failExchange(socket, error)
      } finally {
        this.endTransfer('upload', controller)
      }
    })
  }

  cancelSendFile(): void {
    this.transfers.upload?.abort()
  }

  /**
   * Send a request and stream the response body into `destination`.
   * Body bytes that arrive with the headers are flushed first.
   * Returns the status line and headers.
   */
  downloadToFile(
    request: HttpRequest,
    destination: FileHandle,
    options: DownloadOptions = {}
  ): Promise<Buffer> {
    return this.exclusive(async () => {
      const { socket, reader } = this.requireConnected()
      const controller = this.beginTransfer('download', options.signal)
      const sink: ByteSink = {
        write: async chunk => {
          try {
            await destination.write(chunk)
          } catch (error) {
            throw fileError(error, 'download destination', 'write')
          }
          options.onBytesReceived?.(chunk.length)
        },
      }
      reader.discard()
      try {
        await writeTo(socket, encodeRequest(request))
        return await this.receive(reader, controller.signal, sink)
      } catch (error) {
        throw this.failExchange(
          socket,
          controller.signal.aborted ? new TransferCancelledError('Download was cancelled.') : error
        )
      } finally {
        this.endTransfer('download', controller)
      }
    })
  }

  cancelDownloadFile(): void {
    this.transfers.download?.abort()
  }

  /**
   * Read one response: accumulate until the header terminator, then read
   * Content-Length body bytes, or until the peer finishes when it is absent
   */
  private async receive(reader: ChunkReader, signal?: AbortSignal, sink?: ByteSink): Promise<Buffer> {
    let buffered: Buffer = Buffer.alloc(0)
    let headerEnd = -1
    while (headerEnd < 0) {
      const chunk = await reader.read(signal)
      if (!chunk) {
        throw new ConnectionError(
          'Connection closed before the response headers arrived',
          ErrorCode.CONNECTION_LOST,
          { details: this.describe() }
        )
      }
      buffered = buffered.length === 0 ? chunk : Buffer.concat([buffered, chunk])
      headerEnd = buffered.indexOf(HEADER_TERMINATOR)
    }

    const bodyStart = headerEnd + HEADER_TERMINATOR.length
    const head = buffered.subarray(0, bodyStart)
    const contentLength = parseContentLength(buffered.subarray(0, headerEnd))
    const parts: Buffer[] = [head]
    let remaining = contentLength ?? Number.POSITIVE_INFINITY

    const take = async (chunk: Buffer) => {
      const body = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk
      remaining -= body.length
      if (sink) {
        await sink.write(body)
      } else {
        parts.push(body)
      }
    }

    const initial = buffered.subarray(bodyStart)
    if (initial.length > 0) {
      await take(initial)
    }

    while (remaining > 0) {
      if (signal?.aborted) {
        throw new TransferCancelledError('Transfer was cancelled.')
      }
      const chunk = await reader.read(signal)
      if (!chunk) {
        if (contentLength !== undefined) {
          throw new ConnectionError(
            `Connection closed with ${remaining} body bytes outstanding`,
            ErrorCode.CONNECTION_LOST,
            { details: this.describe() }
          )
        }
        break
      }
      await take(chunk)
    }

    return sink ? head : Buffer.concat(parts)
  }

  /**
   * Any failure mid-exchange leaves the stream unframed: restart it
   */
  private failExchange(socket: Duplex, error: unknown): RelayError {
    const failure = error instanceof RelayError ? error : connectionError(error, this.describe())
    if (this.socket === socket) {
      this.logger.warn('Exchange failed, restarting connection', {
        code: failure.code,
        error: failure.message,
      })
      this.terminate(true)
    }
    return failure
  }

  private async connect(): Promise<void> {
    const endpoint = this.endpoint
    if (!endpoint) {
      throw new ConnectionError('No endpoint to connect to', ErrorCode.NOT_CONNECTED)
    }
    const socket = await this.connector(endpoint, this.connectOptions)
    if (this.stopped) {
      socket.destroy()
      throw new ConnectionError('Connection was terminated', ErrorCode.NOT_CONNECTED, {
        details: this.describe(),
      })
    }

    this.socket = socket
    this.reader = new ChunkReader(socket)
    socket.once('close', () => this.handleClose(socket))
    this.metrics?.recordConnection()
    this.setState(ConnectionState.Connected)
  }

  private handleClose(socket: Duplex): void {
    if (socket !== this.socket) {
      return
    }
    this.socket = undefined
    this.reader = undefined
    const intent = this.closeIntent
    this.closeIntent = undefined
    this.metrics?.recordConnectionClosed(intent === undefined)

    if (intent === 'close' || this.stopped) {
      this.setState(ConnectionState.Disconnected)
      return
    }
    if (intent === undefined) {
      this.logger.warn('Connection lost', { ...this.describe() })
    }
    this.setState(ConnectionState.Lost)
    this.reconnect()
  }

  private reconnect(): void {
    if (this.reconnecting) {
      return
    }
    this.reconnecting = withRetry(() => this.connect(), {
      ...this.reconnectOptions,
      shouldRetry: () => !this.stopped,
      onRetry: (error, attempt, delay) => {
        this.logger.warn('Reconnect attempt failed', {
          attempt,
          delay,
          error: error instanceof Error ? error.message : String(error),
        })
      },
    })
      .then(
        () => {
          this.logger.info('Reconnected', { ...this.describe() })
        },
        error => {
          if (!this.stopped) {
            this.logger.error('Giving up reconnecting', error, { ...this.describe() })
          }
          this.setState(ConnectionState.Disconnected)
        }
      )
      .finally(() => {
        this.reconnecting = undefined
        // Dropped again before this attempt settled
        if (!this.socket && !this.stopped && this.currentState === ConnectionState.Lost) {
          this.reconnect()
        }
      })
  }

  private requireConnected(): { socket: Duplex; reader: ChunkReader } {
    if (this.currentState !== ConnectionState.Connected || !this.socket || !this.reader) {
      throw new ConnectionError('Socket is not connected (ENOTCONN)', ErrorCode.NOT_CONNECTED, {
        details: this.describe(),
      })
    }
    return { socket: this.socket, reader: this.reader }
  }

  private setState(state: ConnectionState): void {
    this.currentState = state
    if (state === this.lastNotified) {
      return
    }
    this.lastNotified = state
    this.logger.debug('Connection state changed', { state, ...this.describe() })
    for (const observer of [...this.observers]) {
      observer(state)
    }
  }

  private beginTransfer(kind: TransferKind, external?: AbortSignal): AbortController {
    const controller = new AbortController()
    if (external?.aborted) {
      controller.abort()
    } else {
      external?.addEventListener('abort', () => controller.abort(), { once: true })
    }
    this.transfers[kind] = controller
    return controller
  }

  private endTransfer(kind: TransferKind, controller: AbortController): void {
    if (this.transfers[kind] === controller) {
      this.transfers[kind] = undefined
    }
  }

  /**
   * Run exchanges one after another on the single stream
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lane.then(task)
    this.lane = run.catch(() => undefined)
    return run
  }

  private describe(): ConnectionErrorContext {
    return { host: this.endpoint?.host ?? 'unknown', port: this.endpoint?.port ?? 0 }
  }
}

async function fileSize(file: FileHandle): Promise<number> {
  try {
    const stats = await file.stat()
    return stats.size
  } catch (error) {
    throw fileError(error, 'upload source', 'stat')
  }
}

async function readChunk(file: FileHandle, chunk: Buffer, position: number): Promise<number> {
  try {
    const { bytesRead } = await file.read(chunk, 0, chunk.length, position)
    if (bytesRead > 0) {
      return bytesRead
    }
  } catch (error) {
    throw fileError(error, 'upload source', 'read')
  }
  throw fileError(new Error('file ended before its reported size'), 'upload source', 'read')
}
