/**
 * Processing-server client
 * Owns the persistent connection, the command queue gated on it, the
 * credentials sent with every request and the loaded project's state.
 */

import { ErrorCode } from '@media-relay/shared/errors'
import type { Logger } from '@media-relay/shared/logger'
import { ConnectionState, type HttpMethod, type HttpRequest } from '@media-relay/shared/types'
import { DEFAULT_CONFIG, HTTP_STATUS, NODE_ENDPOINTS } from '../core/constants'
import { HttpConnection } from '../http/connection'
import { parseHttpResponse } from '../http/parser'
import { bodyLength } from '../http/request'
import type { Connector, HttpConnectionOptions } from '../http/types'
import type { MetricsCollector } from '../monitoring/metrics'
import { CommandQueueExecutor, type AlertReporter } from '../queue/executor'
import { ProtocolError } from '../utils/error'
import { componentLogger } from '../utils/logger'
import { GetNodeStatus, ListProjectFiles, type NodeStatus } from './commands'

export interface NodeClientOptions {
  port?: number
  connectTimeout?: number
  probeTimeout?: number
  keepAlive?: boolean
  chunkSize?: number
  reconnect?: HttpConnectionOptions['reconnect']
  connector?: Connector
  retries?: number
  retryDelay?: number
  statusInterval?: number
  reporter?: AlertReporter
  metrics?: MetricsCollector
  logger?: Logger
}

export interface ProjectState {
  name: string
  /** Names already present in the project's data folder */
  fileList: Set<string>
}

export class NodeClient {
  readonly connection: HttpConnection
  readonly queue: CommandQueueExecutor
  readonly logger: Logger
  private readonly port: number
  private readonly connectTimeout: number
  private readonly probeTimeout: number
  private readonly keepAlive: boolean
  private readonly statusInterval: number
  private readonly connector?: Connector
  private token?: string
  private session?: string
  private loadedProject?: ProjectState
  private latestStatus?: NodeStatus
  private statusTimer?: NodeJS.Timeout

  constructor(options: NodeClientOptions = {}) {
    const transport = DEFAULT_CONFIG.TRANSPORT
    this.port = options.port ?? transport.PORT
    this.connectTimeout = options.connectTimeout ?? transport.CONNECT_TIMEOUT
    this.probeTimeout = options.probeTimeout ?? transport.PROBE_TIMEOUT
    this.keepAlive = options.keepAlive ?? transport.KEEP_ALIVE
    this.statusInterval = options.statusInterval ?? DEFAULT_CONFIG.NODE.STATUS_INTERVAL
    this.connector = options.connector
    this.logger = componentLogger('node', options.logger)

    this.connection = new HttpConnection({
      connector: options.connector,
      chunkSize: options.chunkSize,
      reconnect: options.reconnect,
      logger: this.logger,
      metrics: options.metrics,
    })
    this.queue = new CommandQueueExecutor({
      name: 'node-queue',
      retries: options.retries,
      retryDelay: options.retryDelay,
      reporter: options.reporter,
      metrics: options.metrics,
      logger: this.logger,
    })
    this.connection.addObserver(state => this.handleState(state))
  }

  get project(): ProjectState | undefined {
    return this.loadedProject
  }

  get sessionId(): string | undefined {
    return this.session
  }

  get status(): NodeStatus | undefined {
    return this.latestStatus
  }

  get connected(): boolean {
    return this.connection.state === ConnectionState.Connected
  }

  openSession(sessionId: string): void {
    this.session = sessionId
  }

  closeSession(): void {
    this.session = undefined
  }

  /**
   * Make `name` the target of uploads and fetch its file list
   */
  loadProject(name: string, fileList: string[] = []): void {
    this.loadedProject = { name, fileList: new Set(fileList) }
    this.logger.info('Project loaded', { project: name })
    this.queue.pushOnce(new ListProjectFiles(this))
  }

  unloadProject(): void {
    if (this.loadedProject) {
      this.logger.info('Project unloaded', { project: this.loadedProject.name })
    }
    this.loadedProject = undefined
  }

  setFileList(files: string[]): void {
    if (this.loadedProject) {
      this.loadedProject.fileList = new Set(files)
    }
  }

  updateStatus(status: NodeStatus): void {
    this.latestStatus = status
  }

  /**
   * Request with credentials; POST bodies are sent as raw octets
   */
  buildRequest(path: string, method: HttpMethod, body?: string | Uint8Array): HttpRequest {
    const headers: Record<string, string> = {}
    if (this.token !== undefined) {
      headers.Authorization = `Bearer ${this.token}`
    }
    if (this.session !== undefined) {
      headers.Session = this.session
    }
    if (method === 'POST' && body !== undefined) {
      headers['Content-Type'] = 'application/octet-stream'
      headers['Content-Length'] = String(bodyLength(body))
    }
    return { path, method, headers, body }
  }

  /**
   * Probe every candidate address at once and keep a connection to the
   * first server that accepts the token. False when none answers.
   */
  async connect(addresses: string[], token: string): Promise<boolean> {
    this.token = token
    const candidates = [...new Set(addresses)]
    if (candidates.length === 0) {
      return false
    }

    let host: string
    try {
      host = await Promise.any(candidates.map(address => this.probe(address)))
    } catch (error) {
      this.logger.warn('No processing server answered', {
        addresses: candidates,
        errors: error instanceof AggregateError ? error.errors.length : 1,
      })
      return false
    }

    try {
      await this.connection.open(
        { host, port: this.port },
        { timeout: this.connectTimeout, keepAlive: this.keepAlive }
      )
    } catch (error) {
      this.logger.error('Could not open the processing server connection', error, { host })
      return false
    }
    this.logger.info('Connected to processing server', { host, port: this.port })
    return true
  }

  disconnect(): void {
    this.stopStatusPolling()
    this.connection.terminate(false)
  }

  /**
   * Poll GET /node/status while connected
   */
  private startStatusPolling(): void {
    if (this.statusTimer) {
      return
    }
    this.statusTimer = setInterval(() => {
      this.queue.pushOnce(new GetNodeStatus(this))
    }, this.statusInterval)
    this.statusTimer.unref()
  }

  private stopStatusPolling(): void {
    if (this.statusTimer) {
      clearInterval(this.statusTimer)
      this.statusTimer = undefined
    }
  }

  private async probe(host: string): Promise<string> {
    const probe = new HttpConnection({
      connector: this.connector,
      reconnect: { maxRetries: 0 },
      logger: this.logger.child({ probe: host }),
    })
    try {
      await probe.open({ host, port: this.port }, { timeout: this.probeTimeout, keepAlive: false })
      const raw = await probe.send(this.buildRequest(NODE_ENDPOINTS.NODE.CONNECT_USER, 'GET'))
      const response = parseHttpResponse(raw)
      if (response.statusCode !== HTTP_STATUS.OK) {
        throw new ProtocolError(
          `${host} refused the session: ${response.statusCode} ${response.statusText}`,
          ErrorCode.UNEXPECTED_STATUS,
          {
            details: {
              path: NODE_ENDPOINTS.NODE.CONNECT_USER,
              statusCode: response.statusCode,
              expectedStatus: HTTP_STATUS.OK,
            },
          }
        )
      }
      return host
    } finally {
      probe.terminate()
    }
  }

  private handleState(state: ConnectionState): void {
    switch (state) {
      case ConnectionState.Connected:
        this.queue.setEnabled(true)
        this.startStatusPolling()
        break
      case ConnectionState.Lost:
        this.queue.setEnabled(false)
        this.stopStatusPolling()
        break
      case ConnectionState.Disconnected:
        this.queue.setEnabled(false)
        this.stopStatusPolling()
        this.closeSession()
        this.unloadProject()
        break
      default:
        break
    }
  }
}
