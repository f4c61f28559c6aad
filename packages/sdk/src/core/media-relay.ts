/**
 * MediaRelay
 * Wires the queues, the processing-server client, local storage and both
 * transfer legs together. Everything is passed in through constructors.
 */

import { createLogger, type Logger } from '@media-relay/shared/logger'
import {
  ConnectionState,
  type LocalFile,
  type MediaFile,
  type TransferListener,
  type TransferSnapshot,
  type WaitingFile,
} from '@media-relay/shared/types'
import type { MediaDevice } from '../device/types'
import type { Connector } from '../http/types'
import { MetricsCollector, type RelayMetrics } from '../monitoring/metrics'
import { NodeClient } from '../node/client'
import { DownloadProjectFile } from '../node/commands'
import { CommandQueueExecutor, type AlertReporter } from '../queue/executor'
import { LocalMediaStore } from '../storage/local-store'
import { TransferCoordinator } from '../transfer/coordinator'
import type { DownloadRequestOptions } from '../transfer/download-leg'
import { logger as defaultLogger } from '../utils/logger'
import { resolveConfig, type MediaRelayConfig, type MediaRelayOptions } from './config'

export interface MediaRelayDependencies {
  device: MediaDevice
  /** Receives every terminal failure and skipped-files notice */
  reporter?: AlertReporter
  /** Byte stream factory for the processing server; TCP by default */
  connector?: Connector
  metrics?: MetricsCollector
  logger?: Logger
}

export class MediaRelay {
  readonly config: MediaRelayConfig
  readonly metrics: MetricsCollector
  readonly store: LocalMediaStore
  readonly deviceQueue: CommandQueueExecutor
  readonly node: NodeClient
  readonly transfers: TransferCoordinator
  private readonly logger: Logger
  private readonly releaseObserver: () => void

  constructor(options: MediaRelayOptions, dependencies: MediaRelayDependencies) {
    this.config = resolveConfig(options)
    const { queue, transport, transfer, node, logLevel } = this.config

    const base =
      dependencies.logger ?? (logLevel ? createLogger({ level: logLevel }) : defaultLogger)
    this.logger = base.child({ component: 'media-relay' })
    this.metrics = dependencies.metrics ?? new MetricsCollector()
    this.store = new LocalMediaStore(this.config.mediaDir, transfer.tempPrefix)

    this.deviceQueue = new CommandQueueExecutor({
      name: 'device-queue',
      retries: queue.retries,
      retryDelay: queue.retryDelay,
      reporter: dependencies.reporter,
      metrics: this.metrics,
      logger: base,
    })
    this.node = new NodeClient({
      port: transport.port,
      connectTimeout: transport.connectTimeout,
      probeTimeout: transport.probeTimeout,
      keepAlive: transport.keepAlive,
      chunkSize: transport.chunkSize,
      reconnect: transport.reconnect,
      connector: dependencies.connector,
      retries: queue.retries,
      retryDelay: queue.retryDelay,
      statusInterval: node.statusInterval,
      reporter: dependencies.reporter,
      metrics: this.metrics,
      logger: base,
    })
    this.transfers = new TransferCoordinator({
      deviceQueue: this.deviceQueue,
      device: dependencies.device,
      node: this.node,
      store: this.store,
      reporter: dependencies.reporter,
      metrics: this.metrics,
      logger: base,
      speedInterval: transfer.speedInterval,
    })

    this.releaseObserver = this.node.connection.addObserver(state => {
      if (state === ConnectionState.Disconnected) {
        this.transfers.upload.abandon()
      }
    })
  }

  /**
   * Make sure the media directory exists
   */
  async init(): Promise<void> {
    await this.store.ensureRoot()
    this.logger.info('Media relay ready', { mediaDir: this.config.mediaDir })
  }

  connect(addresses: string[], token: string): Promise<boolean> {
    return this.node.connect(addresses, token)
  }

  disconnect(): void {
    this.node.disconnect()
  }

  loadProject(name: string, fileList?: string[]): void {
    this.node.loadProject(name, fileList)
  }

  requestDownload(files: MediaFile[], options?: DownloadRequestOptions): void {
    this.transfers.download.request(files, options)
  }

  requestUpload(files: LocalFile[], waiting?: WaitingFile[]): void {
    this.transfers.upload.request(files, waiting)
  }

  uploadFromDevice(files: MediaFile[]): Promise<void> {
    return this.transfers.uploadFromDevice(files)
  }

  /**
   * Fetch a processed file from the project's output folder
   */
  downloadProjectFile(fileName: string, destination: string): void {
    this.node.queue.push(new DownloadProjectFile(this.node, fileName, destination))
  }

  pauseDownload(): void {
    this.transfers.download.pause()
  }

  resumeDownload(): void {
    this.transfers.download.resume()
  }

  stopDownload(): void {
    this.transfers.download.stop()
  }

  pauseUpload(): void {
    this.transfers.upload.pause()
  }

  resumeUpload(): void {
    this.transfers.upload.resume()
  }

  stopUpload(): void {
    this.transfers.upload.stop()
  }

  deviceConnected(): void {
    this.logger.info('Device connected')
    this.deviceQueue.setEnabled(true)
    this.transfers.download.deviceReconnected()
  }

  /**
   * Nothing queued for the device survives its disconnection
   */
  deviceDisconnected(): void {
    this.logger.warn('Device disconnected')
    this.deviceQueue.setEnabled(false)
    this.deviceQueue.clear()
    this.transfers.download.abandon()
  }

  get downloadSnapshot(): TransferSnapshot | undefined {
    return this.transfers.download.snapshot
  }

  get uploadSnapshot(): TransferSnapshot | undefined {
    return this.transfers.upload.snapshot
  }

  onDownloadChange(listener: TransferListener): () => void {
    return this.transfers.download.onChange(listener)
  }

  onUploadChange(listener: TransferListener): () => void {
    return this.transfers.upload.onChange(listener)
  }

  getMetrics(): RelayMetrics {
    return this.metrics.getMetrics()
  }

  /**
   * Close the server connection and drop everything queued
   */
  close(): void {
    this.releaseObserver()
    this.transfers.download.abandon()
    this.transfers.upload.abandon()
    this.deviceQueue.clear()
    this.node.queue.clear()
    this.node.disconnect()
    this.logger.info('Media relay closed', { summary: this.metrics.getSummary() })
  }
}
