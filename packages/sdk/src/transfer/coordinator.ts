/**
 * Transfer coordinator
 * Builds both legs and resolves the dependencies between them: a file that
 * has to come off the device before it can be uploaded, and the cascade
 * when either side gives up on such a file.
 */

import type { Logger } from '@media-relay/shared/logger'
import type { LocalFile, MediaFile, WaitingFile } from '@media-relay/shared/types'
import type { MediaDevice } from '../device/types'
import type { MetricsCollector } from '../monitoring/metrics'
import type { NodeClient } from '../node/client'
import type { AlertReporter, CommandQueueExecutor } from '../queue/executor'
import type { LocalMediaStore } from '../storage/local-store'
import { componentLogger } from '../utils/logger'
import { DownloadLeg } from './download-leg'
import { UploadLeg } from './upload-leg'
import type { DownloadLinks, UploadLinks } from './types'

export interface TransferCoordinatorOptions {
  /** Queue gated on the device connection */
  deviceQueue: CommandQueueExecutor
  device: MediaDevice
  node: NodeClient
  store: LocalMediaStore
  reporter?: AlertReporter
  metrics?: MetricsCollector
  logger?: Logger
  speedInterval?: number
}

export class TransferCoordinator implements DownloadLinks, UploadLinks {
  readonly download: DownloadLeg
  readonly upload: UploadLeg
  private readonly store: LocalMediaStore
  private readonly logger: Logger

  constructor(options: TransferCoordinatorOptions) {
    this.store = options.store
    this.logger = componentLogger('transfers', options.logger)
    this.download = new DownloadLeg({
      queue: options.deviceQueue,
      device: options.device,
      store: options.store,
      links: this,
      reporter: options.reporter,
      metrics: options.metrics,
      logger: options.logger,
      speedInterval: options.speedInterval,
    })
    this.upload = new UploadLeg({
      node: options.node,
      store: options.store,
      links: this,
      reporter: options.reporter,
      metrics: options.metrics,
      logger: options.logger,
      speedInterval: options.speedInterval,
    })
  }

  /**
   * Upload device files, downloading first whatever is not saved locally.
   * The upload set learns about the waiting files before any download starts.
   */
  async uploadFromDevice(files: MediaFile[]): Promise<void> {
    const local: LocalFile[] = []
    const remote: MediaFile[] = []
    for (const file of files) {
      if (file.valid && (await this.store.isSaved(file.fileName))) {
        local.push(await this.store.describe(this.store.finalPath(file.fileName)))
      } else {
        remote.push(file)
      }
    }
    const waiting: WaitingFile[] = remote
      .filter(file => file.valid)
      .map(file => ({ fileName: file.fileName, size: file.size }))

    this.logger.info('Upload from device requested', {
      local: local.length,
      waiting: waiting.length,
    })
    this.upload.request(local, waiting)
    if (remote.length > 0) {
      this.download.request(remote, { temporary: true })
    }
  }

  downloadCancelledFor(fileNames: string[]): void {
    this.upload.downloadCancelledFor(fileNames)
  }

  /**
   * A hand-off copy always goes to the upload leg; a saved file only when
   * an upload is waiting on it
   */
  readyToUpload(file: LocalFile): void {
    if (file.temporary || this.upload.isWaiting(file.fileName)) {
      this.upload.request([file], [], { startIfUserPaused: false })
    }
  }

  localCopy(fileName: string): LocalFile | undefined {
    return this.upload.localCopy(fileName)
  }

  uploadCancelledFor(fileNames: string[]): void {
    this.download.uploadCancelledFor(fileNames)
  }
}
