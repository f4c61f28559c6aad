/**
 * Download leg: device to local storage
 *
 * One file moves per DownloadMedia invocation, chunk by chunk into a temp
 * file whose length always equals the committed cursor offset. A retried or
 * resumed step reopens the temp file at that offset and carries on.
 */

import type { FileHandle } from 'node:fs/promises'
import type { Logger } from '@media-relay/shared/logger'
import type {
  LocalFile,
  MediaFile,
  TransferListener,
  TransferSnapshot,
} from '@media-relay/shared/types'
import { ALERT_TITLES, DEFAULT_CONFIG } from '../core/constants'
import type { MediaDevice } from '../device/types'
import type { MetricsCollector } from '../monitoring/metrics'
import { COMMAND_SUCCESS, commandFailure, type CommandResult } from '../queue/command'
import type { AlertReporter, CommandQueueExecutor } from '../queue/executor'
import type { LocalMediaStore } from '../storage/local-store'
import { fileError, toRelayError } from '../utils/error'
import { componentLogger } from '../utils/logger'
import { DownloadMedia, DropHandOffs, StartDownload, StopDownload } from './commands'
import { SpeedSampler } from './speed'
import { TransferState } from './state'
import type { DownloadLinks } from './types'

export interface DownloadLegOptions {
  queue: CommandQueueExecutor
  device: MediaDevice
  store: LocalMediaStore
  links: DownloadLinks
  reporter?: AlertReporter
  metrics?: MetricsCollector
  logger?: Logger
  speedInterval?: number
}

export interface DownloadRequestOptions {
  /** Fetched only for a hand-off to the upload leg; keeps its temp name */
  temporary?: boolean
}

export function skippedDownloadsNotice(count: number): string {
  return `Invalid files or files that have already been saved were detected. The download will proceed without these (${count})files.`
}

export class DownloadLeg {
  private readonly queue: CommandQueueExecutor
  private readonly device: MediaDevice
  private readonly store: LocalMediaStore
  private readonly links: DownloadLinks
  private readonly reporter?: AlertReporter
  private readonly metrics?: MetricsCollector
  private readonly logger: Logger
  private readonly sampler: SpeedSampler
  private readonly listeners = new Set<TransferListener>()
  private readonly temporary = new Set<string>()
  private state?: TransferState<MediaFile>
  private controller?: AbortController

  constructor(options: DownloadLegOptions) {
    this.queue = options.queue
    this.device = options.device
    this.store = options.store
    this.links = options.links
    this.reporter = options.reporter
    this.metrics = options.metrics
    this.logger = componentLogger('download', options.logger)
    this.sampler = new SpeedSampler(
      options.speedInterval ?? DEFAULT_CONFIG.TRANSFER.SPEED_INTERVAL,
      () => this.state?.transferredBytes ?? 0,
      speed => this.state?.setSpeed(speed)
    )
  }

  get snapshot(): TransferSnapshot | undefined {
    return this.state?.snapshot()
  }

  get active(): boolean {
    return this.state !== undefined
  }

  /**
   * Listen for every change; `undefined` means the leg went idle
   */
  onChange(listener: TransferListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  isPending(fileName: string): boolean {
    return this.state?.has(fileName) ?? false
  }

  isTemporary(fileName: string): boolean {
    return this.temporary.has(fileName)
  }

  request(files: MediaFile[], options: DownloadRequestOptions = {}): void {
    this.queue.push(new StartDownload(this, files, options.temporary ?? false))
  }

  /**
   * User pause; the in-flight chunk is abandoned at its boundary
   */
  pause(): void {
    const state = this.state
    if (!state || state.paused) {
      return
    }
    state.pause('user')
    this.sampler.stop()
    this.controller?.abort()
    this.logger.info('Download paused', { traceId: state.trace.traceId })
  }

  /**
   * Lift a user pause. Force pauses stay until their condition clears.
   */
  resume(): void {
    const state = this.state
    if (!state || !state.paused || state.forcePaused) {
      return
    }
    this.proceed(state)
    this.logger.info('Download resumed', { traceId: state.trace.traceId })
  }

  /**
   * Cancel the whole download set. Upload waiters are dropped when
   * StopDownload runs.
   */
  stop(): void {
    const state = this.state
    if (!state) {
      return
    }
    state.pause('user')
    this.sampler.stop()
    this.controller?.abort()
    this.queue.push(new StopDownload(this))
  }

  /**
   * The device is back: continue a download the device interrupted
   */
  deviceReconnected(): void {
    const state = this.state
    if (state?.pausedReason === 'device') {
      this.proceed(state)
    }
  }

  /**
   * The device went away: everything pending is abandoned
   */
  abandon(): void {
    const state = this.state
    if (!state) {
      return
    }
    this.controller?.abort()
    const names = state.pending.map(file => file.fileName)
    this.teardown()
    this.links.downloadCancelledFor(names)
    this.logger.warn('Download abandoned', { files: names.length })
  }

  /**
   * Hand-off downloads for uploads that were cancelled are no longer needed.
   * An in-flight one stops at its chunk boundary; the set itself changes
   * on the device queue (DropHandOffs).
   */
  uploadCancelledFor(fileNames: string[]): void {
    const state = this.state
    if (!state) {
      return
    }
    const drop = fileNames.filter(name => this.temporary.has(name) && state.has(name))
    if (drop.length === 0) {
      return
    }
    const current = state.cursor?.item.fileName
    if (current !== undefined && drop.includes(current)) {
      this.controller?.abort()
    }
    this.queue.prepend(new DropHandOffs(this, drop))
  }

  /**
   * Remove hand-off downloads from the set (DropHandOffs)
   */
  async dropHandOffs(fileNames: string[]): Promise<CommandResult> {
    const state = this.state
    if (!state) {
      return COMMAND_SUCCESS
    }
    // A later request may have asked to keep some of them
    const drop = fileNames.filter(name => this.temporary.has(name) && state.has(name))
    if (drop.length === 0) {
      return COMMAND_SUCCESS
    }
    const current = state.cursor?.item.fileName
    state.remove(drop)
    for (const name of drop) {
      this.temporary.delete(name)
    }
    this.logger.info('Dropped hand-off downloads', { files: drop })
    if (state.isEmpty) {
      this.teardown()
    }
    if (current !== undefined && drop.includes(current)) {
      try {
        await this.store.remove(this.store.tempPath(current))
      } catch (error) {
        return commandFailure(error, ALERT_TITLES.DOWNLOAD)
      }
    }
    return COMMAND_SUCCESS
  }

  /**
   * The retries for the cursor's file ran out: hold the set at the
   * committed offset until the user resumes it
   */
  halt(): void {
    const state = this.state
    if (!state || state.paused) {
      return
    }
    state.pause('failed')
    this.sampler.stop()
    this.logger.warn('Download halted', {
      traceId: state.trace.traceId,
      file: state.cursor?.item.fileName,
      offset: state.cursor?.offset,
    })
  }

  /**
   * Merge a request into the download set (StartDownload)
   */
  async start(files: MediaFile[], temporary: boolean): Promise<CommandResult> {
    const state = this.state
    const requested = new Map<string, MediaFile>()
    for (const file of files) {
      if (!requested.has(file.fileName)) {
        requested.set(file.fileName, file)
      }
    }

    const accepted: MediaFile[] = []
    const invalid: string[] = []
    const saved: MediaFile[] = []
    try {
      for (const file of requested.values()) {
        if (!file.valid) {
          invalid.push(file.fileName)
        } else if (await this.store.isSaved(file.fileName)) {
          saved.push(file)
        } else if (state?.has(file.fileName)) {
          accepted.push(file)
        } else {
          const local = this.links.localCopy(file.fileName)
          if (local) {
            if (!temporary) {
              await this.store.copyToFinal(local.path, file.fileName)
            }
          } else {
            accepted.push(file)
          }
        }
      }
      // Pending files saved meanwhile by another path
      for (const file of state?.pending ?? []) {
        if (!requested.has(file.fileName) && (await this.store.isSaved(file.fileName))) {
          saved.push(file)
        }
      }
    } catch (error) {
      return commandFailure(error, ALERT_TITLES.DOWNLOAD)
    }

    for (const file of accepted) {
      if (!temporary) {
        this.temporary.delete(file.fileName)
      } else if (!state?.has(file.fileName)) {
        this.temporary.add(file.fileName)
      }
    }

    const current = this.state ?? new TransferState<MediaFile>('download', () => this.emit())
    this.state = current
    const dropped = [...invalid, ...saved.map(file => file.fileName)]
    current.remove(dropped)
    current.add(accepted)
    for (const name of dropped) {
      this.temporary.delete(name)
    }

    this.links.downloadCancelledFor(invalid)
    for (const file of saved) {
      this.links.readyToUpload({
        path: this.store.finalPath(file.fileName),
        fileName: file.fileName,
        size: file.size,
        temporary: false,
      })
    }

    const skipped = invalid.length + saved.length
    if (skipped > 0) {
      this.logger.info('Skipped files', { invalid, saved: saved.map(file => file.fileName) })
      this.reporter?.report({ title: ALERT_TITLES.FILES_SKIPPED, message: skippedDownloadsNotice(skipped) })
    }

    if (current.isEmpty) {
      this.teardown()
      return COMMAND_SUCCESS
    }
    if (!state) {
      this.logger.info('Download started', {
        traceId: current.trace.traceId,
        files: current.totalFiles,
        bytes: current.totalBytes,
      })
    }
    this.proceed(current)
    return COMMAND_SUCCESS
  }

  /**
   * Move the cursor's file to local storage (DownloadMedia)
   */
  async step(): Promise<CommandResult> {
    const state = this.state
    if (!state || state.paused) {
      return COMMAND_SUCCESS
    }
    const cursor = state.select()
    if (!cursor) {
      this.teardown()
      return COMMAND_SUCCESS
    }
    if (!this.device.isConnected()) {
      state.pause('device')
      this.sampler.stop()
      return COMMAND_SUCCESS
    }

    const file = cursor.item
    const controller = new AbortController()
    this.controller = controller
    let target: { handle: FileHandle; offset: number }
    try {
      target = await this.store.openForWrite(file.fileName, cursor.offset)
    } catch (error) {
      this.release(controller)
      return this.storageFailure(state, error)
    }
    if (controller.signal.aborted) {
      this.release(controller)
      await target.handle.close()
      return this.afterAbort(state)
    }
    state.rewind(target.offset)

    try {
      await this.copyFromDevice(state, file, target, controller.signal)
    } catch (error) {
      if (controller.signal.aborted) {
        return this.afterAbort(state)
      }
      const failure = toRelayError(error)
      if (failure.category === 'filesystem') {
        return this.storageFailure(state, failure)
      }
      this.logger.warn('Device read failed', {
        file: file.fileName,
        offset: state.cursor?.offset,
        error: failure.message,
      })
      return { success: false, retryable: true, error: failure.toAlert(ALERT_TITLES.DOWNLOAD) }
    } finally {
      this.release(controller)
    }
    if (controller.signal.aborted) {
      return this.afterAbort(state)
    }

    if ((state.cursor?.offset ?? 0) < file.size) {
      return {
        success: false,
        retryable: true,
        error: {
          title: ALERT_TITLES.DOWNLOAD,
          message: `Device stream for ${file.fileName} ended early`,
        },
      }
    }

    const temporary = this.temporary.has(file.fileName)
    let path: string
    try {
      path = temporary ? this.store.tempPath(file.fileName) : await this.store.promote(file.fileName)
    } catch (error) {
      return this.storageFailure(state, error)
    }

    state.complete()
    this.temporary.delete(file.fileName)
    this.metrics?.recordTransfer('download', file.size)
    this.logger.info('Downloaded file', {
      traceId: state.trace.traceId,
      file: file.fileName,
      size: file.size,
      temporary,
    })
    this.links.readyToUpload({ path, fileName: file.fileName, size: file.size, temporary })
    this.queue.pushOnce(new DownloadMedia(this))
    return COMMAND_SUCCESS
  }

  /**
   * Tear down a stopped download (StopDownload)
   */
  async finish(): Promise<CommandResult> {
    const state = this.state
    if (!state) {
      return COMMAND_SUCCESS
    }
    const names = state.pending.map(file => file.fileName)
    const current = state.cursor?.item.fileName
    this.teardown()
    this.links.downloadCancelledFor(names)
    this.logger.info('Download stopped', { traceId: state.trace.traceId, files: names.length })

    if (current !== undefined) {
      try {
        await this.store.remove(this.store.tempPath(current))
      } catch (error) {
        return commandFailure(error, ALERT_TITLES.DOWNLOAD)
      }
    }
    return COMMAND_SUCCESS
  }

  private async copyFromDevice(
    state: TransferState<MediaFile>,
    file: MediaFile,
    target: { handle: FileHandle; offset: number },
    signal: AbortSignal
  ): Promise<void> {
    try {
      for await (const chunk of this.device.readFile(file, target.offset, signal)) {
        if (signal.aborted) {
          break
        }
        try {
          await target.handle.write(chunk)
        } catch (error) {
          throw fileError(error, this.store.tempPath(file.fileName), 'write')
        }
        state.advance(chunk.byteLength)
      }
    } finally {
      await target.handle.close()
    }
  }

  private afterAbort(state: TransferState<MediaFile>): CommandResult {
    // Aborted for a queued drop: carry on once it has run
    if (this.state === state && !state.paused) {
      this.queue.pushOnce(new DownloadMedia(this))
    }
    return COMMAND_SUCCESS
  }

  private storageFailure(state: TransferState<MediaFile>, error: unknown): CommandResult {
    state.pause('storage')
    this.sampler.stop()
    this.logger.error('Local storage failed, download paused', error, {
      traceId: state.trace.traceId,
    })
    return { ...commandFailure(error, ALERT_TITLES.DOWNLOAD), retryable: false }
  }

  private release(controller: AbortController): void {
    if (this.controller === controller) {
      this.controller = undefined
    }
  }

  private proceed(state: TransferState<MediaFile>): void {
    state.unpause()
    this.sampler.start()
    this.queue.pushOnce(new DownloadMedia(this))
  }

  private teardown(): void {
    this.sampler.stop()
    this.state = undefined
    this.temporary.clear()
    this.emit()
  }

  private emit(): void {
    const snapshot = this.state?.snapshot()
    for (const listener of [...this.listeners]) {
      listener(snapshot)
    }
  }
}
