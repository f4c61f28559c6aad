/**
 * Upload leg: local storage to the processing server
 *
 * Files are posted one at a time over the node connection. The server
 * cannot resume a body, so an interrupted file starts again from byte 0.
 * Entries still being downloaded sit in the waiting set and count towards
 * the totals until their local copy arrives.
 */

import { open, type FileHandle } from 'node:fs/promises'
import { z } from 'zod'
import { ErrorCode } from '@media-relay/shared/errors'
import type { Logger } from '@media-relay/shared/logger'
import type {
  LocalFile,
  TransferListener,
  TransferSnapshot,
  WaitingFile,
} from '@media-relay/shared/types'
import { ALERT_TITLES, DEFAULT_CONFIG, HTTP_STATUS, NODE_ENDPOINTS } from '../core/constants'
import { parseHttpResponse } from '../http/parser'
import { withQuery } from '../http/request'
import type { MetricsCollector } from '../monitoring/metrics'
import type { NodeClient } from '../node/client'
import { serverMessage } from '../node/command'
import { COMMAND_SUCCESS, commandError, commandFailure, type CommandResult } from '../queue/command'
import type { AlertReporter } from '../queue/executor'
import type { LocalMediaStore } from '../storage/local-store'
import { RelayError, fileError, toRelayError } from '../utils/error'
import { componentLogger } from '../utils/logger'
import { StartUpload, StopUpload, UploadMedia } from './commands'
import { SpeedSampler } from './speed'
import { TransferState } from './state'
import type { StartUploadOptions, UploadLinks } from './types'

export interface UploadLegOptions {
  node: NodeClient
  store: LocalMediaStore
  links: UploadLinks
  reporter?: AlertReporter
  metrics?: MetricsCollector
  logger?: Logger
  speedInterval?: number
}

const uploadResponseSchema = z.object({
  taskID: z.union([z.string(), z.number()]).optional(),
  code: z.number().optional(),
  message: z.string().optional(),
})

export function missingUploadsNotice(count: number): string {
  return `Files that are not saved in device were detected. The upload will proceed without these (${count})files.`
}

export class UploadLeg {
  private readonly node: NodeClient
  private readonly store: LocalMediaStore
  private readonly links: UploadLinks
  private readonly reporter?: AlertReporter
  private readonly metrics?: MetricsCollector
  private readonly logger: Logger
  private readonly sampler: SpeedSampler
  private readonly listeners = new Set<TransferListener>()
  private state?: TransferState<LocalFile>

  constructor(options: UploadLegOptions) {
    this.node = options.node
    this.store = options.store
    this.links = options.links
    this.reporter = options.reporter
    this.metrics = options.metrics
    this.logger = componentLogger('upload', options.logger)
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

  onChange(listener: TransferListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  isWaiting(fileName: string): boolean {
    return this.state?.isWaiting(fileName) ?? false
  }

  /**
   * Local copy queued for upload under `fileName`
   */
  localCopy(fileName: string): LocalFile | undefined {
    return this.state?.get(fileName)
  }

  request(files: LocalFile[], waiting: WaitingFile[] = [], options: StartUploadOptions = {}): void {
    this.node.queue.push(new StartUpload(this, files, waiting, options.startIfUserPaused ?? true))
  }

  pause(): void {
    const state = this.state
    if (!state || state.paused) {
      return
    }
    state.pause('user')
    this.sampler.stop()
    this.node.connection.cancelSendFile()
    this.logger.info('Upload paused', { traceId: state.trace.traceId })
  }

  resume(): void {
    const state = this.state
    if (!state || !state.paused || state.forcePaused) {
      return
    }
    this.proceed(state)
    this.logger.info('Upload resumed', { traceId: state.trace.traceId })
  }

  stop(): void {
    const state = this.state
    if (!state) {
      return
    }
    state.pause('user')
    this.sampler.stop()
    this.node.connection.cancelSendFile()
    this.node.queue.push(new StopUpload(this))
  }

  /**
   * Downloads these entries waited on will never arrive. The waiting set
   * shrinks in the same step; the set is then re-evaluated in order.
   */
  downloadCancelledFor(fileNames: string[]): void {
    const state = this.state
    if (!state || fileNames.length === 0) {
      return
    }
    const removed = state.removeWaiting(fileNames)
    if (removed.length === 0) {
      return
    }
    this.logger.info('Dropped upload waiters', { files: removed.map(file => file.fileName) })
    this.node.queue.push(new StartUpload(this, [], [], false))
  }

  /**
   * The server connection is gone for good: drop the whole upload set
   */
  abandon(): void {
    const state = this.state
    if (!state) {
      return
    }
    const names = [...state.pending.map(file => file.fileName), ...state.waiting.map(file => file.fileName)]
    this.teardown()
    this.links.uploadCancelledFor(names)
    this.logger.warn('Upload abandoned', { files: names.length })
  }

  /**
   * Merge local files and waiting entries into the upload set (StartUpload)
   */
  async start(
    files: LocalFile[],
    waiting: WaitingFile[],
    startIfUserPaused: boolean
  ): Promise<CommandResult> {
    const existing = this.state
    const remote = this.node.project?.fileList ?? new Set<string>()

    const candidates = new Map<string, LocalFile>()
    for (const file of [...(existing?.pending ?? []), ...files]) {
      if (!candidates.has(file.fileName)) {
        candidates.set(file.fileName, file)
      }
    }

    const missing: string[] = []
    const uploaded: string[] = []
    const accepted: LocalFile[] = []
    try {
      for (const file of candidates.values()) {
        if (remote.has(file.fileName)) {
          uploaded.push(file.fileName)
        } else if (existing?.cursor?.item.fileName !== file.fileName && !(await this.store.exists(file.path))) {
          missing.push(file.fileName)
        } else {
          accepted.push(file)
        }
      }
    } catch (error) {
      return commandFailure(error, ALERT_TITLES.START_UPLOAD)
    }

    const local = new Set(accepted.map(file => file.fileName))
    const staleWaiting = (existing?.waiting ?? [])
      .map(file => file.fileName)
      .filter(name => remote.has(name) || local.has(name))
    const newWaiting = waiting.filter(file => !remote.has(file.fileName) && !local.has(file.fileName))

    const state = existing ?? new TransferState<LocalFile>('upload', () => this.emit())
    this.state = state
    state.remove([...missing, ...uploaded])
    state.add(accepted)
    state.removeWaiting(staleWaiting)
    state.addWaiting(newWaiting)

    // Waiters whose file is already on the server will never be needed
    const unneeded = [
      ...staleWaiting.filter(name => remote.has(name)),
      ...waiting.filter(file => remote.has(file.fileName)).map(file => file.fileName),
    ]
    if (unneeded.length > 0) {
      this.links.uploadCancelledFor(unneeded)
    }

    if (missing.length > 0) {
      this.logger.info('Skipped missing files', { files: missing })
      this.reporter?.report({
        title: ALERT_TITLES.FILES_SKIPPED,
        message: missingUploadsNotice(missing.length),
      })
    }

    if (state.isEmpty) {
      this.teardown()
      return COMMAND_SUCCESS
    }
    if (!existing) {
      this.logger.info('Upload started', {
        traceId: state.trace.traceId,
        files: state.totalFiles,
        bytes: state.totalBytes,
      })
    }
    if (state.pending.length === 0) {
      state.pause('dependency')
      this.sampler.stop()
      return COMMAND_SUCCESS
    }
    if (!state.paused || state.forcePaused || startIfUserPaused) {
      this.proceed(state)
    }
    return COMMAND_SUCCESS
  }

  /**
   * Post the cursor's file to the loaded project (UploadMedia)
   */
  async step(): Promise<CommandResult> {
    const state = this.state
    if (!state || state.paused) {
      return COMMAND_SUCCESS
    }
    const project = this.node.project
    if (!project) {
      this.halt()
      return commandFailure(
        new RelayError('No project is loaded', ErrorCode.PROJECT_NOT_LOADED),
        ALERT_TITLES.UPLOAD
      )
    }
    const cursor = state.select()
    if (!cursor) {
      if (state.waiting.length === 0) {
        this.teardown()
      } else {
        state.pause('dependency')
        this.sampler.stop()
      }
      return COMMAND_SUCCESS
    }

    const file = cursor.item
    let handle: FileHandle
    try {
      handle = await open(file.path, 'r')
    } catch (error) {
      return this.dropFile(state, file, fileError(error, file.path, 'open'))
    }

    state.rewind(0)
    const request = this.node.buildRequest(
      withQuery(NODE_ENDPOINTS.PROJECT.COMMAND, { name: 'add', param1: file.fileName }),
      'POST'
    )
    let raw: Buffer
    try {
      raw = await this.node.connection.sendFile(request, handle, {
        onBytesSent: bytes => {
          if (this.state !== state || state.paused) {
            this.node.connection.cancelSendFile()
          } else {
            state.advance(bytes)
          }
        },
      })
    } catch (error) {
      state.rewind(0)
      const failure = toRelayError(error)
      if (failure.code === ErrorCode.TRANSFER_CANCELLED) {
        return COMMAND_SUCCESS
      }
      if (failure.category === 'filesystem') {
        return this.dropFile(state, file, failure)
      }
      this.logger.warn('Upload interrupted', { file: file.fileName, error: failure.message })
      return commandFailure(failure, ALERT_TITLES.UPLOAD)
    } finally {
      await handle.close()
    }

    let accepted = false
    let message: string | undefined
    try {
      const response = parseHttpResponse(raw)
      const body = response.bodyAs(uploadResponseSchema)
      accepted = response.statusCode === HTTP_STATUS.OK && body?.taskID !== undefined
      message = body?.message ?? serverMessage(response)
      if (!accepted) {
        message ??= `Server rejected ${file.fileName}: ${response.statusCode} ${response.statusText}`
      }
    } catch (error) {
      message = toRelayError(error).message
    }
    if (!accepted) {
      state.rewind(0)
      await this.removeHandOff(file)
      return this.dropFile(state, file, undefined, message)
    }

    project.fileList.add(file.fileName)
    await this.removeHandOff(file)
    if (this.state !== state) {
      return COMMAND_SUCCESS
    }
    state.complete()
    this.metrics?.recordTransfer('upload', file.size)
    this.logger.info('Uploaded file', {
      traceId: state.trace.traceId,
      file: file.fileName,
      size: file.size,
    })
    this.node.queue.pushOnce(new UploadMedia(this))
    return COMMAND_SUCCESS
  }

  /**
   * Tear down a stopped upload (StopUpload)
   */
  async finish(): Promise<CommandResult> {
    const state = this.state
    if (!state) {
      return COMMAND_SUCCESS
    }
    const waiting = state.waiting.map(file => file.fileName)
    const handOffs = state.pending.filter(file => file.temporary)
    this.teardown()
    this.links.uploadCancelledFor(waiting)
    this.logger.info('Upload stopped', { traceId: state.trace.traceId })

    try {
      for (const file of handOffs) {
        await this.store.remove(file.path)
      }
    } catch (error) {
      return commandFailure(error, ALERT_TITLES.UPLOAD)
    }
    return COMMAND_SUCCESS
  }

  /**
   * Nothing moves until the user resumes: the retries for the cursor's
   * file ran out, or there is no project to upload into
   */
  halt(): void {
    const state = this.state
    if (!state || state.paused) {
      return
    }
    state.pause('failed')
    this.sampler.stop()
    this.logger.warn('Upload halted', {
      traceId: state.trace.traceId,
      file: state.cursor?.item.fileName,
    })
  }

  private async removeHandOff(file: LocalFile): Promise<void> {
    if (!file.temporary) {
      return
    }
    try {
      await this.store.remove(file.path)
    } catch (error) {
      this.logger.warn('Could not remove hand-off copy', {
        path: file.path,
        error: toRelayError(error).message,
      })
    }
  }

  /**
   * A file that cannot be sent leaves the set; the rest carry on
   */
  private dropFile(
    state: TransferState<LocalFile>,
    file: LocalFile,
    error?: RelayError,
    message?: string
  ): CommandResult {
    state.remove([file.fileName])
    this.logger.warn('Dropped file from upload', {
      file: file.fileName,
      error: error?.message ?? message,
    })
    this.node.queue.pushOnce(new UploadMedia(this))
    return error
      ? commandFailure(error, ALERT_TITLES.UPLOAD)
      : commandError(ALERT_TITLES.UPLOAD, message ?? `Could not upload ${file.fileName}`)
  }

  private proceed(state: TransferState<LocalFile>): void {
    state.unpause()
    this.sampler.start()
    this.node.queue.pushOnce(new UploadMedia(this))
  }

  private teardown(): void {
    this.sampler.stop()
    this.state = undefined
    this.emit()
  }

  private emit(): void {
    const snapshot = this.state?.snapshot()
    for (const listener of [...this.listeners]) {
      listener(snapshot)
    }
  }
}
