/**
 * Transfer state shared by both legs
 *
 * Membership lives in insertion-ordered maps keyed by file name. Every
 * aggregate is derived from the maps plus the completed counters, so a
 * mutation can never leave totals out of step with the sets.
 */

import type {
  PauseReason,
  TransferLegKind,
  TransferSnapshot,
  WaitingFile,
} from '@media-relay/shared/types'
import { createTraceContext, type TraceContext } from '@media-relay/shared/logger'

export interface SizedFile {
  fileName: string
  size: number
}

/**
 * The file actively streaming and the bytes committed for it
 */
export interface TransferCursor<T extends SizedFile> {
  item: T
  offset: number
}

export type StateListener = () => void

const FORCED_REASONS: ReadonlySet<PauseReason> = new Set<PauseReason>([
  'dependency',
  'device',
  'connection',
])

export class TransferState<T extends SizedFile> {
  readonly trace: TraceContext
  private readonly pendingItems = new Map<string, T>()
  private readonly waitingItems = new Map<string, WaitingFile>()
  private current?: TransferCursor<T>
  private completedBytes = 0
  private completedFiles = 0
  private reason?: PauseReason
  private sampledSpeed = 0

  constructor(
    readonly leg: TransferLegKind,
    private readonly listener?: StateListener
  ) {
    this.trace = createTraceContext(`${leg}-session`)
  }

  get pending(): T[] {
    return [...this.pendingItems.values()]
  }

  get waiting(): WaitingFile[] {
    return [...this.waitingItems.values()]
  }

  get cursor(): Readonly<TransferCursor<T>> | undefined {
    return this.current
  }

  get pausedReason(): PauseReason | undefined {
    return this.reason
  }

  get paused(): boolean {
    return this.reason !== undefined
  }

  /** Paused by the system; only the blocking condition lifts it */
  get forcePaused(): boolean {
    return this.reason !== undefined && FORCED_REASONS.has(this.reason)
  }

  get isEmpty(): boolean {
    return this.pendingItems.size === 0 && this.waitingItems.size === 0
  }

  get transferredBytes(): number {
    return this.completedBytes + (this.current?.offset ?? 0)
  }

  get transferredFiles(): number {
    return this.completedFiles
  }

  get totalBytes(): number {
    return this.completedBytes + sumSizes(this.pendingItems.values()) + sumSizes(this.waitingItems.values())
  }

  get totalFiles(): number {
    return this.completedFiles + this.pendingItems.size + this.waitingItems.size
  }

  /** Bytes still to move, the cursor's committed offset excluded */
  get remainingBytes(): number {
    return (
      sumSizes(this.pendingItems.values()) +
      sumSizes(this.waitingItems.values()) -
      (this.current?.offset ?? 0)
    )
  }

  get speed(): number {
    return this.sampledSpeed
  }

  get percentComplete(): number {
    const total = this.totalBytes
    return total === 0 ? 0 : Math.min(100, (this.transferredBytes / total) * 100)
  }

  has(fileName: string): boolean {
    return this.pendingItems.has(fileName)
  }

  get(fileName: string): T | undefined {
    return this.pendingItems.get(fileName)
  }

  isWaiting(fileName: string): boolean {
    return this.waitingItems.has(fileName)
  }

  /**
   * Add files not already pending; returns the ones that entered the set
   */
  add(items: Iterable<T>): T[] {
    const added: T[] = []
    for (const item of items) {
      if (!this.pendingItems.has(item.fileName)) {
        this.pendingItems.set(item.fileName, item)
        added.push(item)
      }
    }
    this.changed(added.length > 0)
    return added
  }

  /**
   * Drop pending files. Dropping the cursor's file discards its offset.
   */
  remove(fileNames: Iterable<string>): T[] {
    const removed: T[] = []
    for (const fileName of fileNames) {
      const item = this.pendingItems.get(fileName)
      if (item) {
        this.pendingItems.delete(fileName)
        removed.push(item)
        if (this.current?.item.fileName === fileName) {
          this.current = undefined
        }
      }
    }
    this.changed(removed.length > 0)
    return removed
  }

  addWaiting(items: Iterable<WaitingFile>): WaitingFile[] {
    const added: WaitingFile[] = []
    for (const item of items) {
      if (!this.waitingItems.has(item.fileName) && !this.pendingItems.has(item.fileName)) {
        this.waitingItems.set(item.fileName, { fileName: item.fileName, size: item.size })
        added.push(item)
      }
    }
    this.changed(added.length > 0)
    return added
  }

  removeWaiting(fileNames: Iterable<string>): WaitingFile[] {
    const removed: WaitingFile[] = []
    for (const fileName of fileNames) {
      const item = this.waitingItems.get(fileName)
      if (item) {
        this.waitingItems.delete(fileName)
        removed.push(item)
      }
    }
    this.changed(removed.length > 0)
    return removed
  }

  /**
   * The cursor, positioned on the first pending file when none is set
   */
  select(): Readonly<TransferCursor<T>> | undefined {
    if (!this.current) {
      const first = this.pendingItems.values().next()
      if (first.done) {
        return undefined
      }
      this.current = { item: first.value, offset: 0 }
      this.changed(true)
    }
    return this.current
  }

  /**
   * Commit bytes for the cursor's file
   */
  advance(bytes: number): void {
    if (!this.current || bytes <= 0) {
      return
    }
    this.current.offset = Math.min(this.current.item.size, this.current.offset + bytes)
    this.changed(true)
  }

  /**
   * Move the cursor back to a resumable offset
   */
  rewind(offset: number): void {
    if (!this.current) {
      return
    }
    const next = Math.max(0, Math.min(offset, this.current.item.size))
    if (next !== this.current.offset) {
      this.current.offset = next
      this.changed(true)
    }
  }

  /**
   * Mark the cursor's file done and clear the cursor
   */
  complete(): T | undefined {
    const cursor = this.current
    if (!cursor) {
      return undefined
    }
    this.current = undefined
    this.pendingItems.delete(cursor.item.fileName)
    this.completedBytes += cursor.item.size
    this.completedFiles++
    this.changed(true)
    return cursor.item
  }

  pause(reason: PauseReason): void {
    if (this.reason === reason) {
      return
    }
    this.reason = reason
    this.sampledSpeed = 0
    this.changed(true)
  }

  unpause(): void {
    if (this.reason === undefined) {
      return
    }
    this.reason = undefined
    this.changed(true)
  }

  setSpeed(bytesPerSecond: number): void {
    if (bytesPerSecond !== this.sampledSpeed) {
      this.sampledSpeed = bytesPerSecond
      this.changed(true)
    }
  }

  snapshot(): TransferSnapshot {
    return {
      leg: this.leg,
      pending: [...this.pendingItems.keys()],
      waiting: [...this.waitingItems.keys()],
      current: this.current?.item.fileName,
      currentOffset: this.current?.offset ?? 0,
      paused: this.paused,
      forcePaused: this.forcePaused,
      pausedReason: this.reason,
      totalBytes: this.totalBytes,
      totalFiles: this.totalFiles,
      transferredBytes: this.transferredBytes,
      transferredFiles: this.transferredFiles,
      speed: this.sampledSpeed,
      percentComplete: this.percentComplete,
    }
  }

  private changed(didChange: boolean): void {
    if (didChange) {
      this.listener?.()
    }
  }
}

function sumSizes(items: Iterable<SizedFile>): number {
  let total = 0
  for (const item of items) {
    total += item.size
  }
  return total
}
