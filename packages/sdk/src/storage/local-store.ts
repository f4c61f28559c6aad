/**
 * Local media store
 * Saved media sits in one directory under its own name; a file still being
 * written carries the temporary prefix until it is promoted.
 */

import { basename, join } from 'node:path'
import { copyFile, mkdir, open, rename, rm, stat, truncate } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { ErrorCode, systemErrorCode } from '@media-relay/shared/errors'
import type { LocalFile } from '@media-relay/shared/types'
import { DEFAULT_CONFIG } from '../core/constants'
import { FileOperationError, fileError } from '../utils/error'

export interface WriteTarget {
  handle: FileHandle
  path: string
  /** Where writing resumes; may be lower than the requested offset */
  offset: number
}

export class LocalMediaStore {
  constructor(
    readonly root: string,
    readonly tempPrefix: string = DEFAULT_CONFIG.TRANSFER.TEMP_PREFIX
  ) {}

  async ensureRoot(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true })
    } catch (error) {
      throw new FileOperationError(
        `Media directory ${this.root} is unavailable`,
        ErrorCode.DIRECTORY_UNAVAILABLE,
        { details: { path: this.root, operation: 'open', reason: systemErrorCode(error) }, cause: error }
      )
    }
  }

  tempPath(fileName: string): string {
    return join(this.root, `${this.tempPrefix}${fileName}`)
  }

  finalPath(fileName: string): string {
    return join(this.root, fileName)
  }

  isTemporary(path: string): boolean {
    return basename(path).startsWith(this.tempPrefix)
  }

  /**
   * File name without the temporary prefix
   */
  displayName(path: string): string {
    const name = basename(path)
    return name.startsWith(this.tempPrefix) ? name.slice(this.tempPrefix.length) : name
  }

  isSaved(fileName: string): Promise<boolean> {
    return this.exists(this.finalPath(fileName))
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path)
      return true
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') {
        return false
      }
      throw fileError(error, path, 'stat')
    }
  }

  async size(path: string): Promise<number> {
    try {
      const stats = await stat(path)
      return stats.size
    } catch (error) {
      throw fileError(error, path, 'stat')
    }
  }

  /**
   * Describe a local copy as an upload source
   */
  async describe(path: string): Promise<LocalFile> {
    return {
      path,
      fileName: this.displayName(path),
      size: await this.size(path),
      temporary: this.isTemporary(path),
    }
  }

  /**
   * Open the temp file for `fileName` so writing continues at `offset`.
   * Offset 0 truncates. A longer file is cut back to `offset`; a shorter
   * one resumes at its actual length.
   */
  async openForWrite(fileName: string, offset: number): Promise<WriteTarget> {
    const path = this.tempPath(fileName)
    try {
      let resumeAt = 0
      if (offset > 0 && (await this.exists(path))) {
        const onDisk = await this.size(path)
        if (onDisk > offset) {
          await truncate(path, offset)
        }
        resumeAt = Math.min(onDisk, offset)
      }
      const handle = await open(path, resumeAt === 0 ? 'w' : 'a')
      return { handle, path, offset: resumeAt }
    } catch (error) {
      throw fileError(error, path, 'open')
    }
  }

  /**
   * Rename the finished temp file to its final name
   */
  async promote(fileName: string): Promise<string> {
    const from = this.tempPath(fileName)
    const to = this.finalPath(fileName)
    try {
      await rename(from, to)
      return to
    } catch (error) {
      throw fileError(error, from, 'move')
    }
  }

  async remove(path: string): Promise<void> {
    try {
      await rm(path, { force: true })
    } catch (error) {
      throw fileError(error, path, 'delete')
    }
  }

  /**
   * Duplicate a local copy under the final name of `fileName`
   */
  async copyToFinal(path: string, fileName: string): Promise<string> {
    const to = this.finalPath(fileName)
    try {
      await copyFile(path, to)
      return to
    } catch (error) {
      throw fileError(error, path, 'copy')
    }
  }
}
