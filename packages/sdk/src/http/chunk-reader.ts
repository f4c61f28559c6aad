/**
 * Pull-based reader over a socket's incoming chunks
 */

import type { Readable } from 'node:stream'
import { ErrorCode } from '@media-relay/shared/errors'
import { ConnectionError, TransferCancelledError } from '../utils/error'

interface PendingRead {
  resolve: (chunk: Buffer | null) => void
  reject: (error: Error) => void
}

export class ChunkReader {
  private readonly chunks: Buffer[] = []
  private pending?: PendingRead
  private ended = false
  private failure?: Error

  constructor(source: Readable) {
    source.on('data', (chunk: Buffer | string) => {
      this.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    })
    source.on('end', () => this.finish())
    source.on('close', () => this.finish())
    source.on('error', (error: Error) => this.fail(error))
  }

  get isEnded(): boolean {
    return this.ended
  }

  /**
   * Next chunk, or null once the peer has finished sending
   */
  read(signal?: AbortSignal): Promise<Buffer | null> {
    const chunk = this.chunks.shift()
    if (chunk) {
      return Promise.resolve(chunk)
    }
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.ended) {
      return Promise.resolve(null)
    }
    if (signal?.aborted) {
      return Promise.reject(new TransferCancelledError('Read was cancelled.'))
    }
    if (this.pending) {
      return Promise.reject(
        new ConnectionError('Concurrent reads on one connection', ErrorCode.CONNECTION_FAILED)
      )
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.pending = undefined
        reject(new TransferCancelledError('Read was cancelled.'))
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.pending = {
        resolve: value => {
          signal?.removeEventListener('abort', onAbort)
          resolve(value)
        },
        reject: error => {
          signal?.removeEventListener('abort', onAbort)
          reject(error)
        },
      }
    })
  }

  /**
   * Drop anything buffered from a previous exchange
   */
  discard(): void {
    this.chunks.length = 0
  }

  private push(chunk: Buffer): void {
    if (chunk.length === 0) {
      return
    }
    const pending = this.takePending()
    if (pending) {
      pending.resolve(chunk)
    } else {
      this.chunks.push(chunk)
    }
  }

  private finish(): void {
    this.ended = true
    this.takePending()?.resolve(null)
  }

  private fail(error: Error): void {
    this.failure = error
    this.takePending()?.reject(error)
  }

  private takePending(): PendingRead | undefined {
    const pending = this.pending
    this.pending = undefined
    return pending
  }
}
