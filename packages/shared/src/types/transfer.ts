/**
 * Transfer state types shared by the download and upload legs
 */

export type TransferLegKind = 'download' | 'upload'

/**
 * Why a leg is not moving. `dependency`, `device` and `connection` are
 * force pauses cleared by the system; the others are lifted by `resume()`.
 * `storage` and `failed` hold the set after a local write failure or after
 * the retries for one file ran out.
 */
export type PauseReason = 'user' | 'dependency' | 'device' | 'connection' | 'storage' | 'failed'

/**
 * Read-only view of one leg for UI consumers
 */
export interface TransferSnapshot {
  leg: TransferLegKind
  pending: string[]
  waiting: string[]
  current?: string
  currentOffset: number
  paused: boolean
  forcePaused: boolean
  pausedReason?: PauseReason
  totalBytes: number
  totalFiles: number
  transferredBytes: number
  transferredFiles: number
  /** Bytes per second, sampled periodically */
  speed: number
  percentComplete: number
}

export type TransferListener = (snapshot: TransferSnapshot | undefined) => void
