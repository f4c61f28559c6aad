/**
 * Cross-leg links. Each leg sees the other only through these.
 */

import type { LocalFile } from '@media-relay/shared/types'

export interface DownloadLinks {
  /** Downloads that will never complete; their upload waiters must go */
  downloadCancelledFor(fileNames: string[]): void
  /** A download finished and its local copy can be uploaded */
  readyToUpload(file: LocalFile): void
  /** Local copy already queued on the upload leg, if any */
  localCopy(fileName: string): LocalFile | undefined
}

export interface UploadLinks {
  /** Uploads that will never happen; hand-off downloads for them can go */
  uploadCancelledFor(fileNames: string[]): void
}

export interface StartUploadOptions {
  /** Lift a user pause as well as a force pause */
  startIfUserPaused?: boolean
}
