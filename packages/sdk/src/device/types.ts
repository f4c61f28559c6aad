/**
 * Removable-storage device boundary
 * The vendor binding lives behind this interface; the download leg is its only consumer.
 */

import type { MediaFile } from '@media-relay/shared/types'

export interface MediaDevice {
  isConnected(): boolean

  /**
   * Stream a file's bytes starting at `offset`. The iterator ends after the
   * last byte, throws on a device failure and stops once `signal` aborts.
   */
  readFile(file: MediaFile, offset: number, signal: AbortSignal): AsyncIterable<Uint8Array>
}
