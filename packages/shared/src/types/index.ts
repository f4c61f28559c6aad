/**
 * Shared types for media-relay
 *
 * This module exports all type definitions used across packages,
 * ensuring type consistency and single source of truth.
 */

// Media descriptors
export type { MediaFile, WaitingFile, LocalFile } from './media'

// Transfer state
export type {
  TransferLegKind,
  PauseReason,
  TransferSnapshot,
  TransferListener,
} from './transfer'

// Wire types
export type { HttpMethod, HttpRequest, HttpResponse, Endpoint } from './http'
export { ConnectionState } from './http'
