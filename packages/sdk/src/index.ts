/**
 * Media Relay SDK - Main Entry Point
 * Command queue, persistent HTTP transport and dependency-aware media transfers
 */

export const VERSION = '0.1.0'

// Facade and configuration
export { MediaRelay, type MediaRelayDependencies } from './core/media-relay'
export {
  mediaRelayConfigSchema,
  resolveConfig,
  loadConfigFromEnv,
  type MediaRelayConfig,
  type MediaRelayOptions,
} from './core/config'
export { DEFAULT_CONFIG, NODE_ENDPOINTS, HTTP_STATUS, ALERT_TITLES } from './core/constants'

// Command queue
export {
  COMMAND_SUCCESS,
  commandSuccess,
  commandFailure,
  commandError,
  commandName,
  type Command,
  type CommandResult,
} from './queue/command'
export {
  CommandQueueExecutor,
  UNDEFINED_ERROR,
  type AlertReporter,
  type ExecutorOptions,
} from './queue/executor'

// Transport
export { HttpConnection, tcpConnector } from './http/connection'
export { ParsedResponse, parseHttpResponse, parseContentLength } from './http/parser'
export { encodeRequest, encodeRequestHead, withQuery } from './http/request'
export type {
  ConnectOptions,
  Connector,
  ConnectionObserver,
  HttpConnectionOptions,
  UploadOptions,
  DownloadOptions,
} from './http/types'

// Transfers
export { TransferState, type TransferCursor } from './transfer/state'
export { TransferCoordinator, type TransferCoordinatorOptions } from './transfer/coordinator'
export { DownloadLeg, type DownloadRequestOptions } from './transfer/download-leg'
export { UploadLeg } from './transfer/upload-leg'
export {
  StartDownload,
  DownloadMedia,
  DropHandOffs,
  StopDownload,
  StartUpload,
  UploadMedia,
  StopUpload,
} from './transfer/commands'
export { SpeedSampler } from './transfer/speed'

// Device, storage and processing server
export type { MediaDevice } from './device/types'
export { LocalMediaStore } from './storage/local-store'
export { NodeClient, type NodeClientOptions, type ProjectState } from './node/client'
export { NodeCommand, type NodeExchange } from './node/command'
export {
  GetNodeStatus,
  ListProjectFiles,
  DownloadProjectFile,
  type NodeStatus,
} from './node/commands'

// Errors, logging, metrics
export {
  ConnectionError,
  ProtocolError,
  FileOperationError,
  TransferCancelledError,
  ConfigurationError,
  ErrorCode,
  RelayError,
  isRelayError,
  toRelayError,
} from './utils/error'
export { logger } from './utils/logger'
export { withRetry, type RetryOptions } from './utils/retry'
export { MetricsCollector, formatBytes, type RelayMetrics } from './monitoring/metrics'

// Shared types
export {
  ConnectionState,
  type Endpoint,
  type HttpMethod,
  type HttpRequest,
  type LocalFile,
  type MediaFile,
  type PauseReason,
  type TransferSnapshot,
  type WaitingFile,
} from '@media-relay/shared/types'
