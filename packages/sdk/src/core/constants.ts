/**
 * Global constants for media-relay
 */

export const DEFAULT_CONFIG = {
  /** Command queue settings */
  QUEUE: {
    RETRIES: 3,
    RETRY_DELAY: 1000, // 1 second, fixed
  },

  /** Persistent connection settings */
  TRANSPORT: {
    PORT: 8000,
    CONNECT_TIMEOUT: 10000, // long-lived connection
    PROBE_TIMEOUT: 2000, // candidate address probing
    KEEP_ALIVE: true,
    CHUNK_SIZE: 64 * 1024, // 64 KiB streaming chunks
    RECONNECT: {
      MAX_RETRIES: 5,
      INITIAL_DELAY: 500,
      MAX_DELAY: 10000,
      FACTOR: 2,
    },
  },

  /** Transfer settings */
  TRANSFER: {
    SPEED_INTERVAL: 500, // speed sampling period in ms
    TEMP_PREFIX: '_tmp.',
  },

  /** Processing-server polling */
  NODE: {
    STATUS_INTERVAL: 1000,
  },
} as const

export const NODE_ENDPOINTS = {
  /** Node endpoints */
  NODE: {
    CONNECT_USER: '/node/connectuser',
    STATUS: '/node/status',
  },

  /** Project endpoints */
  PROJECT: {
    LIST: '/project/list',
    COMMAND: '/project/command',
    DOWNLOAD: '/project/download',
  },
} as const

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const

/** Alert titles used by transfer and server commands */
export const ALERT_TITLES = {
  DOWNLOAD: 'Error Downloading Media',
  FILES_SKIPPED: 'Files Skipped',
  START_UPLOAD: 'Error Starting Media Upload',
  UPLOAD: 'Error Uploading Media',
  NODE_STATUS: 'Error Fetching Server Status',
  PROJECT_LIST: 'Error Fetching Project Files',
  PROJECT_DOWNLOAD: 'Error Downloading Project File',
} as const
