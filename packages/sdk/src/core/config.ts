/**
 * Configuration schema and loading
 */

import { z } from 'zod'
import { LogLevel } from '@media-relay/shared/logger'
import { ConfigurationError } from '../utils/error'
import { DEFAULT_CONFIG } from './constants'

const { QUEUE, TRANSPORT, TRANSFER, NODE } = DEFAULT_CONFIG

const reconnectSchema = z.object({
  maxRetries: z.number().int().min(0).default(TRANSPORT.RECONNECT.MAX_RETRIES),
  initialDelay: z.number().int().min(0).default(TRANSPORT.RECONNECT.INITIAL_DELAY),
  maxDelay: z.number().int().min(0).default(TRANSPORT.RECONNECT.MAX_DELAY),
  factor: z.number().min(1).default(TRANSPORT.RECONNECT.FACTOR),
})

export const mediaRelayConfigSchema = z.object({
  mediaDir: z.string().min(1, 'mediaDir is required'),
  queue: z
    .object({
      retries: z.number().int().min(0).default(QUEUE.RETRIES),
      retryDelay: z.number().int().min(0).default(QUEUE.RETRY_DELAY),
    })
    .default({}),
  transport: z
    .object({
      port: z.number().int().min(1).max(65535).default(TRANSPORT.PORT),
      connectTimeout: z.number().int().positive().default(TRANSPORT.CONNECT_TIMEOUT),
      probeTimeout: z.number().int().positive().default(TRANSPORT.PROBE_TIMEOUT),
      keepAlive: z.boolean().default(TRANSPORT.KEEP_ALIVE),
      chunkSize: z.number().int().positive().default(TRANSPORT.CHUNK_SIZE),
      reconnect: reconnectSchema.default({}),
    })
    .default({}),
  transfer: z
    .object({
      speedInterval: z.number().int().positive().default(TRANSFER.SPEED_INTERVAL),
      tempPrefix: z.string().min(1).default(TRANSFER.TEMP_PREFIX),
    })
    .default({}),
  node: z
    .object({
      statusInterval: z.number().int().positive().default(NODE.STATUS_INTERVAL),
    })
    .default({}),
  logLevel: z.nativeEnum(LogLevel).optional(),
})

/** What callers pass; everything but `mediaDir` has a default */
export type MediaRelayOptions = z.input<typeof mediaRelayConfigSchema>

export type MediaRelayConfig = z.output<typeof mediaRelayConfigSchema>

/**
 * Validate options and fill in defaults
 *
 * @throws {ConfigurationError} naming the first offending field
 */
export function resolveConfig(options: MediaRelayOptions): MediaRelayConfig {
  const result = mediaRelayConfigSchema.safeParse(options)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.') ?? ''
    const constraint = issue?.message ?? 'invalid'
    throw new ConfigurationError(`Invalid configuration: ${field || 'options'}: ${constraint}`, {
      field,
      value: readPath(options, issue?.path ?? []),
      constraint,
    })
  }
  return result.data
}

/**
 * Options from MEDIA_RELAY_DIR, MEDIA_RELAY_PORT and LOG_LEVEL, with
 * explicit overrides taking precedence
 */
export function loadConfigFromEnv(
  overrides: Partial<MediaRelayOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): MediaRelayConfig {
  const port = env.MEDIA_RELAY_PORT
  const level = env.LOG_LEVEL?.trim().toLowerCase()
  const logLevel = Object.values(LogLevel).find(value => value === level)
  return resolveConfig({
    mediaDir: env.MEDIA_RELAY_DIR ?? '',
    ...(logLevel ? { logLevel } : {}),
    ...overrides,
    transport: {
      ...(port !== undefined ? { port: Number(port) } : {}),
      ...overrides.transport,
    },
  })
}

function readPath(value: unknown, path: Array<string | number>): unknown {
  let current = value
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined
    }
    current = Reflect.get(current, key)
  }
  return current
}
