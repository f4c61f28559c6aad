/**
 * Configuration resolution tests
 */

import { describe, it, expect } from 'vitest'
import { ErrorCode } from '@media-relay/shared/errors'
import { LogLevel } from '@media-relay/shared/logger'
import { loadConfigFromEnv, resolveConfig } from '../../src/core/config'
import { ConfigurationError } from '../../src/utils/error'

describe('resolveConfig', () => {
  it('fills in every default', () => {
    expect(resolveConfig({ mediaDir: '/media' })).toEqual({
      mediaDir: '/media',
      queue: { retries: 3, retryDelay: 1000 },
      transport: {
        port: 8000,
        connectTimeout: 10000,
        probeTimeout: 2000,
        keepAlive: true,
        chunkSize: 65536,
        reconnect: { maxRetries: 5, initialDelay: 500, maxDelay: 10000, factor: 2 },
      },
      transfer: { speedInterval: 500, tempPrefix: '_tmp.' },
      node: { statusInterval: 1000 },
    })
  })

  it('keeps explicit values', () => {
    const config = resolveConfig({
      mediaDir: '/media',
      queue: { retries: 0 },
      transport: { chunkSize: 1024, reconnect: { maxRetries: 1 } },
      logLevel: LogLevel.DEBUG,
    })

    expect(config.queue).toEqual({ retries: 0, retryDelay: 1000 })
    expect(config.transport.chunkSize).toBe(1024)
    expect(config.transport.reconnect.maxRetries).toBe(1)
    expect(config.transport.reconnect.factor).toBe(2)
    expect(config.logLevel).toBe(LogLevel.DEBUG)
  })

  it('names the offending field', () => {
    let caught: unknown
    try {
      resolveConfig({ mediaDir: '/media', transport: { port: 70000 } })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    expect(caught).toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      details: { field: 'transport.port', value: 70000 },
    })
  })

  it('requires a media directory', () => {
    expect(() => resolveConfig({ mediaDir: '' })).toThrow(
      'Invalid configuration: mediaDir: mediaDir is required'
    )
  })
})

describe('loadConfigFromEnv', () => {
  it('reads the directory, port and log level', () => {
    const config = loadConfigFromEnv(
      {},
      { MEDIA_RELAY_DIR: '/var/media', MEDIA_RELAY_PORT: '9100', LOG_LEVEL: 'WARN' }
    )

    expect(config.mediaDir).toBe('/var/media')
    expect(config.transport.port).toBe(9100)
    expect(config.logLevel).toBe(LogLevel.WARN)
  })

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfigFromEnv(
      { mediaDir: '/override', transport: { port: 9200 } },
      { MEDIA_RELAY_DIR: '/var/media', MEDIA_RELAY_PORT: '9100' }
    )

    expect(config.mediaDir).toBe('/override')
    expect(config.transport.port).toBe(9200)
  })

  it('ignores an unknown log level', () => {
    const config = loadConfigFromEnv({}, { MEDIA_RELAY_DIR: '/var/media', LOG_LEVEL: 'verbose' })

    expect(config.logLevel).toBeUndefined()
  })

  it('rejects a port that is not a number', () => {
    expect(() => loadConfigFromEnv({}, { MEDIA_RELAY_DIR: '/var/media', MEDIA_RELAY_PORT: 'http' })).toThrow(
      ConfigurationError
    )
  })
})
