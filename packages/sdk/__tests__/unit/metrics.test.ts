/**
 * MetricsCollector unit tests
 */

import { describe, it, expect } from 'vitest'
import { MetricsCollector, formatBytes } from '../../src/monitoring/metrics'

describe('MetricsCollector', () => {
  it('counts retries and failures per command kind', () => {
    const metrics = new MetricsCollector()

    metrics.recordRetry('DownloadMedia')
    metrics.recordRetry('DownloadMedia')
    metrics.recordRetry('UploadMedia')
    metrics.recordFailure('UploadMedia')

    expect(metrics.getRetryCount('DownloadMedia')).toBe(2)
    expect(metrics.getRetryCount('StartUpload')).toBe(0)
    expect(metrics.getDetailedMetrics()).toMatchObject({
      retries: { DownloadMedia: 2, UploadMedia: 1 },
      failures: { UploadMedia: 1 },
      summary: { commandRetries: 3, commandFailures: 1 },
    })
  })

  it('totals completed files per leg', () => {
    const metrics = new MetricsCollector()

    metrics.recordTransfer('download', 100)
    metrics.recordTransfer('download', 50)
    metrics.recordTransfer('upload', 100)

    expect(metrics.getMetrics()).toMatchObject({
      filesDownloaded: 2,
      bytesDownloaded: 150,
      filesUploaded: 1,
      bytesUploaded: 100,
    })
  })

  it('tracks active and lost connections', () => {
    const metrics = new MetricsCollector()

    metrics.recordConnection()
    metrics.recordConnectionClosed(true)
    metrics.recordConnection()
    metrics.recordConnectionClosed(false)
    metrics.recordConnectionClosed(false)

    expect(metrics.getMetrics()).toMatchObject({
      connectionsCreated: 2,
      connectionsActive: 0,
      connectionsLost: 1,
    })
  })

  it('clears everything on reset', () => {
    const metrics = new MetricsCollector()
    metrics.recordCommand()
    metrics.recordRetry('DownloadMedia')

    metrics.reset()

    expect(metrics.getMetrics().commandsExecuted).toBe(0)
    expect(metrics.getDetailedMetrics().retries).toEqual({})
  })

  it('summarises in readable units', () => {
    const metrics = new MetricsCollector()
    metrics.recordTransfer('download', 2048)

    expect(metrics.getSummary()).toContain('Downloaded: 1 files, 2.00 KB')
  })
})

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(0)).toBe('0 B')
    expect(formatBytes(512)).toBe('512.00 B')
    expect(formatBytes(1536)).toBe('1.50 KB')
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MB')
  })
})
