/**
 * Metrics Collection
 * Tracks connections, transfers, command retries and failures
 */

import type { TransferLegKind } from '@media-relay/shared/types'

export interface RelayMetrics {
  connectionsCreated: number
  connectionsActive: number
  connectionsLost: number
  filesDownloaded: number
  bytesDownloaded: number
  filesUploaded: number
  bytesUploaded: number
  commandsExecuted: number
  commandRetries: number
  commandFailures: number
  errors: number
  startTime: number
  uptime: number
}

export interface DetailedMetrics {
  retries: Record<string, number>
  failures: Record<string, number>
  summary: RelayMetrics
}

/**
 * Metrics collector, injected into every component that reports
 */
export class MetricsCollector {
  private metrics: RelayMetrics
  private retryCounts: Map<string, number> = new Map()
  private failureCounts: Map<string, number> = new Map()
  private startTime: number

  constructor() {
    this.startTime = Date.now()
    this.metrics = this.createEmptyMetrics()
  }

  private createEmptyMetrics(): RelayMetrics {
    return {
      connectionsCreated: 0,
      connectionsActive: 0,
      connectionsLost: 0,
      filesDownloaded: 0,
      bytesDownloaded: 0,
      filesUploaded: 0,
      bytesUploaded: 0,
      commandsExecuted: 0,
      commandRetries: 0,
      commandFailures: 0,
      errors: 0,
      startTime: this.startTime,
      uptime: 0,
    }
  }

  /**
   * Record one command execution, whatever its outcome
   */
  recordCommand(): void {
    this.metrics.commandsExecuted++
  }

  /**
   * Record a retry scheduled for a command
   */
  recordRetry(commandName: string): void {
    this.metrics.commandRetries++
    increment(this.retryCounts, commandName)
  }

  /**
   * Record a command dropped after its final failure
   */
  recordFailure(commandName: string): void {
    this.metrics.commandFailures++
    increment(this.failureCounts, commandName)
  }

  /**
   * Record a completed file on one leg
   */
  recordTransfer(leg: TransferLegKind, size: number): void {
    if (leg === 'download') {
      this.metrics.filesDownloaded++
      this.metrics.bytesDownloaded += size
    } else {
      this.metrics.filesUploaded++
      this.metrics.bytesUploaded += size
    }
  }

  /**
   * Record connection creation
   */
  recordConnection(): void {
    this.metrics.connectionsCreated++
    this.metrics.connectionsActive++
  }

  /**
   * Record connection closure
   */
  recordConnectionClosed(unexpected: boolean): void {
    this.metrics.connectionsActive = Math.max(0, this.metrics.connectionsActive - 1)
    if (unexpected) {
      this.metrics.connectionsLost++
    }
  }

  /**
   * Record error
   */
  recordError(): void {
    this.metrics.errors++
  }

  /**
   * Retries recorded for one command kind
   */
  getRetryCount(commandName: string): number {
    return this.retryCounts.get(commandName) ?? 0
  }

  /**
   * Get basic metrics
   */
  getMetrics(): RelayMetrics {
    const uptime = Date.now() - this.startTime
    return { ...this.metrics, uptime }
  }

  /**
   * Get detailed metrics
   */
  getDetailedMetrics(): DetailedMetrics {
    return {
      retries: Object.fromEntries(this.retryCounts),
      failures: Object.fromEntries(this.failureCounts),
      summary: this.getMetrics(),
    }
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.startTime = Date.now()
    this.metrics = this.createEmptyMetrics()
    this.retryCounts.clear()
    this.failureCounts.clear()
  }

  /**
   * Get performance summary
   */
  getSummary(): string {
    const metrics = this.getMetrics()
    const uptime = Math.floor(metrics.uptime / 1000) // Convert to seconds

    const lines = [
      '=== Media Relay Summary ===',
      `Uptime: ${uptime}s`,
      `Connections: ${metrics.connectionsCreated} created, ${metrics.connectionsActive} active, ${metrics.connectionsLost} lost`,
      `Downloaded: ${metrics.filesDownloaded} files, ${formatBytes(metrics.bytesDownloaded)}`,
      `Uploaded: ${metrics.filesUploaded} files, ${formatBytes(metrics.bytesUploaded)}`,
      `Commands: ${metrics.commandsExecuted} executed, ${metrics.commandRetries} retries, ${metrics.commandFailures} failed`,
      `Errors: ${metrics.errors}`,
    ]

    return lines.join('\n')
  }
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1)
}

/**
 * Format bytes
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
  return `${(bytes / k ** i).toFixed(2)} ${sizes[i]}`
}
