/**
 * Command Queue Executor
 * Runs queued commands one at a time while enabled, retrying retryable
 * failures a bounded number of times after a fixed delay.
 */

import type { Alert } from '@media-relay/shared/errors'
import type { Logger } from '@media-relay/shared/logger'
import { DEFAULT_CONFIG } from '../core/constants'
import type { MetricsCollector } from '../monitoring/metrics'
import { componentLogger } from '../utils/logger'
import { commandName, type Command, type CommandResult } from './command'

/**
 * Collaborator responsible for displaying terminal failures
 */
export interface AlertReporter {
  report(alert: Alert): void
}

export interface ExecutorOptions {
  /** Identifies the queue in logs */
  name?: string
  retries?: number
  retryDelay?: number
  enabled?: boolean
  reporter?: AlertReporter
  metrics?: MetricsCollector
  logger?: Logger
}

export const UNDEFINED_ERROR: Alert = Object.freeze({
  title: 'Unexpected Error Occurred',
  message: 'An error occurred during execution due to an undefined error message!',
})

export class CommandQueueExecutor {
  private readonly queue: Command[] = []
  private readonly retries: number
  private readonly retryDelay: number
  private readonly reporter?: AlertReporter
  private readonly metrics?: MetricsCollector
  private readonly logger: Logger
  private enabled: boolean
  private executing = false
  private retryTimer?: NodeJS.Timeout
  private failedCommand?: Command
  private failedAttempts = 0
  private generation = 0
  private idleWaiters: Array<() => void> = []

  constructor(options: ExecutorOptions = {}) {
    this.retries = options.retries ?? DEFAULT_CONFIG.QUEUE.RETRIES
    this.retryDelay = options.retryDelay ?? DEFAULT_CONFIG.QUEUE.RETRY_DELAY
    this.enabled = options.enabled ?? false
    this.reporter = options.reporter
    this.metrics = options.metrics
    this.logger = componentLogger(options.name ?? 'executor', options.logger)
  }

  get size(): number {
    return this.queue.length
  }

  get isEnabled(): boolean {
    return this.enabled
  }

  get isExecuting(): boolean {
    return this.executing
  }

  /**
   * Nothing executing, nothing waiting to retry, nothing runnable queued
   */
  get isIdle(): boolean {
    return (
      !this.executing &&
      this.retryTimer === undefined &&
      (this.queue.length === 0 || !this.enabled)
    )
  }

  push(command: Command): void {
    this.queue.push(command)
    this.dispatch()
  }

  /**
   * Push unless a command of the same kind is already queued
   */
  pushOnce(command: Command): boolean {
    if (this.queue.some(queued => queued.constructor === command.constructor)) {
      return false
    }
    this.push(command)
    return true
  }

  prepend(command: Command): void {
    this.queue.unshift(command)
    this.dispatch()
  }

  setEnabled(enabled: boolean): void {
    if (this.enabled === enabled) {
      return
    }
    this.enabled = enabled
    this.logger.debug(enabled ? 'Queue enabled' : 'Queue disabled', { queued: this.queue.length })
    this.dispatch()
  }

  /**
   * Drop everything queued, including a pending retry. A command that is
   * executing right now finishes but is not requeued.
   */
  clear(): void {
    this.generation++
    this.queue.length = 0
    if (this.retryTimer !== undefined) {
      clearTimeout(this.retryTimer)
      this.retryTimer = undefined
    }
    this.failedCommand = undefined
    this.failedAttempts = 0
    this.dispatch()
  }

  /**
   * Resolves once the queue has nothing left it can run
   */
  whenIdle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve()
    }
    return new Promise(resolve => this.idleWaiters.push(resolve))
  }

  private dispatch(): void {
    if (this.executing || this.retryTimer !== undefined) {
      return
    }
    if (!this.enabled || this.queue.length === 0) {
      this.notifyIdle()
      return
    }
    this.processNext().catch(error => {
      this.executing = false
      this.logger.error('Command queue stalled', error)
    })
  }

  private async processNext(): Promise<void> {
    const command = this.queue.shift()
    if (!command) {
      return
    }

    const generation = this.generation
    const name = commandName(command)
    this.executing = true
    const result = await this.run(command)
    this.executing = false
    this.metrics?.recordCommand()

    // Cleared while running: the result no longer matters
    if (generation !== this.generation) {
      this.dispatch()
      return
    }

    // Disabled while running: run it again once re-enabled
    if (!this.enabled) {
      this.queue.unshift(command)
      this.dispatch()
      return
    }

    if (result.success) {
      this.resetFailures()
      this.dispatch()
      return
    }

    if (this.failedCommand !== command) {
      this.failedCommand = command
      this.failedAttempts = 0
    }
    this.failedAttempts++

    if (!result.retryable || this.failedAttempts > this.retries) {
      this.logger.warn('Command failed', {
        command: name,
        attempts: this.failedAttempts,
        retryable: result.retryable,
        error: result.error?.message,
      })
      this.resetFailures()
      this.metrics?.recordFailure(name)
      this.reporter?.report(result.error ?? UNDEFINED_ERROR)
      if (result.retryable) {
        command.onRetriesExhausted?.()
      }
      this.dispatch()
      return
    }

    this.logger.info('Retrying command', {
      command: name,
      attempt: this.failedAttempts,
      delay: this.retryDelay,
    })
    this.metrics?.recordRetry(name)
    this.queue.unshift(command)
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined
      this.dispatch()
    }, this.retryDelay)
  }

  /**
   * A rejected execute is a non-retryable failure
   */
  private async run(command: Command): Promise<CommandResult> {
    try {
      return await command.execute()
    } catch (error) {
      this.logger.error('Command threw', error, { command: commandName(command) })
      return {
        success: false,
        retryable: false,
        error: error instanceof Error ? { ...UNDEFINED_ERROR, message: error.message } : undefined,
      }
    }
  }

  private resetFailures(): void {
    this.failedCommand = undefined
    this.failedAttempts = 0
  }

  private notifyIdle(): void {
    if (!this.isIdle || this.idleWaiters.length === 0) {
      return
    }
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }
}
