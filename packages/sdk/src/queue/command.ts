/**
 * Command contract
 * A unit of work with a single `execute` operation. Commands never throw
 * past their result: every failure is carried in the three-part outcome.
 */

import { toRelayError, type Alert } from '@media-relay/shared/errors'

export interface CommandResult {
  success: boolean
  /** Worth another attempt; ignored when `success` is true */
  retryable: boolean
  error?: Alert
}

export interface Command {
  execute(): Promise<CommandResult>
  /** Called once when the executor gives up after the last retry */
  onRetriesExhausted?(): void
}

export const COMMAND_SUCCESS: CommandResult = Object.freeze({ success: true, retryable: false })

export function commandSuccess(): CommandResult {
  return COMMAND_SUCCESS
}

/**
 * Turn any thrown value into a failed result, retryable only for connectivity errors
 */
export function commandFailure(error: unknown, title: string): CommandResult {
  const relayError = toRelayError(error)
  return { success: false, retryable: relayError.retryable, error: relayError.toAlert(title) }
}

/**
 * Failure with an explicit description
 */
export function commandError(title: string, message: string, retryable = false): CommandResult {
  return { success: false, retryable, error: { title, message } }
}

/**
 * Name used in logs and metrics
 */
export function commandName(command: Command): string {
  return command.constructor.name
}
