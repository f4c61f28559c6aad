/**
 * Base command for one request/response exchange with the processing server
 */

import { z } from 'zod'
import type { HttpMethod, HttpRequest } from '@media-relay/shared/types'
import { HTTP_STATUS } from '../core/constants'
import { parseHttpResponse, type ParsedResponse } from '../http/parser'
import { commandError, commandFailure, type Command, type CommandResult } from '../queue/command'
import type { NodeClient } from './client'

export interface NodeExchange<T> {
  path: string
  method: HttpMethod
  body?: string | Uint8Array
  /** Shape the response body must have */
  expect: z.ZodType<T>
  acceptStatus?: number[]
  errorTitle: string
}

const serverErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string(),
})

/**
 * Server-supplied failure description, when the body carries one
 */
export function serverMessage(response: ParsedResponse): string | undefined {
  const parsed = serverErrorSchema.safeParse(response.json())
  return parsed.success ? parsed.data.message : undefined
}

export abstract class NodeCommand<T> implements Command {
  constructor(
    protected readonly client: NodeClient,
    protected readonly exchange: NodeExchange<T>
  ) {}

  async execute(): Promise<CommandResult> {
    const { path, method, body, expect, errorTitle } = this.exchange
    const acceptStatus = this.exchange.acceptStatus ?? [HTTP_STATUS.OK]
    const request = this.client.buildRequest(path, method, body)

    let raw: Buffer
    try {
      raw = await this.send(request)
    } catch (error) {
      // The transport has already scheduled its reconnect
      return commandFailure(error, errorTitle)
    }

    let response: ParsedResponse
    try {
      response = parseHttpResponse(raw)
    } catch (error) {
      this.client.connection.terminate(true)
      return commandFailure(error, errorTitle)
    }

    const parsed = expect.safeParse(response.json())
    if (!acceptStatus.includes(response.statusCode) || !parsed.success) {
      // The stream may be out of step with the server after an unexpected reply
      this.client.connection.terminate(true)
      return commandError(
        errorTitle,
        serverMessage(response) ??
          `Unexpected response from ${path}: ${response.statusCode} ${response.statusText}`
      )
    }
    return this.onValidResponse(parsed.data, response)
  }

  protected send(request: HttpRequest): Promise<Buffer> {
    return this.client.connection.send(request)
  }

  protected abstract onValidResponse(
    value: T,
    response: ParsedResponse
  ): CommandResult | Promise<CommandResult>
}
