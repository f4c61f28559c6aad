/**
 * HTTP response parsing for bytes accumulated off the persistent connection
 */

import type { HttpResponse } from '@media-relay/shared/types'
import type { z } from 'zod'
import { ErrorCode } from '@media-relay/shared/errors'
import { ProtocolError } from '../utils/error'
import { HEADER_TERMINATOR } from './request'

export class ParsedResponse implements HttpResponse {
  constructor(
    readonly statusCode: number,
    readonly statusText: string,
    readonly headers: Record<string, string>,
    readonly body: Buffer
  ) {}

  /**
   * Header lookup ignoring case
   */
  header(name: string): string | undefined {
    const wanted = name.toLowerCase()
    for (const [key, value] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) {
        return value
      }
    }
    return undefined
  }

  text(): string {
    return this.body.toString('utf8')
  }

  /**
   * Body as JSON, or undefined when it is empty or not JSON
   */
  json(): unknown {
    if (this.body.length === 0) {
      return undefined
    }
    try {
      const parsed: unknown = JSON.parse(this.text())
      return parsed
    } catch {
      return undefined
    }
  }

  /**
   * Body validated against a schema, or undefined when it does not match
   */
  bodyAs<T extends z.ZodTypeAny>(schema: T): z.infer<T> | undefined {
    const result = schema.safeParse(this.json())
    return result.success ? result.data : undefined
  }
}

/**
 * Split raw response bytes into status, headers and body.
 * Header lines count only when they split into exactly one name and one value on ": ".
 */
export function parseHttpResponse(data: Buffer): ParsedResponse {
  const headerEnd = data.indexOf(HEADER_TERMINATOR)
  if (headerEnd < 0) {
    throw new ProtocolError('Response is missing the end of its header block', ErrorCode.MALFORMED_RESPONSE)
  }

  const lines = data.subarray(0, headerEnd).toString('utf8').split('\r\n')
  const statusLine = lines[0] ?? ''
  const statusParts = statusLine.split(' ')
  const statusCode = Number(statusParts[1])
  if (statusParts.length < 3 || !Number.isInteger(statusCode)) {
    throw new ProtocolError(`Malformed status line: ${statusLine}`, ErrorCode.MALFORMED_RESPONSE)
  }

  const headers: Record<string, string> = {}
  for (const line of lines.slice(1)) {
    const parts = line.split(': ')
    const [name, value] = parts
    if (parts.length === 2 && name !== undefined && value !== undefined) {
      headers[name] = value
    }
  }

  return new ParsedResponse(
    statusCode,
    statusParts.slice(2).join(' '),
    headers,
    data.subarray(headerEnd + HEADER_TERMINATOR.length)
  )
}

/**
 * Content-Length from a raw header block, matched case-insensitively
 */
export function parseContentLength(head: Buffer): number | undefined {
  for (const line of head.toString('utf8').split('\r\n')) {
    const parts = line.split(':').map(part => part.trim())
    const [name, value] = parts
    if (parts.length === 2 && name?.toLowerCase() === 'content-length' && value !== undefined) {
      const length = Number(value)
      if (Number.isInteger(length) && length >= 0 && value.length > 0) {
        return length
      }
    }
  }
  return undefined
}
