/**
 * HTTP/1.1 request framing
 */

import type { HttpMethod, HttpRequest } from '@media-relay/shared/types'

const CRLF = '\r\n'

export const HEADER_TERMINATOR = Buffer.from('\r\n\r\n')

/**
 * Request line and header block, terminated by the blank line
 */
export function encodeRequestHead(
  method: HttpMethod,
  path: string,
  headers: Record<string, string>
): Buffer {
  let head = `${method} ${path} HTTP/1.1${CRLF}`
  for (const [key, value] of Object.entries(headers)) {
    head += `${key}: ${value}${CRLF}`
  }
  head += CRLF
  return Buffer.from(head, 'utf8')
}

/**
 * Full request with its optional body
 */
export function encodeRequest(request: HttpRequest): Buffer {
  const head = encodeRequestHead(request.method, request.path, request.headers)
  if (request.body === undefined) {
    return head
  }
  const body =
    typeof request.body === 'string' ? Buffer.from(request.body, 'utf8') : Buffer.from(request.body)
  return Buffer.concat([head, body])
}

/**
 * Byte length of a request body
 */
export function bodyLength(body: string | Uint8Array): number {
  return typeof body === 'string' ? Buffer.byteLength(body, 'utf8') : body.byteLength
}

/**
 * Append query parameters to a path, percent-encoding the values
 */
export function withQuery(path: string, query: Record<string, string>): string {
  const params = Object.entries(query)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join('&')
  return params.length > 0 ? `${path}?${params}` : path
}
