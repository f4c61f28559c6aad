/**
 * Unit tests for request framing and response parsing
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { ErrorCode } from '@media-relay/shared/errors'
import { parseContentLength, parseHttpResponse } from '../../src/http/parser'
import { bodyLength, encodeRequest, encodeRequestHead, withQuery } from '../../src/http/request'
import { ProtocolError } from '../../src/utils/error'

describe('request framing', () => {
  it('writes the request line, headers and blank line', () => {
    const head = encodeRequestHead('GET', '/node/status', { Authorization: 'Bearer test-token' })

    expect(head.toString()).toBe(
      'GET /node/status HTTP/1.1\r\nAuthorization: Bearer test-token\r\n\r\n'
    )
  })

  it('appends a string body after the header block', () => {
    const request = encodeRequest({
      path: '/project/command',
      method: 'POST',
      headers: { 'Content-Length': '5' },
      body: 'hello',
    })

    expect(request.toString()).toBe(
      'POST /project/command HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello'
    )
  })

  it('counts body length in bytes', () => {
    expect(bodyLength('héllo')).toBe(6)
    expect(bodyLength(new Uint8Array([1, 2, 3]))).toBe(3)
  })

  it('percent-encodes query values', () => {
    expect(withQuery('/project/command', { name: 'add', param1: 'DJI 0001.jpg' })).toBe(
      '/project/command?name=add&param1=DJI%200001.jpg'
    )
    expect(withQuery('/node/status', {})).toBe('/node/status')
  })
})

describe('parseHttpResponse', () => {
  it('splits status, headers and body', () => {
    const response = parseHttpResponse(
      Buffer.from('HTTP/1.1 200 OK\r\nContent-Type: application/json\r\nContent-Length: 14\r\n\r\n{"taskID":"7"}')
    )

    expect(response.statusCode).toBe(200)
    expect(response.statusText).toBe('OK')
    expect(response.headers).toEqual({
      'Content-Type': 'application/json',
      'Content-Length': '14',
    })
    expect(response.text()).toBe('{"taskID":"7"}')
    expect(response.json()).toEqual({ taskID: '7' })
  })

  it('keeps a multi-word reason phrase', () => {
    const response = parseHttpResponse(Buffer.from('HTTP/1.1 404 Not Found\r\n\r\n'))

    expect(response.statusCode).toBe(404)
    expect(response.statusText).toBe('Not Found')
    expect(response.body.length).toBe(0)
  })

  it('looks headers up without regard to case', () => {
    const response = parseHttpResponse(Buffer.from('HTTP/1.1 200 OK\r\ncontent-length: 0\r\n\r\n'))

    expect(response.header('Content-Length')).toBe('0')
    expect(response.header('X-Missing')).toBeUndefined()
  })

  it('ignores header lines that do not split into one name and one value', () => {
    const response = parseHttpResponse(
      Buffer.from('HTTP/1.1 200 OK\r\nBroken\r\nX-Pair: a: b\r\nX-Good: yes\r\n\r\n')
    )

    expect(response.headers).toEqual({ 'X-Good': 'yes' })
  })

  it('rejects a response without a header terminator', () => {
    expect(() => parseHttpResponse(Buffer.from('HTTP/1.1 200 OK\r\n'))).toThrow(ProtocolError)
  })

  it('rejects a status line with fewer than three parts', () => {
    try {
      parseHttpResponse(Buffer.from('HTTP/1.1 200\r\n\r\n'))
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError)
      expect(error).toMatchObject({ code: ErrorCode.MALFORMED_RESPONSE })
    }
  })

  it('validates the body against a schema', () => {
    const response = parseHttpResponse(Buffer.from('HTTP/1.1 200 OK\r\n\r\n["a.jpg","b.jpg"]'))

    expect(response.bodyAs(z.array(z.string()))).toEqual(['a.jpg', 'b.jpg'])
    expect(response.bodyAs(z.object({ taskID: z.string() }))).toBeUndefined()
  })

  it('reads a non-JSON body as undefined', () => {
    const response = parseHttpResponse(Buffer.from('HTTP/1.1 200 OK\r\n\r\nnot json'))

    expect(response.json()).toBeUndefined()
  })
})

describe('parseContentLength', () => {
  it('matches the header name in any case and trims the value', () => {
    expect(parseContentLength(Buffer.from('HTTP/1.1 200 OK\r\nCONTENT-LENGTH:  42 '))).toBe(42)
  })

  it('is undefined when the header is absent or not a number', () => {
    expect(parseContentLength(Buffer.from('HTTP/1.1 200 OK\r\nServer: x'))).toBeUndefined()
    expect(parseContentLength(Buffer.from('HTTP/1.1 200 OK\r\nContent-Length: many'))).toBeUndefined()
  })
})
