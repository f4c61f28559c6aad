/**
 * Wire-level types for the persistent HTTP connection
 */

export type HttpMethod = 'GET' | 'POST'

export interface HttpRequest {
  path: string
  method: HttpMethod
  headers: Record<string, string>
  body?: string | Uint8Array
}

export interface HttpResponse {
  statusCode: number
  statusText: string
  headers: Record<string, string>
  body: Buffer
}

/**
 * Connection lifecycle. `lost` is an unexpected drop that is being
 * repaired; `disconnected` is a clean close or an abandoned reconnect.
 */
export enum ConnectionState {
  Started = 'started',
  Connected = 'connected',
  Disconnected = 'disconnected',
  Lost = 'lost',
}

export interface Endpoint {
  host: string
  port: number
}
