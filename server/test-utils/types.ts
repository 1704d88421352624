/**
 * Shared type definitions for tests
 */
import type http from 'http'

export type Compression = 'none' | 'gzip' | 'deflate' | 'br' | 'zstd'

export interface ReceivedRequest {
  method: string
  url: string
  headers: http.IncomingHttpHeaders
  body: string
}

export interface ServerHandle {
  port: number
  server: http.Server
  close: () => Promise<void>
}

export type TargetHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  body: Buffer
) => void

export interface TargetServerOptions {
  port?: number
  receivedRequests?: ReceivedRequest[]
  handler?: TargetHandler
}
