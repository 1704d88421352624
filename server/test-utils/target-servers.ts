/**
 * In-process HTTP target servers for tests
 * Record every request and answer through a configurable handler
 */
import http from 'http'
import type { ReceivedRequest, ServerHandle, TargetHandler, TargetServerOptions } from './types.js'

/**
 * Default handler: JSON echo of what was received
 */
export const echoHandler: TargetHandler = (req, res, body) => {
  const responseBody = JSON.stringify({
    method: req.method,
    url: req.url,
    body: body.toString('utf-8')
  })
  res.writeHead(200, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(responseBody)
  })
  res.end(responseBody)
}

/**
 * Start listening with an already-created server
 */
export function listen(server: http.Server, port: number = 0): Promise<ServerHandle> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, () => {
      const addr = server.address()
      if (addr === null || typeof addr === 'string') {
        reject(new Error('Server is not bound to a TCP port'))
        return
      }
      resolve({
        port: addr.port,
        server,
        close: () => new Promise<void>((res) => {
          server.closeAllConnections()
          server.close(() => res())
        })
      })
    })
  })
}

/**
 * Create an HTTP target server, on an ephemeral port unless one is given
 */
export async function createTargetServer(options: TargetServerOptions = {}): Promise<ServerHandle> {
  const receivedRequests = options.receivedRequests || []
  const handler = options.handler || echoHandler

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      const body = Buffer.concat(chunks)
      const received: ReceivedRequest = {
        method: req.method || 'GET',
        url: req.url || '/',
        headers: req.headers,
        body: body.toString('utf-8')
      }
      receivedRequests.push(received)
      handler(req, res, body)
    })
  })

  return listen(server, options.port)
}
