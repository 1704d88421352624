/**
 * Minimal HTTP client used to talk to mock servers and proxy upstreams
 */
import http from 'http'
import https from 'https'
import { ConnectionFailedError, RequestTimeoutError } from './errors.js'

export interface HttpRequest {
  method: string
  url: string
  headers?: Record<string, string | string[]>
  body?: string | Buffer
  timeout?: number
}

export interface HttpResponse {
  status: number
  headers: http.IncomingHttpHeaders
  /** Raw bytes as received, still content-encoded */
  body: Buffer
  /** `body` read as UTF-8 */
  text: string
}

export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EADDRNOTAVAIL',
  'ENOTFOUND',
  'EAI_AGAIN'
])

/**
 * Whether an error means the peer could not be reached at all
 * (as opposed to answering badly)
 */
export function isConnectionFailure(err: unknown): boolean {
  if (err instanceof ConnectionFailedError) {
    return true
  }
  if (err instanceof AggregateError) {
    return err.errors.some(isConnectionFailure)
  }
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return CONNECTION_ERROR_CODES.has(err.code)
  }
  return false
}

/**
 * HttpClient on top of Node's http/https modules
 *
 * Responses are fully buffered. Connection-level failures reject with
 * ConnectionFailedError, a request without an answer within its timeout with
 * RequestTimeoutError; any HTTP status resolves.
 */
export class NodeHttpClient implements HttpClient {
  constructor(private readonly defaultTimeout: number = 10000) {}

  request(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url)
    const headers: http.OutgoingHttpHeaders = { ...request.headers }
    if (request.body !== undefined) {
      headers['Content-Length'] = Buffer.byteLength(request.body)
    }

    const timeout = request.timeout ?? this.defaultTimeout
    const reqOptions: http.RequestOptions = {
      method: request.method,
      hostname: url.hostname.replace(/^\[|\]$/g, ''),
      port: url.port || undefined,
      path: url.pathname + url.search,
      headers,
      timeout
    }

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = []

        res.on('data', (chunk: Buffer) => chunks.push(chunk))
        res.on('error', reject)
        res.on('end', () => {
          const body = Buffer.concat(chunks)
          resolve({
            status: res.statusCode || 0,
            headers: res.headers,
            body,
            text: body.toString('utf-8')
          })
        })
      }

      const req = url.protocol === 'https:'
        ? https.request(reqOptions, onResponse)
        : http.request(reqOptions, onResponse)

      req.on('error', (err) => {
        reject(isConnectionFailure(err) ? new ConnectionFailedError(request.url, err) : err)
      })
      req.on('timeout', () => {
        req.destroy(new RequestTimeoutError(request.url, timeout))
      })

      if (request.body !== undefined) {
        req.write(request.body)
      }
      req.end()
    })
  }
}
