import type { Headers, ResponseRepresentation, ResponseType } from '../shared/types.js'
import { decodeBody } from './utils.js'

/**
 * Anything carrying a canned status, headers and body, such as a Double
 */
export interface CannedResponse {
  statusCode: number
  headers: Headers
  body: string
}

function findHeader(headers: Headers, name: string): string | string[] | undefined {
  const wanted = name.toLowerCase()
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value
    }
  }
  return undefined
}

/**
 * Outcome of serving one request: proxied, answered by a double, or not found
 *
 * The body is decoded once, at construction, using the Content-Encoding
 * header. Instances are frozen.
 */
export class Response {
  readonly decodedBody: string

  private constructor(
    readonly type: ResponseType,
    readonly statusCode: number,
    readonly headers: Headers | undefined,
    readonly body: string | Buffer
  ) {
    this.decodedBody = decodeBody(body, headers ? findHeader(headers, 'Content-Encoding') : undefined)
    Object.freeze(this)
  }

  static proxy(statusCode: number, headers: Headers | undefined, body: string | Buffer): Response {
    return new Response('proxy', statusCode, headers, body)
  }

  static double(double: CannedResponse): Response {
    return new Response('double', double.statusCode, double.headers, double.body)
  }

  static notFound(): Response {
    return new Response('not_found', 404, {}, '')
  }

  toRepresentation(): ResponseRepresentation {
    return {
      type: this.type,
      status_code: this.statusCode,
      body: this.decodedBody
    }
  }
}
