export type Headers = Record<string, string | string[] | undefined>

export type ResponseType = 'proxy' | 'double' | 'not_found'

/**
 * Serialized outcome of one served request, as reported to tests
 */
export interface ResponseRepresentation {
  type: ResponseType
  status_code: number
  body: string
}

export interface DoublePayload {
  pattern: string
  status_code?: number
  headers?: Record<string, string>
  body?: string
}

export interface ProxyPayload {
  pattern: string
  redirect_url: string
}

/**
 * One request recorded by the spy log
 */
export interface SpyRecord {
  id: string
  timestamp: string
  method: string
  path: string
  headers: Headers
  body?: string
  response: ResponseRepresentation
}
