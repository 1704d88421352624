import type { DoublePayload, Headers, ProxyPayload } from '../../shared/types.js'
import { ValidationError } from '../errors.js'
import { generateId } from '../utils.js'

/**
 * A path pattern with a stable identity
 *
 * The pattern is a regular expression source tested, unanchored, against the
 * full request path. Two matchables are the same for removal purposes only if
 * their ids are equal.
 */
export class Matchable {
  readonly id: string
  readonly pattern: string
  private readonly regex: RegExp

  constructor(pattern: string, id: string = generateId()) {
    this.id = id
    this.pattern = pattern
    this.regex = new RegExp(pattern)
  }

  matches(path: string): boolean {
    return this.regex.test(path)
  }
}

/**
 * A canned response served for requests whose path matches its pattern
 */
export class Double extends Matchable {
  readonly statusCode: number
  readonly headers: Headers
  readonly body: string

  constructor(
    pattern: string,
    options: { statusCode?: number; headers?: Headers; body?: string } = {},
    id?: string
  ) {
    super(pattern, id)
    this.statusCode = options.statusCode ?? 200
    this.headers = { ...options.headers }
    this.body = options.body ?? ''
  }

  static fromJson(payload: unknown): Double {
    const fields = asRecord(payload)
    const pattern = requirePattern(fields)

    const statusCode = fields.status_code ?? 200
    if (typeof statusCode !== 'number' || !Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
      throw new ValidationError('status_code must be an integer between 100 and 599')
    }

    const body = fields.body ?? ''
    if (typeof body !== 'string') {
      throw new ValidationError('body must be a string')
    }

    return new Double(pattern, { statusCode, headers: readHeaders(fields.headers), body })
  }

  toJson(): DoublePayload & { id: string } {
    const headers: Record<string, string> = {}
    for (const [name, value] of Object.entries(this.headers)) {
      if (value !== undefined) {
        headers[name] = Array.isArray(value) ? value.join(', ') : value
      }
    }
    return { id: this.id, pattern: this.pattern, status_code: this.statusCode, headers, body: this.body }
  }
}

/**
 * Forwards requests whose path matches its pattern to an upstream base URL
 */
export class ProxyRule extends Matchable {
  readonly redirectUrl: string

  constructor(pattern: string, redirectUrl: string, id?: string) {
    super(pattern, id)
    this.redirectUrl = redirectUrl
  }

  /**
   * Upstream URL for a request path, keeping any base path of the redirect URL
   */
  targetUrl(pathWithQuery: string): string {
    return this.redirectUrl.replace(/\/+$/, '') + pathWithQuery
  }

  static fromJson(payload: unknown): ProxyRule {
    const fields = asRecord(payload)
    const pattern = requirePattern(fields)

    const redirectUrl = fields.redirect_url
    if (typeof redirectUrl !== 'string' || !URL.canParse(redirectUrl)) {
      throw new ValidationError('redirect_url must be an absolute URL')
    }

    return new ProxyRule(pattern, redirectUrl)
  }

  toJson(): ProxyPayload & { id: string } {
    return { id: this.id, pattern: this.pattern, redirect_url: this.redirectUrl }
  }
}

function asRecord(payload: unknown): Record<string, unknown> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new ValidationError('Expected a JSON object')
  }
  return Object.fromEntries(Object.entries(payload))
}

function requirePattern(fields: Record<string, unknown>): string {
  const pattern = fields.pattern
  if (typeof pattern !== 'string' || pattern.length === 0) {
    throw new ValidationError('pattern must be a non-empty string')
  }
  try {
    new RegExp(pattern)
  } catch (err) {
    throw new ValidationError(`pattern is not a valid regular expression: ${pattern}`, { cause: err })
  }
  return pattern
}

function readHeaders(value: unknown): Headers {
  if (value === undefined) {
    return {}
  }
  const headers: Headers = {}
  for (const [name, headerValue] of Object.entries(asRecord(value))) {
    if (typeof headerValue !== 'string') {
      throw new ValidationError(`header ${name} must be a string`)
    }
    headers[name] = headerValue
  }
  return headers
}
