/**
 * Error types raised by mockspy
 * Every error carries a `code` so callers can branch without instanceof chains
 */

export type MockspyErrorCode =
  | 'DUPLICATE_PORT'
  | 'TIMEOUT'
  | 'HTTP_STATUS'
  | 'CONNECTION_FAILED'
  | 'REQUEST_TIMEOUT'
  | 'VALIDATION'

export abstract class MockspyError extends Error {
  abstract readonly code: MockspyErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class DuplicatePortError extends MockspyError {
  readonly code = 'DUPLICATE_PORT'

  constructor(readonly port: number) {
    super(`A server for port ${port} is already registered`)
  }
}

export class TimeoutError extends MockspyError {
  readonly code = 'TIMEOUT'

  constructor(readonly port: number, readonly timeoutMs: number) {
    super(`Server on port ${port} not reachable after ${timeoutMs}ms`)
  }
}

export class HttpStatusError extends MockspyError {
  readonly code = 'HTTP_STATUS'

  constructor(readonly status: number, readonly url: string) {
    super(`Status Code (${status}) is not 200 for GET ${url}`)
  }
}

export class ConnectionFailedError extends MockspyError {
  readonly code = 'CONNECTION_FAILED'

  constructor(readonly url: string, cause: unknown) {
    super(`Connection to ${url} failed`, { cause })
  }
}

export class RequestTimeoutError extends MockspyError {
  readonly code = 'REQUEST_TIMEOUT'

  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`)
  }
}

export class ValidationError extends MockspyError {
  readonly code = 'VALIDATION'
}

type ErrorByCode = {
  DUPLICATE_PORT: DuplicatePortError
  TIMEOUT: TimeoutError
  HTTP_STATUS: HttpStatusError
  CONNECTION_FAILED: ConnectionFailedError
  REQUEST_TIMEOUT: RequestTimeoutError
  VALIDATION: ValidationError
}

export function isMockspyError(err: unknown): err is MockspyError
export function isMockspyError<C extends MockspyErrorCode>(err: unknown, code: C): err is ErrorByCode[C]
export function isMockspyError(err: unknown, code?: MockspyErrorCode): boolean {
  if (!(err instanceof MockspyError)) {
    return false
  }
  return code === undefined || err.code === code
}
