/**
 * Handles on mock servers used by tests
 *
 * LocalServer owns the process backing a server on this machine and takes part
 * in the ServerRegistry. ExternalServer points at a shared instance whose
 * lifecycle is managed elsewhere and only resets its state on stop.
 */
import { loadConfig } from './config.js'
import { HttpStatusError, TimeoutError, ValidationError, isMockspyError } from './errors.js'
import { NodeHttpClient, type HttpClient, type HttpResponse } from './http-client.js'
import { SpawnLauncher, type ProcessHandle, type ProcessLauncher } from './process-launcher.js'
import { getDefaultServerRegistry, type ManagedServer, type ServerRegistry } from './server-registry.js'

export type ServerState = 'stopped' | 'starting' | 'running'

export type PostData = string | Buffer | Record<string, unknown> | unknown[]

export abstract class Server {
  constructor(
    readonly baseUrl: string,
    protected readonly httpClient: HttpClient = new NodeHttpClient()
  ) {}

  abstract start(): Promise<void>
  abstract stop(): Promise<void>

  /**
   * GET an endpoint and return its body
   *
   * @throws HttpStatusError unless the status is exactly 200
   */
  async get(endpoint: string): Promise<string> {
    const url = this.fullUrl(endpoint)
    const response = await this.httpClient.request({ method: 'GET', url })
    if (response.status !== 200) {
      throw new HttpStatusError(response.status, url)
    }
    return response.text
  }

  /**
   * POST to an endpoint without checking the status. Objects and arrays are
   * sent as JSON
   */
  post(endpoint: string, data: PostData): Promise<HttpResponse> {
    const isRaw = typeof data === 'string' || Buffer.isBuffer(data)
    return this.httpClient.request({
      method: 'POST',
      url: this.fullUrl(endpoint),
      headers: isRaw ? {} : { 'Content-Type': 'application/json' },
      body: isRaw ? data : JSON.stringify(data)
    })
  }

  delete(endpoint: string): Promise<HttpResponse> {
    return this.httpClient.request({ method: 'DELETE', url: this.fullUrl(endpoint) })
  }

  protected fullUrl(endpoint: string): string {
    return new URL(endpoint, this.baseUrl).toString()
  }
}

export interface ExternalServerOptions {
  httpClient?: HttpClient
}

/**
 * A mock server started outside the test run, shared between tests
 */
export class ExternalServer extends Server {
  static readonly CLEANUP_ENDPOINTS = ['/doubles', '/proxies', '/spy']

  constructor(baseUrl: string, options: ExternalServerOptions = {}) {
    super(baseUrl, options.httpClient)
  }

  async start(): Promise<void> {
    // Lifecycle is owned elsewhere
  }

  /**
   * Reset doubles, proxies and the spy log so the next test starts clean.
   * Each call is attempted; failures are logged, never thrown
   */
  async stop(): Promise<void> {
    for (const endpoint of ExternalServer.CLEANUP_ENDPOINTS) {
      try {
        await this.delete(endpoint)
      } catch (err) {
        console.error(`[ExternalServer] Cleanup DELETE ${this.fullUrl(endpoint)} failed:`, err)
      }
    }
  }
}

export interface LocalServerOptions {
  registry?: ServerRegistry
  httpClient?: HttpClient
  launcher?: ProcessLauncher
  /** Command started as `<binary> -p <port>` */
  binary?: string
  host?: string
  startTimeoutMs?: number
  pollIntervalMs?: number
  verbose?: boolean
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

function requirePositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

/**
 * A mock server process on this machine, one per port
 *
 * Lifecycle: stopped -> starting -> running -> stopped. start() and stop() run
 * entirely under the registry mutex, readiness polling included, so lifecycle
 * transitions across all local servers are serialized.
 */
export class LocalServer extends Server implements ManagedServer {
  readonly port: number
  readonly startTimeoutMs: number
  readonly pollIntervalMs: number
  private readonly registry: ServerRegistry
  private readonly launcher: ProcessLauncher
  private readonly binary: string
  private readonly verbose: boolean
  private process: ProcessHandle | null = null
  private currentState: ServerState = 'stopped'

  constructor(port: number, options: LocalServerOptions = {}) {
    const config = loadConfig()
    const host = options.host ?? config.host
    super(`http://${host}:${port}/`, options.httpClient)
    this.port = port
    this.registry = options.registry ?? getDefaultServerRegistry()
    this.launcher = options.launcher ?? new SpawnLauncher()
    this.binary = options.binary ?? config.binary
    this.startTimeoutMs = requirePositiveInt('startTimeoutMs', options.startTimeoutMs ?? config.startTimeoutMs)
    this.pollIntervalMs = requirePositiveInt('pollIntervalMs', options.pollIntervalMs ?? config.pollIntervalMs)
    this.verbose = options.verbose ?? false
  }

  get state(): ServerState {
    return this.currentState
  }

  /**
   * Register, spawn the backing process and wait until it answers a plain GET
   *
   * @throws DuplicatePortError if a server is already registered for the port
   * @throws TimeoutError if the server is not reachable within startTimeoutMs;
   * the server is then unregistered and its process stopped
   */
  start(): Promise<void> {
    return this.registry.mutex.runExclusive(async () => {
      this.registry.register(this)
      this.currentState = 'starting'

      try {
        this.process = await this.launcher.launch(this.binary, ['-p', String(this.port)])
        await this.waitUntilRunning()
      } catch (err) {
        await this.abortStart()
        throw err
      }

      this.currentState = 'running'
      if (this.verbose) {
        console.log(`[LocalServer] Server on port ${this.port} is running`)
      }
    })
  }

  /**
   * Stop the backing process. Does nothing if this server is not registered,
   * so stopping twice, or after a failed start, is safe
   */
  stop(): Promise<void> {
    return this.registry.mutex.runExclusive(async () => {
      if (!this.registry.unregister(this)) {
        return
      }
      await this.stopProcess()
    })
  }

  kill(): void {
    this.process?.kill()
    this.process = null
    this.currentState = 'stopped'
  }

  // Each poll request is capped by the remaining budget, so a server that
  // accepts connections but never answers still ends in TimeoutError
  private async waitUntilRunning(): Promise<void> {
    const deadline = Date.now() + this.startTimeoutMs
    while (!(await this.isReachable(Math.max(1, deadline - Date.now())))) {
      await sleep(this.pollIntervalMs)
      if (Date.now() > deadline) {
        throw new TimeoutError(this.port, this.startTimeoutMs)
      }
    }
  }

  /**
   * Any HTTP answer counts as reachable; a refused connection or a request
   * left unanswered means the server is not up yet. Other errors propagate
   */
  private async isReachable(timeout: number): Promise<boolean> {
    try {
      await this.httpClient.request({ method: 'GET', url: this.baseUrl, timeout })
      return true
    } catch (err) {
      if (isMockspyError(err, 'CONNECTION_FAILED') || isMockspyError(err, 'REQUEST_TIMEOUT')) {
        if (this.verbose) {
          console.log(`[LocalServer] Waiting for ${this.baseUrl}`)
        }
        return false
      }
      throw err
    }
  }

  private async abortStart(): Promise<void> {
    this.registry.unregister(this)
    try {
      await this.stopProcess()
    } catch (err) {
      console.error(`[LocalServer] Could not stop process for port ${this.port} after failed start:`, err)
    }
  }

  private async stopProcess(): Promise<void> {
    const proc = this.process
    this.process = null
    this.currentState = 'stopped'
    if (proc) {
      await proc.stop()
    }
  }
}
