/**
 * Directory of running local servers, keyed by port
 *
 * The registry's mutex is the single serialization point for server
 * lifecycle transitions: LocalServer runs its whole start/stop body under it.
 */
import { Mutex } from 'async-mutex'
import { DuplicatePortError } from './errors.js'

/**
 * What the registry needs from a server it tracks
 */
export interface ManagedServer {
  readonly port: number
  stop(): Promise<void>
  /** Synchronously kill any owned process; used from the process exit hook */
  kill(): void
}

export interface ShutdownFailure {
  port: number
  error: unknown
}

export class ServerRegistry {
  readonly mutex = new Mutex()
  private readonly servers = new Map<number, ManagedServer>()
  private hooksInstalled = false

  /**
   * @throws DuplicatePortError if a server already holds the port
   */
  register(server: ManagedServer): void {
    if (this.servers.has(server.port)) {
      throw new DuplicatePortError(server.port)
    }
    this.servers.set(server.port, server)
  }

  /**
   * @returns false when no server was registered for the port
   */
  unregister(server: ManagedServer): boolean {
    return this.servers.delete(server.port)
  }

  has(port: number): boolean {
    return this.servers.has(port)
  }

  get size(): number {
    return this.servers.size
  }

  /**
   * Visit a snapshot of the registered servers; registering or unregistering
   * from the visitor does not affect the iteration
   */
  each(visitor: (server: ManagedServer) => void): void {
    for (const server of Array.from(this.servers.values())) {
      visitor(server)
    }
  }

  /**
   * Stop every registered server, one after another
   *
   * A failure to stop one server is logged and collected; the others are still
   * stopped. Every server in the snapshot leaves the registry.
   */
  async shutdown(): Promise<ShutdownFailure[]> {
    const snapshot: ManagedServer[] = []
    this.each(server => snapshot.push(server))

    const failures: ShutdownFailure[] = []
    for (const server of snapshot) {
      try {
        await server.stop()
      } catch (error) {
        console.error(`[ServerRegistry] Failed to stop server on port ${server.port}:`, error)
        failures.push({ port: server.port, error })
      }
      if (this.servers.get(server.port) === server) {
        this.servers.delete(server.port)
      }
    }

    if (snapshot.length > 0) {
      console.log(`[ServerRegistry] Stopped ${snapshot.length - failures.length}/${snapshot.length} server(s)`)
    }
    return failures
  }

  /**
   * Stop all servers on SIGINT/SIGTERM and kill leftover processes on exit
   */
  installShutdownHooks(): void {
    if (this.hooksInstalled) {
      return
    }
    this.hooksInstalled = true

    const onSignal = async (signal: NodeJS.Signals) => {
      console.log(`\n[ServerRegistry] ${signal} received, stopping servers...`)
      const failures = await this.shutdown()
      process.exit(failures.length > 0 ? 1 : 0)
    }

    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)
    process.once('exit', () => {
      this.each(server => server.kill())
    })
  }
}

let defaultRegistry: ServerRegistry | null = null

/**
 * Process-wide registry used by servers that are not given one explicitly
 */
export function getDefaultServerRegistry(): ServerRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ServerRegistry()
  }
  return defaultRegistry
}
