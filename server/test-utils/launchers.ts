/**
 * Process launchers that keep "spawned" servers inside the test process
 */
import http from 'http'
import { createApp, type AppOptions, type AppState } from '../app.js'
import type { ProcessHandle, ProcessLauncher } from '../process-launcher.js'
import { listen } from './target-servers.js'

export interface LaunchRecord {
  command: string
  args: string[]
  stopped: boolean
}

/**
 * Read the value following `-p` in a mockspy command line
 */
export function portFromArgs(args: string[]): number {
  const index = args.indexOf('-p')
  const port = index === -1 ? NaN : parseInt(args[index + 1], 10)
  if (isNaN(port)) {
    throw new Error(`No -p <port> in arguments: ${args.join(' ')}`)
  }
  return port
}

export interface InProcessLauncherOptions extends Omit<AppOptions, 'port'> {
  /** Wait this long before listening, to exercise readiness polling */
  startupDelayMs?: number
}

/**
 * Serves the mockspy app in-process on the port passed with `-p`
 */
export class InProcessLauncher implements ProcessLauncher {
  readonly launches: LaunchRecord[] = []
  readonly apps = new Map<number, AppState>()

  constructor(private readonly options: InProcessLauncherOptions = {}) {}

  async launch(command: string, args: string[]): Promise<ProcessHandle> {
    const port = portFromArgs(args)
    const record: LaunchRecord = { command, args, stopped: false }
    this.launches.push(record)

    const { startupDelayMs = 0, ...appOptions } = this.options
    const { app, state } = createApp({ ...appOptions, port })
    this.apps.set(port, state)
    const server = http.createServer(app)

    const listening = new Promise<void>((resolve, reject) => {
      setTimeout(() => {
        listen(server, port).then(() => resolve(), reject)
      }, startupDelayMs)
    })
    // Surface listen errors on stop() rather than as unhandled rejections
    listening.catch((err: unknown) => {
      console.error(`[InProcessLauncher] Could not listen on ${port}:`, err)
    })

    return {
      pid: process.pid,
      stop: async () => {
        record.stopped = true
        await listening
        server.closeAllConnections()
        await new Promise<void>((resolve) => server.close(() => resolve()))
      },
      kill: () => {
        record.stopped = true
        server.closeAllConnections()
        server.close()
      }
    }
  }
}

/**
 * Launches nothing: the "process" never becomes reachable
 */
export class InertLauncher implements ProcessLauncher {
  readonly launches: LaunchRecord[] = []

  async launch(command: string, args: string[]): Promise<ProcessHandle> {
    const record: LaunchRecord = { command, args, stopped: false }
    this.launches.push(record)
    return {
      stop: async () => {
        record.stopped = true
      },
      kill: () => {
        record.stopped = true
      }
    }
  }
}
