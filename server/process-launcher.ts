/**
 * Spawning and stopping the processes that back local mock servers
 */
import { spawn, type ChildProcess } from 'child_process'

export interface ProcessHandle {
  readonly pid?: number
  /** Terminate gracefully, escalating to SIGKILL after the grace period */
  stop(): Promise<void>
  /** Synchronous best-effort kill, safe to call from an exit handler */
  kill(): void
}

export interface ProcessLauncher {
  launch(command: string, args: string[]): Promise<ProcessHandle>
}

export interface SpawnLauncherOptions {
  /** How long stop() waits for exit before sending SIGKILL (default 5000) */
  killGraceMs?: number
  env?: NodeJS.ProcessEnv
}

function hasExited(proc: ChildProcess): boolean {
  return proc.exitCode !== null || proc.signalCode !== null
}

function toHandle(proc: ChildProcess, killGraceMs: number): ProcessHandle {
  return {
    pid: proc.pid,
    stop: () => new Promise<void>((resolve) => {
      if (hasExited(proc)) {
        resolve()
        return
      }

      const forceKill = setTimeout(() => {
        if (!hasExited(proc)) {
          proc.kill('SIGKILL')
        }
      }, killGraceMs)

      proc.once('exit', () => {
        clearTimeout(forceKill)
        resolve()
      })
      proc.kill('SIGTERM')
    }),
    kill: () => {
      if (!hasExited(proc)) {
        proc.kill('SIGKILL')
      }
    }
  }
}

/**
 * Launches real OS processes with inherited stdio
 *
 * launch() resolves once the process has spawned and rejects if it could not
 * be spawned (e.g. the binary is not on PATH).
 */
export class SpawnLauncher implements ProcessLauncher {
  private readonly killGraceMs: number
  private readonly env: NodeJS.ProcessEnv

  constructor(options: SpawnLauncherOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 5000
    this.env = options.env ?? process.env
  }

  launch(command: string, args: string[]): Promise<ProcessHandle> {
    const proc = spawn(command, args, { stdio: 'inherit', env: this.env })

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new Error(`Failed to start ${command}: ${err.message}`, { cause: err }))
      }
      proc.once('error', onError)

      proc.once('spawn', () => {
        proc.removeListener('error', onError)
        proc.on('error', (err) => {
          console.error(`[SpawnLauncher] ${command} (pid ${proc.pid}) error:`, err.message)
        })
        resolve(toHandle(proc, this.killGraceMs))
      })
    })
  }
}
