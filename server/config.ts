/**
 * Runtime configuration, read from environment variables
 */

export interface MockspyConfig {
  /** Command that starts a mock server process; invoked as `<binary> -p <port>` */
  binary: string
  host: string
  startTimeoutMs: number
  pollIntervalMs: number
  /** Port the dispatcher listens on when none is given on the command line */
  port: number
}

export const DEFAULT_CONFIG: MockspyConfig = {
  binary: 'mockspy',
  host: 'localhost',
  startTimeoutMs: 3000,
  pollIntervalMs: 100,
  port: 9090
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback
  }
  const parsed = Number(value)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MockspyConfig {
  return {
    binary: env.MOCKSPY_BINARY || DEFAULT_CONFIG.binary,
    host: env.MOCKSPY_HOST || DEFAULT_CONFIG.host,
    startTimeoutMs: positiveInt(env.MOCKSPY_START_TIMEOUT_MS, DEFAULT_CONFIG.startTimeoutMs),
    pollIntervalMs: positiveInt(env.MOCKSPY_POLL_INTERVAL_MS, DEFAULT_CONFIG.pollIntervalMs),
    port: positiveInt(env.PORT, DEFAULT_CONFIG.port)
  }
}
