/**
 * mockspy - control mock HTTP servers from integration tests
 *
 * @example
 * ```typescript
 * import { LocalServer, ServerRegistry } from 'mockspy'
 *
 * const registry = new ServerRegistry()
 * const server = new LocalServer(1234, { registry })
 * await server.start()
 * await server.post('/doubles', { pattern: '^/users', body: '[]' })
 * // ... exercise the system under test ...
 * await registry.shutdown()
 * ```
 */
export * from '../shared/types.js'
export * from './errors.js'
export { loadConfig, DEFAULT_CONFIG, type MockspyConfig } from './config.js'
export { decodeBody, parseContentEncoding } from './utils.js'
export { Matchable, Double, ProxyRule } from './model/matchable.js'
export { MatchableRegistry } from './model/matchable-registry.js'
export { Response, type CannedResponse } from './response.js'
export { NodeHttpClient, isConnectionFailure, type HttpClient, type HttpRequest, type HttpResponse } from './http-client.js'
export { SpawnLauncher, type ProcessHandle, type ProcessLauncher, type SpawnLauncherOptions } from './process-launcher.js'
export { ServerRegistry, getDefaultServerRegistry, type ManagedServer, type ShutdownFailure } from './server-registry.js'
export {
  Server,
  LocalServer,
  ExternalServer,
  type ServerState,
  type PostData,
  type LocalServerOptions,
  type ExternalServerOptions
} from './servers.js'
export { createApp, type AppOptions, type AppState } from './app.js'
