/**
 * The mock server: an Express app serving doubles, forwarding proxied paths
 * and recording every exchange in a spy log
 */
import express, { type ErrorRequestHandler, type Request } from 'express'
import type { Headers, SpyRecord } from '../shared/types.js'
import { isMockspyError } from './errors.js'
import { NodeHttpClient, type HttpClient } from './http-client.js'
import { MatchableRegistry } from './model/matchable-registry.js'
import { Double, ProxyRule } from './model/matchable.js'
import { Response } from './response.js'
import { generateId } from './utils.js'

export interface AppOptions {
  /** Port the app is served on; keys this app's entries in the registries */
  port: number
  doubles?: MatchableRegistry<Double>
  proxies?: MatchableRegistry<ProxyRule>
  httpClient?: HttpClient
  verbose?: boolean
}

export interface AppState {
  port: number
  doubles: MatchableRegistry<Double>
  proxies: MatchableRegistry<ProxyRule>
  spy: SpyRecord[]
}

// Headers that describe the connection or the original framing, not the content
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'content-length',
  'host'
])

// Repeated headers such as Set-Cookie stay arrays so each value is sent separately
function forwardableHeaders(headers: Headers): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {}
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(name.toLowerCase())) {
      continue
    }
    result[name] = value
  }
  return result
}

function requestBody(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0)
}

export function createApp(options: AppOptions): { app: express.Express; state: AppState } {
  const { port, verbose = false } = options
  const httpClient = options.httpClient ?? new NodeHttpClient()
  const state: AppState = {
    port,
    doubles: options.doubles ?? new MatchableRegistry<Double>(),
    proxies: options.proxies ?? new MatchableRegistry<ProxyRule>(),
    spy: []
  }

  const app = express()
  const json = express.json()

  // ============ Doubles ============

  app.post('/doubles', json, (req, res) => {
    const double = Double.fromJson(req.body)
    state.doubles.register(double, port)
    if (verbose) {
      console.log(`[mockspy:${port}] Double ${double.id} registered for ${double.pattern}`)
    }
    res.status(201).json({ id: double.id })
  })

  app.get('/doubles', (_req, res) => {
    res.json(state.doubles.all(port).map(double => double.toJson()))
  })

  app.delete('/doubles', (_req, res) => {
    state.doubles.reset(port)
    res.status(204).end()
  })

  app.delete('/doubles/:id', (req, res) => {
    state.doubles.unregister(req.params.id, port)
    res.status(204).end()
  })

  // ============ Proxies ============

  app.post('/proxies', json, (req, res) => {
    const proxy = ProxyRule.fromJson(req.body)
    state.proxies.register(proxy, port)
    if (verbose) {
      console.log(`[mockspy:${port}] Proxy ${proxy.id} registered for ${proxy.pattern} -> ${proxy.redirectUrl}`)
    }
    res.status(201).json({ id: proxy.id })
  })

  app.get('/proxies', (_req, res) => {
    res.json(state.proxies.all(port).map(proxy => proxy.toJson()))
  })

  app.delete('/proxies', (_req, res) => {
    state.proxies.reset(port)
    res.status(204).end()
  })

  app.delete('/proxies/:id', (req, res) => {
    state.proxies.unregister(req.params.id, port)
    res.status(204).end()
  })

  // ============ Spy log ============

  app.get('/spy', (_req, res) => {
    res.json(state.spy)
  })

  app.delete('/spy', (_req, res) => {
    state.spy.length = 0
    res.status(204).end()
  })

  // ============ Dispatch ============

  const dispatch = async (req: Request): Promise<Response> => {
    const double = state.doubles.findForEndpoint(req.path, port)
    if (double) {
      return Response.double(double)
    }

    const proxy = state.proxies.findForEndpoint(req.path, port)
    if (proxy) {
      const body = requestBody(req)
      const upstream = await httpClient.request({
        method: req.method,
        url: proxy.targetUrl(req.originalUrl),
        headers: forwardableHeaders(req.headers),
        body: body.length > 0 ? body : undefined
      })
      return Response.proxy(upstream.status, upstream.headers, upstream.body)
    }

    return Response.notFound()
  }

  app.use(express.raw({ type: () => true, limit: '50mb' }), (req, res, next) => {
    dispatch(req)
      .then((response) => {
        const body = requestBody(req)
        state.spy.push({
          id: generateId(),
          timestamp: new Date().toISOString(),
          method: req.method,
          path: req.originalUrl,
          headers: req.headers,
          body: body.length > 0 ? body.toString('utf-8') : undefined,
          response: response.toRepresentation()
        })
        if (verbose) {
          console.log(`[mockspy:${port}] ${req.method} ${req.originalUrl} -> ${response.type} ${response.statusCode}`)
        }

        res.status(response.statusCode)
        res.set(forwardableHeaders(response.headers ?? {}))
        res.send(response.body)
      })
      .catch(next)
  })

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (isMockspyError(err, 'VALIDATION') || err instanceof SyntaxError) {
      res.status(400).json({ error: err.message })
      return
    }
    if (isMockspyError(err, 'CONNECTION_FAILED')) {
      console.error(`[mockspy:${port}] Upstream ${err.url} unreachable`)
      res.status(502).json({ error: err.message })
      return
    }
    if (isMockspyError(err, 'REQUEST_TIMEOUT')) {
      console.error(`[mockspy:${port}] Upstream ${err.url} did not answer in ${err.timeoutMs}ms`)
      res.status(504).json({ error: err.message })
      return
    }
    console.error(`[mockspy:${port}] ${req.method} ${req.originalUrl} failed:`, err)
    res.status(500).json({ error: err instanceof Error ? err.message : String(err) })
  }
  app.use(errorHandler)

  return { app, state }
}
