import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ExternalServer, LocalServer } from './servers.js'
import { ServerRegistry } from './server-registry.js'
import { DuplicatePortError, TimeoutError, ValidationError, isMockspyError } from './errors.js'
import type { HttpClient, HttpRequest, HttpResponse } from './http-client.js'
import {
  InProcessLauncher,
  InertLauncher,
  createTargetServer,
  findFreePort,
  isPortInUse,
  type ReceivedRequest,
  type ServerHandle
} from './test-utils/index.js'

describe('LocalServer', () => {
  let registry: ServerRegistry
  let port: number

  beforeEach(async () => {
    registry = new ServerRegistry()
    port = await findFreePort()
  })

  afterEach(async () => {
    await registry.shutdown()
  })

  describe('start', () => {
    it('spawns the binary with the port and waits until it answers', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher, binary: 'mockspy-test' })

      await server.start()

      expect(server.state).toBe('running')
      expect(server.baseUrl).toBe(`http://localhost:${port}/`)
      expect(registry.has(port)).toBe(true)
      expect(launcher.launches).toEqual([{ command: 'mockspy-test', args: ['-p', String(port)], stopped: false }])
      expect(await isPortInUse(port)).toBe(true)
    })

    it('keeps polling while the server refuses connections', async () => {
      const launcher = new InProcessLauncher({ startupDelayMs: 300 })
      const server = new LocalServer(port, { registry, launcher, pollIntervalMs: 50, startTimeoutMs: 3000 })

      const started = Date.now()
      await server.start()

      expect(Date.now() - started).toBeGreaterThanOrEqual(250)
      expect(server.state).toBe('running')
    })

    it('fails with TimeoutError after the default budget when the server never answers', async () => {
      const launcher = new InertLauncher()
      const server = new LocalServer(port, { registry, launcher })

      const started = Date.now()
      const error = await server.start().catch((err: unknown) => err)
      const elapsed = Date.now() - started

      expect(error).toBeInstanceOf(TimeoutError)
      expect(error).toMatchObject({ code: 'TIMEOUT', port, timeoutMs: 3000 })
      expect(elapsed).toBeGreaterThanOrEqual(3000)
      expect(elapsed).toBeLessThan(6000)
      expect(registry.has(port)).toBe(false)
      expect(server.state).toBe('stopped')
      expect(launcher.launches[0].stopped).toBe(true)
    })

    it('honours a custom timeout budget', async () => {
      const server = new LocalServer(port, {
        registry,
        launcher: new InertLauncher(),
        startTimeoutMs: 200,
        pollIntervalMs: 50
      })

      await expect(server.start()).rejects.toThrow(`Server on port ${port} not reachable after 200ms`)
    })

    it('fails with TimeoutError within the budget when the server accepts but never answers', async () => {
      const silent = await createTargetServer({ port, handler: () => {} })
      const server = new LocalServer(port, {
        registry,
        launcher: new InertLauncher(),
        startTimeoutMs: 300,
        pollIntervalMs: 50
      })

      try {
        const started = Date.now()
        const error = await server.start().catch((err: unknown) => err)

        expect(error).toBeInstanceOf(TimeoutError)
        expect(error).toMatchObject({ code: 'TIMEOUT', port, timeoutMs: 300 })
        expect(Date.now() - started).toBeLessThan(2000)
        expect(registry.has(port)).toBe(false)
      } finally {
        await silent.close()
      }
    })

    it.each([0, -100, 1.5, NaN])('rejects a poll interval of %s', (value) => {
      expect(() => new LocalServer(port, { registry, pollIntervalMs: value }))
        .toThrow(ValidationError)
      expect(registry.size).toBe(0)
    })

    it.each([0, -1, Infinity])('rejects a start timeout of %s', (value) => {
      expect(() => new LocalServer(port, { registry, startTimeoutMs: value }))
        .toThrow(`startTimeoutMs must be a positive integer, got ${value}`)
    })

    it('fails with DuplicatePortError when started twice', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()

      await expect(server.start()).rejects.toBeInstanceOf(DuplicatePortError)
      expect(launcher.launches).toHaveLength(1)
      expect(server.state).toBe('running')
    })

    it('serializes concurrent starts for the same port', async () => {
      const launcher = new InProcessLauncher({ startupDelayMs: 100 })
      const first = new LocalServer(port, { registry, launcher, pollIntervalMs: 20 })
      const second = new LocalServer(port, { registry, launcher, pollIntervalMs: 20 })

      const [a, b] = await Promise.allSettled([first.start(), second.start()])

      expect(a.status).toBe('fulfilled')
      expect(b.status).toBe('rejected')
      if (b.status === 'rejected') {
        expect(isMockspyError(b.reason, 'DUPLICATE_PORT')).toBe(true)
      }
      expect(launcher.launches).toHaveLength(1)
    })

    it('holds the registry lock while polling', async () => {
      const launcher = new InProcessLauncher({ startupDelayMs: 200 })
      const server = new LocalServer(port, { registry, launcher, pollIntervalMs: 20 })

      const starting = server.start()
      await new Promise(resolve => setTimeout(resolve, 50))

      expect(registry.mutex.isLocked()).toBe(true)
      await starting
      expect(registry.mutex.isLocked()).toBe(false)
    })

    it('unregisters and propagates errors other than refused connections', async () => {
      const failing: HttpClient = {
        request: async (request: HttpRequest): Promise<HttpResponse> => {
          throw new Error(`socket hang up: ${request.url}`)
        }
      }
      const launcher = new InertLauncher()
      const server = new LocalServer(port, { registry, launcher, httpClient: failing })

      await expect(server.start()).rejects.toThrow(`socket hang up: http://localhost:${port}/`)
      expect(registry.has(port)).toBe(false)
      expect(launcher.launches[0].stopped).toBe(true)
    })

    it('counts any HTTP answer as ready', async () => {
      const answering: HttpClient = {
        request: async (): Promise<HttpResponse> => ({
          status: 500,
          headers: {},
          body: Buffer.alloc(0),
          text: ''
        })
      }
      const server = new LocalServer(port, { registry, launcher: new InertLauncher(), httpClient: answering })

      await server.start()

      expect(server.state).toBe('running')
    })
  })

  describe('stop', () => {
    it('stops the process and unregisters', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()

      await server.stop()

      expect(server.state).toBe('stopped')
      expect(registry.has(port)).toBe(false)
      expect(launcher.launches[0].stopped).toBe(true)
      expect(await isPortInUse(port)).toBe(false)
    })

    it('is a no-op when stopped twice', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()
      await server.stop()
      launcher.launches[0].stopped = false

      await server.stop()

      expect(launcher.launches[0].stopped).toBe(false)
    })

    it('does nothing for a server that never started', async () => {
      const server = new LocalServer(port, { registry, launcher: new InertLauncher() })

      await expect(server.stop()).resolves.toBeUndefined()
      expect(server.state).toBe('stopped')
    })

    it('allows the port to be started again', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()
      await server.stop()

      await server.start()

      expect(server.state).toBe('running')
      expect(launcher.launches).toHaveLength(2)
    })
  })

  describe('HTTP helpers', () => {
    it('registers doubles and reads them back', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()

      const created = await server.post('/doubles', { pattern: '/hello', body: 'world' })
      expect(created.status).toBe(201)

      expect(await server.get('/hello')).toBe('world')
    })

    it('get fails with HttpStatusError unless the status is 200', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()

      const error = await server.get('/missing').catch((err: unknown) => err)

      expect(isMockspyError(error, 'HTTP_STATUS')).toBe(true)
      expect(error).toMatchObject({ status: 404, url: `http://localhost:${port}/missing` })
    })

    it('post and delete return the raw response without a status check', async () => {
      const launcher = new InProcessLauncher()
      const server = new LocalServer(port, { registry, launcher })
      await server.start()

      const invalid = await server.post('/doubles', { status_code: 200 })
      const deleted = await server.delete('/nothing-here')

      expect(invalid.status).toBe(400)
      expect(JSON.parse(invalid.text)).toEqual({ error: 'pattern must be a non-empty string' })
      expect(deleted.status).toBe(404)
    })
  })
})

describe('ExternalServer', () => {
  let target: ServerHandle
  let received: ReceivedRequest[]

  beforeEach(async () => {
    received = []
    target = await createTargetServer({ receivedRequests: received })
  })

  afterEach(async () => {
    await target.close()
  })

  it('start does not contact the server', async () => {
    const server = new ExternalServer(`http://localhost:${target.port}/`)

    await server.start()

    expect(received).toEqual([])
  })

  it('stop resets doubles, proxies and the spy log', async () => {
    const server = new ExternalServer(`http://localhost:${target.port}/`)

    await server.stop()

    expect(received.map(r => `${r.method} ${r.url}`)).toEqual([
      'DELETE /doubles',
      'DELETE /proxies',
      'DELETE /spy'
    ])
  })

  it('stop attempts every cleanup call and never throws', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const attempted: string[] = []
    const flaky: HttpClient = {
      request: async (request: HttpRequest): Promise<HttpResponse> => {
        attempted.push(request.url)
        throw new Error('connection reset')
      }
    }
    const server = new ExternalServer('http://shared-mockspy:9090/', { httpClient: flaky })

    await expect(server.stop()).resolves.toBeUndefined()

    expect(attempted).toEqual([
      'http://shared-mockspy:9090/doubles',
      'http://shared-mockspy:9090/proxies',
      'http://shared-mockspy:9090/spy'
    ])
    expect(errorSpy).toHaveBeenCalledTimes(3)
    errorSpy.mockRestore()
  })

  it('get returns the body of a 200 response', async () => {
    const server = new ExternalServer(`http://localhost:${target.port}`)

    const body = await server.get('/status')

    expect(JSON.parse(body)).toEqual({ method: 'GET', url: '/status', body: '' })
  })
})
