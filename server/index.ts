#!/usr/bin/env node
/**
 * mockspy server binary: `mockspy -p <port>`
 */
import http from 'http'
import { Command } from 'commander'
import { createApp } from './app.js'
import { loadConfig } from './config.js'

const config = loadConfig()

const program = new Command()

program
  .name('mockspy')
  .description('Mock HTTP server serving doubles and proxies for integration tests')
  .option('-p, --port <number>', 'Port to listen on', String(config.port))
  .option('-H, --host <string>', 'Host to bind to')
  .option('-v, --verbose', 'Log every request', false)
  .action((opts: { port: string; host?: string; verbose: boolean }) => {
    const port = parseInt(opts.port, 10)
    if (isNaN(port) || port < 0 || port > 65535) {
      console.error(`[mockspy] Invalid port: ${opts.port}`)
      process.exit(1)
    }

    const { app } = createApp({ port, verbose: opts.verbose })
    const server = http.createServer(app)

    server.on('error', (err) => {
      console.error(`[mockspy] Could not listen on port ${port}:`, err.message)
      process.exit(1)
    })

    server.listen(port, opts.host, () => {
      console.log(`mockspy running on http://${opts.host ?? 'localhost'}:${port}`)
    })

    // Graceful shutdown
    const shutdown = () => {
      console.log('\nShutting down...')
      server.closeAllConnections()
      server.close(() => process.exit(0))
    }
    process.on('SIGINT', shutdown)
    process.on('SIGTERM', shutdown)
  })

program.parse()
