/**
 * Dynamic port allocation utilities for tests
 * Uses ephemeral port 0 to let the OS assign free ports
 */
import net from 'net'

/**
 * Find a single free port by binding to port 0
 * The OS will assign an available ephemeral port
 */
export async function findFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer()
    server.unref()
    server.on('error', reject)
    server.listen(0, () => {
      const addr = server.address()
      if (addr === null || typeof addr === 'string') {
        server.close(() => reject(new Error('Could not determine allocated port')))
        return
      }
      server.close(() => resolve(addr.port))
    })
  })
}

/**
 * Check if a port is currently in use
 */
export async function isPortInUse(port: number, host: string = 'localhost'): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ port, host })
    socket.on('connect', () => {
      socket.destroy()
      resolve(true)
    })
    socket.on('error', () => {
      resolve(false)
    })
  })
}
