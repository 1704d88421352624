/**
 * Compression utilities for test bodies
 * Supports gzip, deflate, brotli, and zstd compression
 */
import { gzipSync, deflateSync, brotliCompressSync } from 'zlib'
import { ZstdCodec, type ZstdSimple } from 'zstd-codec'
import type { Compression } from './types.js'

// Zstd compressor - lazily initialized
let zstdSimple: ZstdSimple | null = null
let zstdReadyPromise: Promise<void> | null = null

/**
 * Initialize the zstd codec
 * Returns a promise that resolves when zstd is ready
 */
export function initZstd(): Promise<void> {
  if (zstdReadyPromise) {
    return zstdReadyPromise
  }

  zstdReadyPromise = new Promise<void>((resolve) => {
    ZstdCodec.run((zstd) => {
      zstdSimple = new zstd.Simple()
      resolve()
    })
  })

  return zstdReadyPromise
}

/**
 * Compress data with the specified encoding
 *
 * @throws Error if zstd is not initialized and zstd encoding is requested
 */
export function compress(data: string | Buffer, encoding: Compression): Buffer {
  const buf = typeof data === 'string' ? Buffer.from(data) : data

  switch (encoding) {
    case 'gzip':
      return gzipSync(buf)

    case 'deflate':
      return deflateSync(buf)

    case 'br':
      return brotliCompressSync(buf)

    case 'zstd':
      if (!zstdSimple) {
        throw new Error('zstd codec not initialized. Call initZstd() first.')
      }
      return Buffer.from(zstdSimple.compress(new Uint8Array(buf)))

    case 'none':
    default:
      return buf
  }
}

/**
 * List of all supported compression types
 */
export const COMPRESSIONS: Compression[] = ['none', 'gzip', 'deflate', 'br', 'zstd']
