import zlib from 'zlib'
import { decompress as zstdDecompress } from 'fzstd'

export function generateId(): string {
  return Math.random().toString(36).substring(2, 9)
}

/**
 * Decode HTTP chunked transfer encoding
 * Handles the hex chunk size prefixes that appear when transfer-encoding: chunked is used
 */
function decodeChunkedEncoding(body: Buffer): Buffer {
  const chunks: Buffer[] = []
  let offset = 0

  while (offset < body.length) {
    const crlfIndex = body.indexOf('\r\n', offset)
    if (crlfIndex === -1) {
      break
    }

    const chunkSize = parseInt(body.toString('utf-8', offset, crlfIndex).trim(), 16)
    if (isNaN(chunkSize) || chunkSize === 0) {
      break
    }

    const chunkStart = crlfIndex + 2
    const chunkEnd = chunkStart + chunkSize
    if (chunkEnd > body.length) {
      break
    }

    chunks.push(body.subarray(chunkStart, chunkEnd))
    offset = chunkEnd + 2
  }

  return Buffer.concat(chunks)
}

function decodeOne(data: Buffer, encoding: string): Buffer {
  switch (encoding) {
    case 'gzip':
    case 'x-gzip':
      return zlib.gunzipSync(data)
    case 'deflate':
      return zlib.inflateSync(data)
    case 'br':
      return zlib.brotliDecompressSync(data)
    case 'zstd': {
      const isChunked = /^[0-9a-fA-F]+\r\n/.test(data.toString('utf-8', 0, Math.min(100, data.length)))
      const frame = isChunked ? decodeChunkedEncoding(data) : data
      return Buffer.from(zstdDecompress(new Uint8Array(frame)))
    }
    case 'identity':
      return data
    default:
      throw new Error(`Unsupported content encoding: ${encoding}`)
  }
}

/**
 * Split a Content-Encoding header value into the codings to undo, outermost first
 */
export function parseContentEncoding(contentEncoding: string | string[] | undefined): string[] {
  if (contentEncoding === undefined) {
    return []
  }
  const joined = Array.isArray(contentEncoding) ? contentEncoding.join(',') : contentEncoding
  return joined
    .split(',')
    .map(coding => coding.trim().toLowerCase())
    .filter(coding => coding.length > 0)
    .reverse()
}

/**
 * Decode a response body according to its Content-Encoding header
 *
 * Codings listed in the header are undone in reverse order. String bodies
 * carrying an encoding are treated as latin1 bytes. If any coding is unknown or
 * the data is corrupt, the raw body is returned unchanged.
 */
export function decodeBody(body: string | Buffer, contentEncoding: string | string[] | undefined): string {
  const codings = parseContentEncoding(contentEncoding)
  const raw = typeof body === 'string' ? body : body.toString('utf-8')

  if (codings.length === 0 || codings.every(coding => coding === 'identity')) {
    return raw
  }

  try {
    let data: Buffer = typeof body === 'string' ? Buffer.from(body, 'latin1') : body
    for (const coding of codings) {
      data = decodeOne(data, coding)
    }
    return data.toString('utf-8')
  } catch (err) {
    console.error(`[decodeBody] Could not decode body with encoding ${codings.join(', ')}:`, err)
  }

  return raw
}
