import zlib from 'zlib'
import { decompress as zstdDecompress } from 'fzstd'
import type { Logger } from '../shared/logger.js'

/**
 * Decompress a buffered body according to its content-encoding. Returns null
 * when the encoding is unknown or the data does not decode.
 */
export function decompressBody(data: Buffer, encoding: string | undefined, logger?: Logger): Buffer | null {
  const normalized = (encoding || '').trim().toLowerCase()
  if (!normalized || normalized === 'identity') {
    return data
  }

  try {
    switch (normalized) {
      case 'gzip':
      case 'x-gzip':
        return zlib.gunzipSync(data)
      case 'deflate':
        return zlib.inflateSync(data)
      case 'br':
        return zlib.brotliDecompressSync(data)
      case 'zstd':
        return Buffer.from(zstdDecompress(new Uint8Array(data)))
      default:
        logger?.debug(`Unsupported content-encoding: ${normalized}`)
        return null
    }
  } catch (err) {
    logger?.warn(`Failed to decode ${normalized} body`, err)
    return null
  }
}
