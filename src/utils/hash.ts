import { createHash } from 'node:crypto'

/**
 * @summary SHA-1 over the concatenation of the given chunks.
 * @remarks Chunks are fed to the hash in order with no separators between them.
 */
export function sha1(...chunks: Uint8Array[]): Uint8Array {
  const h = createHash('sha1')
  for (const chunk of chunks) h.update(chunk)
  return new Uint8Array(h.digest())
}

/**
 * @summary SHA3-256 over the concatenation of the given chunks.
 */
export function sha3256(...chunks: Uint8Array[]): Uint8Array {
  const h = createHash('sha3-256')
  for (const chunk of chunks) h.update(chunk)
  return new Uint8Array(h.digest())
}
