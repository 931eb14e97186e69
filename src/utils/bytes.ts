import { CryptoError, CryptoErrorCode } from '../errors/crypto.error'

/**
 * @summary Concatenate multiple byte arrays.
 * @param chunks One or more Uint8Array chunks.
 * @returns A new Uint8Array containing all chunks in order.
 */
export function concatBytes(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return out
}

/**
 * @summary Encode an unsigned 32-bit integer as 4 big-endian bytes.
 * @throws {@link CryptoError} with code `INPUT_VALIDATION_ERROR` outside 0..2^32-1.
 */
export function uint32BE(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xFF_FF_FF_FF) {
    throw new CryptoError(
      CryptoErrorCode.INPUT_VALIDATION_ERROR,
      `Value ${value} does not fit in an unsigned 32-bit integer`,
    )
  }
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value, false)
  return out
}

/**
 * @summary Encode an integer 0..255 as a single byte.
 * @throws {@link CryptoError} with code `INPUT_VALIDATION_ERROR` outside 0..255.
 */
export function uint8(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xFF) {
    throw new CryptoError(
      CryptoErrorCode.INPUT_VALIDATION_ERROR,
      `Value ${value} does not fit in a single byte`,
    )
  }
  return Uint8Array.of(value)
}

/**
 * @summary Compare two byte arrays for equality.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * @summary Overwrite the provided byte array with zeros.
 * @param bytes The array to zeroize.
 * @remarks
 * Used on raw key file contents once the key has been imported. JavaScript strings are
 * immutable and cannot be cleared this way, and the garbage collector may still hold
 * copies, so this narrows the window rather than closing it.
 */
export function zeroize(bytes: Uint8Array): void {
  bytes.fill(0)
}
