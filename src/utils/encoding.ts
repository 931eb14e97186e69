import { Buffer } from 'node:buffer'

import { CryptoError, CryptoErrorCode, InvalidEncodingError } from '../errors/crypto.error'

// RFC 4648 alphabet, lowercase as onion addresses and descriptor IDs are written.
const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567'

// Unpadded base32 text can only end after these many characters of a final 8-char block.
const VALID_TAIL_LENGTHS = new Set([0, 2, 4, 5, 7])

/**
 * @summary Convert a UTF-8 string to bytes.
 * @param input String to encode.
 * @returns UTF-8 byte representation.
 */
export function toUtf8Bytes(input: string): Uint8Array {
  return new TextEncoder().encode(input)
}

/**
 * @summary Encode bytes as lowercase RFC 4648 base32.
 * @param bytes Byte array to encode.
 * @returns Base32 text. Padding is only emitted when the input length is not a multiple
 * of 5, which never happens for permanent IDs, descriptor IDs or v3 address payloads.
 * @example
 * ```ts
 * base32Encode(new Uint8Array(10)) // 'aaaaaaaaaaaaaaaa'
 * ```
 */
export function base32Encode(bytes: Uint8Array): string {
  let out = ''
  let buffer = 0
  let bits = 0

  for (const byte of bytes) {
    buffer = ((buffer << 8) | byte) & 0xFF_FF
    bits += 8
    while (bits >= 5) {
      out += BASE32_ALPHABET[(buffer >>> (bits - 5)) & 31]
      bits -= 5
    }
  }

  if (bits > 0) {
    out += BASE32_ALPHABET[(buffer << (5 - bits)) & 31]
  }

  const pad = out.length % 8 === 0 ? 0 : 8 - (out.length % 8)
  return out + '='.repeat(pad)
}

/**
 * @summary Decode RFC 4648 base32 text, accepting either case and optional `=` padding.
 * @param input Base32 text.
 * @returns Decoded bytes.
 * @throws {@link InvalidEncodingError} when the text contains characters outside the
 * alphabet or has a length no base32 encoder can produce.
 */
export function base32Decode(input: string): Uint8Array {
  const text = input.toLowerCase().replace(/=+$/, '')
  if (!/^[a-z2-7]*$/.test(text)) {
    throw new InvalidEncodingError('Invalid base32 string: contains illegal characters')
  }
  if (!VALID_TAIL_LENGTHS.has(text.length % 8)) {
    throw new InvalidEncodingError(`Invalid base32 string length ${text.length}`)
  }

  const out = new Uint8Array(Math.floor((text.length * 5) / 8))
  let buffer = 0
  let bits = 0
  let offset = 0

  for (const ch of text) {
    buffer = ((buffer << 5) | BASE32_ALPHABET.indexOf(ch)) & 0x0F_FF
    bits += 5
    if (bits >= 8) {
      out[offset++] = (buffer >>> (bits - 8)) & 0xFF
      bits -= 8
    }
  }
  return out
}

/**
 * @summary Decode base64url string to bytes.
 * @param input Base64url-encoded string (URL-safe, no padding).
 * @returns Decoded byte array.
 * @throws {@link CryptoError} with code `INVALID_ENCODING` when input is malformed.
 */
export function base64UrlDecode(input: string): Uint8Array {
  if (!/^[\w-]*$/.test(input)) {
    throw new CryptoError(
      CryptoErrorCode.INVALID_ENCODING,
      'Invalid base64url string: contains illegal characters',
    )
  }

  const pad = input.length % 4 === 0 ? '' : '='.repeat(4 - (input.length % 4))
  const b64 = input.replaceAll('-', '+').replaceAll('_', '/') + pad
  return new Uint8Array(Buffer.from(b64, 'base64'))
}

/**
 * @summary Interpret bytes as an unsigned big-endian integer.
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n
  return BigInt(`0x${Buffer.from(bytes).toString('hex')}`)
}

/**
 * @summary Minimal unsigned big-endian bytes of a non-negative integer (`0n` is one zero byte).
 * @throws {@link CryptoError} with code `INPUT_VALIDATION_ERROR` for negative values.
 */
export function bigIntToBytes(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new CryptoError(
      CryptoErrorCode.INPUT_VALIDATION_ERROR,
      'Only non-negative integers can be encoded',
    )
  }
  let hex = value.toString(16)
  if (hex.length % 2 === 1) hex = `0${hex}`
  return new Uint8Array(Buffer.from(hex, 'hex'))
}
