import { InvalidEncodingError } from '../errors/crypto.error'
import { concatBytes } from '../utils/bytes'
import { assertMaxSize } from '../utils/validation'

/** Size of the padded block, the byte length of a 1024-bit RSA modulus. */
export const PKCS1_BLOCK_SIZE = 128

/** Largest message that fits after the 3 framing bytes. */
export const PKCS1_MAX_MESSAGE_LENGTH = PKCS1_BLOCK_SIZE - 3

/**
 * @summary Frame a message as a PKCS#1 v1.5 signature block (block type 1).
 * @param message At most 125 bytes, typically a digest to be signed.
 * @returns `00 01 ∥ FF…FF ∥ 00 ∥ message`, always 128 bytes.
 * @throws {@link InvalidEncodingError} when the message is longer than 125 bytes.
 * @example
 * ```ts
 * const block = addPkcs1Padding(new TextEncoder().encode('abc'))
 * // block[0] === 0x00, block[1] === 0x01, block[124] === 0x00
 * ```
 */
export function addPkcs1Padding(message: Uint8Array): Uint8Array {
  assertMaxSize('PKCS#1 message', message, PKCS1_MAX_MESSAGE_LENGTH)
  const padding = new Uint8Array(PKCS1_MAX_MESSAGE_LENGTH - message.length).fill(0xFF)
  const block = concatBytes(Uint8Array.of(0x00, 0x01), padding, Uint8Array.of(0x00), message)
  if (block.length !== PKCS1_BLOCK_SIZE) {
    throw new InvalidEncodingError(`Padded block must be ${PKCS1_BLOCK_SIZE} bytes`)
  }
  return block
}
