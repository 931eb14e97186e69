import { concatBytes } from './bytes'
import { bigIntToBytes } from './encoding'

const TAG_INTEGER = 0x02
const TAG_SEQUENCE = 0x30

/**
 * @summary Encode a DER definite length (short form below 128, long form otherwise).
 */
export function encodeDerLength(length: number): Uint8Array {
  if (length < 0x80) return Uint8Array.of(length)
  const bytes = bigIntToBytes(BigInt(length))
  return concatBytes(Uint8Array.of(0x80 | bytes.length), bytes)
}

/**
 * @summary Encode a non-negative integer as a DER INTEGER.
 * @remarks
 * Content is the minimal big-endian form, with a leading zero byte when the high bit
 * would otherwise mark the value as negative.
 */
export function encodeDerInteger(value: bigint): Uint8Array {
  let content = bigIntToBytes(value)
  if (content[0] & 0x80) content = concatBytes(Uint8Array.of(0), content)
  return concatBytes(Uint8Array.of(TAG_INTEGER), encodeDerLength(content.length), content)
}

/**
 * @summary Wrap already-encoded elements in a DER SEQUENCE.
 */
export function encodeDerSequence(...elements: Uint8Array[]): Uint8Array {
  const content = concatBytes(...elements)
  return concatBytes(Uint8Array.of(TAG_SEQUENCE), encodeDerLength(content.length), content)
}
