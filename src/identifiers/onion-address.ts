import { InvalidEncodingError } from '../errors/crypto.error'
import { bytesEqual, concatBytes } from '../utils/bytes'
import { base32Decode, base32Encode, toUtf8Bytes } from '../utils/encoding'
import { sha3256 } from '../utils/hash'
import { assertLength, isEd25519KeyMaterial, isRsaKeyMaterial } from '../utils/validation'

import { PERMANENT_ID_LENGTH, calcPermanentId, encodeRsaPublicKeyDer } from './permanent-id'

import type {
  Ed25519PublicKeyMaterial,
  KeyMaterial,
  OnionAddressVersion,
} from '../types/keys'

export const ED25519_PUBLIC_KEY_LENGTH = 32
export const V2_ADDRESS_LENGTH = 16
export const V3_ADDRESS_LENGTH = 56

const V3_CHECKSUM_PREFIX = toUtf8Bytes('.onion checksum')
const V3_CHECKSUM_LENGTH = 2
const V3_VERSION = 0x03

function stripOnionSuffix(address: string): string {
  return address.replace(/\.onion$/i, '')
}

/**
 * @summary First two bytes of SHA3-256(".onion checksum" ∥ pubkey ∥ version).
 */
export function calcV3Checksum(publicKey: Uint8Array, version = V3_VERSION): Uint8Array {
  assertLength('Ed25519 public key', publicKey, ED25519_PUBLIC_KEY_LENGTH)
  return sha3256(V3_CHECKSUM_PREFIX, publicKey, Uint8Array.of(version)).slice(
    0,
    V3_CHECKSUM_LENGTH,
  )
}

/**
 * @summary Encode a 10-byte permanent ID as a v2 onion address (without `.onion`).
 */
export function encodeV2OnionAddress(permanentId: Uint8Array): string {
  assertLength('permanent ID', permanentId, PERMANENT_ID_LENGTH)
  return base32Encode(permanentId)
}

/**
 * @summary Encode a raw Ed25519 public key as a v3 onion address (without `.onion`).
 */
export function encodeV3OnionAddress(publicKey: Uint8Array): string {
  const checksum = calcV3Checksum(publicKey)
  return base32Encode(concatBytes(publicKey, checksum, Uint8Array.of(V3_VERSION)))
}

/**
 * @summary Onion address of a service key: v2 for RSA material, v3 for Ed25519.
 * @example
 * ```ts
 * calcOnionAddress({ kind: 'ed25519', publicKey })
 * // 56 lowercase base32 characters
 * ```
 */
export function calcOnionAddress(key: KeyMaterial): string {
  switch (key.kind) {
    case 'rsa': {
      return encodeV2OnionAddress(calcPermanentId(key))
    }
    case 'ed25519': {
      return encodeV3OnionAddress(key.publicKey)
    }
  }
}

/**
 * @summary Address version produced for the given key material.
 */
export function addressVersion(key: KeyMaterial): OnionAddressVersion {
  return isRsaKeyMaterial(key) ? 2 : 3
}

/**
 * @summary Public key bytes of the given key material.
 * @returns The DER `RSAPublicKey` for RSA, the raw 32 bytes for Ed25519.
 */
export function publicKeyBytes(key: KeyMaterial): Uint8Array {
  return isEd25519KeyMaterial(key) ? key.publicKey : encodeRsaPublicKeyDer(key)
}

/**
 * @summary Address version of an address string, judged by its length.
 * @throws {@link InvalidEncodingError} when the length matches neither version.
 */
export function getOnionAddressVersion(address: string): OnionAddressVersion {
  const text = stripOnionSuffix(address)
  if (text.length === V2_ADDRESS_LENGTH) return 2
  if (text.length === V3_ADDRESS_LENGTH) return 3
  throw new InvalidEncodingError('Onion address has an unrecognised length', {
    length: text.length,
  })
}

/**
 * @summary Decode a v2 onion address back into its permanent ID.
 * @param address Base32 address in any case, with or without `.onion`.
 * @throws {@link InvalidEncodingError} when the address is not base32 or does not decode
 * to exactly 10 bytes.
 */
export function decodeOnionAddress(address: string): Uint8Array {
  const permanentId = base32Decode(stripOnionSuffix(address))
  assertLength('permanent ID', permanentId, PERMANENT_ID_LENGTH)
  return permanentId
}

/**
 * @summary Decode a v3 onion address and verify its version byte and checksum.
 * @throws {@link InvalidEncodingError} on bad length, version or checksum.
 */
export function decodeV3OnionAddress(address: string): Ed25519PublicKeyMaterial {
  const raw = base32Decode(stripOnionSuffix(address))
  assertLength(
    'v3 onion address payload',
    raw,
    ED25519_PUBLIC_KEY_LENGTH + V3_CHECKSUM_LENGTH + 1,
  )

  const publicKey = raw.slice(0, ED25519_PUBLIC_KEY_LENGTH)
  const checksum = raw.slice(
    ED25519_PUBLIC_KEY_LENGTH,
    ED25519_PUBLIC_KEY_LENGTH + V3_CHECKSUM_LENGTH,
  )
  const version = raw[raw.length - 1]
  if (version !== V3_VERSION) {
    throw new InvalidEncodingError('Unsupported onion address version', { version })
  }
  if (!bytesEqual(checksum, calcV3Checksum(publicKey, version))) {
    throw new InvalidEncodingError('Onion address checksum mismatch')
  }
  return { kind: 'ed25519', publicKey }
}
