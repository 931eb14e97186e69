import { KeyFormatError } from '../errors/crypto.error'
import { encodeDerInteger, encodeDerSequence } from '../utils/der'
import { base64UrlDecode, bytesToBigInt } from '../utils/encoding'
import { sha1 } from '../utils/hash'

import type { RsaPublicKeyMaterial } from '../types/keys'
import type { KeyObject } from 'node:crypto'

/** Length of a permanent ID, the truncated key digest. */
export const PERMANENT_ID_LENGTH = 10

/**
 * @summary DER-encode an RSA public key as SEQUENCE { modulus, exponent }.
 * @remarks This is the PKCS#1 `RSAPublicKey` structure, used here only as digest input.
 * @throws {@link KeyFormatError} when modulus or exponent is not positive.
 */
export function encodeRsaPublicKeyDer(key: RsaPublicKeyMaterial): Uint8Array {
  if (key.modulus <= 0n || key.exponent <= 0n) {
    throw new KeyFormatError('RSA modulus and exponent must be positive')
  }
  return encodeDerSequence(encodeDerInteger(key.modulus), encodeDerInteger(key.exponent))
}

/**
 * @summary SHA-1 digest of the DER-encoded RSA public key (20 bytes).
 */
export function calcKeyDigest(key: RsaPublicKeyMaterial): Uint8Array {
  return sha1(encodeRsaPublicKeyDer(key))
}

/**
 * @summary Permanent ID of a hidden service: the first 10 bytes of its key digest.
 * @example
 * ```ts
 * const id = calcPermanentId(rsaKeyMaterialFromKeyObject(publicKey))
 * ```
 */
export function calcPermanentId(key: RsaPublicKeyMaterial): Uint8Array {
  return calcKeyDigest(key).slice(0, PERMANENT_ID_LENGTH)
}

/**
 * @summary Extract (modulus, exponent) from a public or private RSA key object.
 * @throws {@link KeyFormatError} when the key is not RSA.
 */
export function rsaKeyMaterialFromKeyObject(key: KeyObject): RsaPublicKeyMaterial {
  if (key.asymmetricKeyType !== 'rsa') {
    throw new KeyFormatError('Expected an RSA key', {
      keyType: key.asymmetricKeyType ?? key.type,
    })
  }
  const jwk = key.export({ format: 'jwk' })
  if (!jwk.n || !jwk.e) {
    throw new KeyFormatError('RSA key is missing its modulus or exponent')
  }
  return {
    kind: 'rsa',
    modulus: bytesToBigInt(base64UrlDecode(jwk.n)),
    exponent: bytesToBigInt(base64UrlDecode(jwk.e)),
  }
}
