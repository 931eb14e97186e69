import { Injectable } from '@nestjs/common'

import {
  addressVersion,
  calcOnionAddress,
  decodeOnionAddress,
  decodeV3OnionAddress,
  getOnionAddressVersion,
} from '../identifiers/onion-address'
import { calcPermanentId } from '../identifiers/permanent-id'

import type {
  Ed25519PublicKeyMaterial,
  KeyMaterial,
  OnionAddressVersion,
  RsaPublicKeyMaterial,
  ServicePrivateKey,
} from '../types/keys'

/**
 * @summary Onion address encoding and decoding for hidden service keys.
 * @remarks
 * Thin injectable wrapper over the identifier functions. Addresses are cached per key
 * object, so repeated lookups for a loaded key skip the hashing.
 */
@Injectable()
export class OnionAddressService {
  private readonly addresses = new WeakMap<KeyMaterial, string>()

  /**
   * @summary Onion address of a public key: 16 characters for RSA, 56 for Ed25519.
   * @example
   * ```ts
   * addresses.fromKey({ kind: 'rsa', modulus, exponent })
   * ```
   */
  fromKey(key: KeyMaterial): string {
    const cached = this.addresses.get(key)
    if (cached !== undefined) return cached
    const address = calcOnionAddress(key)
    this.addresses.set(key, address)
    return address
  }

  /**
   * @summary Onion address of a loaded service key.
   */
  fromServiceKey(key: ServicePrivateKey): string {
    return this.fromKey(key.publicKey)
  }

  /** Address version a key produces. */
  versionOfKey(key: KeyMaterial): OnionAddressVersion {
    return addressVersion(key)
  }

  /**
   * @summary Address version of an address string.
   * @throws {@link InvalidEncodingError} for a length that is neither v2 nor v3.
   */
  version(address: string): OnionAddressVersion {
    return getOnionAddressVersion(address)
  }

  /**
   * @summary Permanent ID carried by a v2 address.
   * @throws {@link InvalidEncodingError} when the address is malformed.
   */
  decode(address: string): Uint8Array {
    return decodeOnionAddress(address)
  }

  /**
   * @summary Public key carried by a v3 address, after checking version and checksum.
   * @throws {@link InvalidEncodingError} when the address is malformed.
   */
  decodeV3(address: string): Ed25519PublicKeyMaterial {
    return decodeV3OnionAddress(address)
  }

  permanentId(key: RsaPublicKeyMaterial): Uint8Array {
    return calcPermanentId(key)
  }
}
