import type { KeyObject } from 'node:crypto'

/** RSA public key as the (modulus, exponent) pair hashed into a permanent ID. */
export interface RsaPublicKeyMaterial {
  readonly kind: 'rsa'
  readonly modulus: bigint
  readonly exponent: bigint
}

/** Raw 32-byte Ed25519 public key, the payload of a v3 onion address. */
export interface Ed25519PublicKeyMaterial {
  readonly kind: 'ed25519'
  readonly publicKey: Uint8Array
}

/** Public key material of a hidden service, tagged by key type. */
export type KeyMaterial = RsaPublicKeyMaterial | Ed25519PublicKeyMaterial

/** Onion address versions: 2 for RSA (legacy), 3 for Ed25519. */
export type OnionAddressVersion = 2 | 3

/** A loaded RSA service key with its public half already extracted. */
export interface RsaServicePrivateKey {
  readonly kind: 'rsa'
  readonly privateKey: KeyObject
  readonly publicKey: RsaPublicKeyMaterial
}

/** A loaded Ed25519 service key read from a tagged secret file. */
export interface Ed25519ServicePrivateKey {
  readonly kind: 'ed25519'
  /** The 32 secret bytes found after the file tag. */
  readonly secret: Uint8Array
  readonly privateKey: KeyObject
  readonly publicKey: Ed25519PublicKeyMaterial
}

export type ServicePrivateKey = RsaServicePrivateKey | Ed25519ServicePrivateKey
