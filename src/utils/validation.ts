import { CryptoError, CryptoErrorCode, InvalidEncodingError } from '../errors/crypto.error'

import type {
  Ed25519PublicKeyMaterial,
  KeyMaterial,
  RsaPublicKeyMaterial,
} from '../types/keys'

/**
 * @summary Assert that a byte array has an exact length.
 * @param name Descriptive name for error messages.
 * @param bytes Byte array to validate.
 * @param expected Expected length in bytes.
 * @throws {@link InvalidEncodingError} if length doesn't match.
 */
export function assertLength(name: string, bytes: Uint8Array, expected: number): void {
  if (bytes.length !== expected) {
    throw new InvalidEncodingError(`${name} must be ${expected} bytes`, {
      actual: bytes.length,
    })
  }
}

/**
 * @summary Assert that a byte array doesn't exceed a maximum size.
 * @param name Descriptive name for error messages.
 * @param bytes Byte array to validate.
 * @param maxSize Maximum size in bytes.
 * @throws {@link InvalidEncodingError} if too large.
 */
export function assertMaxSize(name: string, bytes: Uint8Array, maxSize: number): void {
  if (bytes.length > maxSize) {
    throw new InvalidEncodingError(
      `${name} exceeds maximum size of ${maxSize} bytes (got ${bytes.length} bytes)`,
    )
  }
}

/**
 * @summary Assert that a number is a safe integer, optionally with a lower bound.
 * @throws {@link CryptoError} with code `INPUT_VALIDATION_ERROR` otherwise.
 */
export function assertInteger(name: string, value: number, min?: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new CryptoError(
      CryptoErrorCode.INPUT_VALIDATION_ERROR,
      `${name} must be an integer`,
      { value },
    )
  }
  if (min !== undefined && value < min) {
    throw new CryptoError(
      CryptoErrorCode.INPUT_VALIDATION_ERROR,
      `${name} must be >= ${min}`,
      { value },
    )
  }
}

/**
 * @summary Type guard for RSA public key material.
 */
export function isRsaKeyMaterial(value: KeyMaterial): value is RsaPublicKeyMaterial {
  return value.kind === 'rsa'
}

/**
 * @summary Type guard for Ed25519 public key material.
 */
export function isEd25519KeyMaterial(
  value: KeyMaterial,
): value is Ed25519PublicKeyMaterial {
  return value.kind === 'ed25519'
}
