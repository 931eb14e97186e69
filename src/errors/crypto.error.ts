/**
 * @summary Error codes for identifier derivation, key loading, control authentication
 * and configuration.
 */
export enum CryptoErrorCode {
  KEY_FORMAT_ERROR = 'KEY_FORMAT_ERROR',
  DECRYPTION_ERROR = 'DECRYPTION_ERROR',
  INVALID_ENCODING = 'INVALID_ENCODING',
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',
  CONFIG_ERROR = 'CONFIG_ERROR',
  INPUT_VALIDATION_ERROR = 'INPUT_VALIDATION_ERROR',
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
}

/**
 * @summary Custom error carrying a {@link CryptoErrorCode} and optional details.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode
  readonly details?: Record<string, unknown>

  /**
   * @summary Construct a CryptoError.
   * @param code Machine-readable error code.
   * @param message Optional human-readable message.
   * @param details Optional structured details for diagnostics.
   */
  constructor(
    code: CryptoErrorCode,
    message?: string,
    details?: Record<string, unknown>,
  ) {
    super(message ?? code)
    this.name = 'CryptoError'
    this.code = code
    this.details = details
  }
}

/**
 * @summary The key is not an RSA private key of a supported size, or not a key at all.
 */
export class KeyFormatError extends CryptoError {
  constructor(message?: string, details?: Record<string, unknown>) {
    super(CryptoErrorCode.KEY_FORMAT_ERROR, message, details)
    this.name = 'KeyFormatError'
  }
}

/**
 * @summary A private key could not be imported within the passphrase retry budget.
 */
export class DecryptionError extends CryptoError {
  constructor(message?: string, details?: Record<string, unknown>) {
    super(CryptoErrorCode.DECRYPTION_ERROR, message, details)
    this.name = 'DecryptionError'
  }
}

/** Malformed base32, wrong-length identifier bytes, or an oversized padding input. */
export class InvalidEncodingError extends CryptoError {
  constructor(message?: string, details?: Record<string, unknown>) {
    super(CryptoErrorCode.INVALID_ENCODING, message, details)
    this.name = 'InvalidEncodingError'
  }
}
