import {
  CryptoError,
  CryptoErrorCode,
  DecryptionError,
  InvalidEncodingError,
  KeyFormatError,
} from './crypto.error'

describe('CryptoError', () => {
  describe('construction', () => {
    it('constructs with code only', () => {
      const error = new CryptoError(CryptoErrorCode.KEY_NOT_FOUND)

      expect(error).toBeInstanceOf(Error)
      expect(error).toBeInstanceOf(CryptoError)
      expect(error.code).toBe(CryptoErrorCode.KEY_NOT_FOUND)
      expect(error.message).toBe('KEY_NOT_FOUND')
      expect(error.details).toBeUndefined()
    })

    it('constructs with code, message, and details', () => {
      const details = { path: '/keys/private_key', attempts: 3 }
      const error = new CryptoError(
        CryptoErrorCode.DECRYPTION_ERROR,
        'Could not import RSA key',
        details,
      )

      expect(error.code).toBe(CryptoErrorCode.DECRYPTION_ERROR)
      expect(error.message).toBe('Could not import RSA key')
      expect(error.details).toEqual(details)
    })

    it('has correct name property', () => {
      const error = new CryptoError(CryptoErrorCode.CONFIG_ERROR)
      expect(error.name).toBe('CryptoError')
    })
  })

  describe('named subclasses', () => {
    it('KeyFormatError fixes its code and name', () => {
      const error = new KeyFormatError('not a 1024 bit key', { bits: 2048 })

      expect(error).toBeInstanceOf(CryptoError)
      expect(error.code).toBe(CryptoErrorCode.KEY_FORMAT_ERROR)
      expect(error.name).toBe('KeyFormatError')
      expect(error.details).toEqual({ bits: 2048 })
    })

    it('DecryptionError defaults its message to the code', () => {
      const error = new DecryptionError()

      expect(error.code).toBe(CryptoErrorCode.DECRYPTION_ERROR)
      expect(error.message).toBe('DECRYPTION_ERROR')
      expect(error.name).toBe('DecryptionError')
    })

    it('InvalidEncodingError can be caught as CryptoError', () => {
      try {
        throw new InvalidEncodingError('bad base32')
      } catch (error) {
        expect(error).toBeInstanceOf(CryptoError)
        expect(error).toBeInstanceOf(InvalidEncodingError)
        expect((error as CryptoError).code).toBe(CryptoErrorCode.INVALID_ENCODING)
      }
    })
  })
})

describe('CryptoErrorCode enum', () => {
  it('no duplicate values in enum', () => {
    const values = Object.values(CryptoErrorCode)
    const uniqueValues = new Set(values)
    expect(values.length).toBe(uniqueValues.size)
  })

  it('enum has correct count of codes', () => {
    expect(Object.keys(CryptoErrorCode)).toHaveLength(7)
  })
})
