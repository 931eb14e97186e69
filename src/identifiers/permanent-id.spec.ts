import { Buffer } from 'node:buffer'
import { createHash, generateKeyPairSync } from 'node:crypto'

import { CryptoErrorCode, KeyFormatError } from '../errors/crypto.error'

import {
  PERMANENT_ID_LENGTH,
  calcKeyDigest,
  calcPermanentId,
  encodeRsaPublicKeyDer,
  rsaKeyMaterialFromKeyObject,
} from './permanent-id'

import type { RsaPublicKeyMaterial } from '../types/keys'

const hex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex')

describe('permanent ID', () => {
  const toyKey: RsaPublicKeyMaterial = { kind: 'rsa', modulus: 3233n, exponent: 17n }

  it('digests the DER sequence of modulus and exponent', () => {
    expect(hex(encodeRsaPublicKeyDer(toyKey))).toBe('300702020ca1020111')
    expect(hex(calcKeyDigest(toyKey))).toBe('eaa7d4a79cd76eba61b5e178848c7b500ee32add')
  })

  it('truncates the digest to 10 bytes', () => {
    const id = calcPermanentId(toyKey)
    expect(id).toHaveLength(PERMANENT_ID_LENGTH)
    expect(hex(id)).toBe('eaa7d4a79cd76eba61b5')
  })

  it('digests a 1024-bit modulus with a long-form DER length', () => {
    const key: RsaPublicKeyMaterial = {
      kind: 'rsa',
      modulus: (1n << 1023n) | 1n,
      exponent: 65_537n,
    }
    expect(hex(calcKeyDigest(key))).toBe('d581aba27172521078fbb2e8daaca1fb9774372c')
  })

  it('rejects non-positive key components', () => {
    expect(() => calcKeyDigest({ kind: 'rsa', modulus: 0n, exponent: 3n })).toThrow(
      KeyFormatError,
    )
    expect(() => calcKeyDigest({ kind: 'rsa', modulus: 3233n, exponent: -1n })).toThrow(
      expect.objectContaining({ code: CryptoErrorCode.KEY_FORMAT_ERROR }),
    )
  })

  describe('with generated RSA keys', () => {
    const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 1024 })

    it('encodes the same bytes as a PKCS#1 public key export', () => {
      const material = rsaKeyMaterialFromKeyObject(publicKey)
      const pkcs1 = publicKey.export({ type: 'pkcs1', format: 'der' })
      expect(hex(encodeRsaPublicKeyDer(material))).toBe(pkcs1.toString('hex'))
    })

    it('extracts identical material from the private and public halves', () => {
      const fromPrivate = rsaKeyMaterialFromKeyObject(privateKey)
      const fromPublic = rsaKeyMaterialFromKeyObject(publicKey)
      expect(fromPrivate).toEqual(fromPublic)
      expect(fromPublic.exponent).toBe(65_537n)
      expect(fromPublic.modulus.toString(2)).toHaveLength(1024)
    })

    it('digests the PKCS#1 encoding with SHA-1', () => {
      const pkcs1 = publicKey.export({ type: 'pkcs1', format: 'der' })
      const expected = createHash('sha1').update(pkcs1).digest('hex')
      expect(hex(calcKeyDigest(rsaKeyMaterialFromKeyObject(publicKey)))).toBe(expected)
    })
  })

  it('refuses non-RSA key objects', () => {
    const { publicKey } = generateKeyPairSync('ed25519')
    expect(() => rsaKeyMaterialFromKeyObject(publicKey)).toThrow(KeyFormatError)
  })
})
