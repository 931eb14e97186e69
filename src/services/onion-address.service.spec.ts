/* eslint-disable node/prefer-global/buffer -- convenience */
import { Buffer } from 'node:buffer'
import { createSecretKey } from 'node:crypto'

import { InvalidEncodingError } from '../errors/crypto.error'

import { OnionAddressService } from './onion-address.service'

import type { KeyMaterial, RsaPublicKeyMaterial, ServicePrivateKey } from '../types/keys'

const ZERO_V3_ADDRESS = 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaam2dqd'

describe('OnionAddressService', () => {
  const svc = new OnionAddressService()
  const toyKey: RsaPublicKeyMaterial = { kind: 'rsa', modulus: 3233n, exponent: 17n }

  it('encodes v2 and v3 addresses', () => {
    expect(svc.fromKey(toyKey)).toBe('5kt5jj4425xluynv')
    expect(svc.fromKey({ kind: 'ed25519', publicKey: new Uint8Array(32) })).toBe(
      ZERO_V3_ADDRESS,
    )
  })

  it('returns the cached address for the same key object', () => {
    const key: KeyMaterial = { kind: 'rsa', modulus: 3233n, exponent: 17n }
    const first = svc.fromKey(key)
    expect(svc.fromKey(key)).toBe(first)
  })

  it('encodes the public half of a loaded service key', () => {
    const serviceKey: ServicePrivateKey = {
      kind: 'rsa',
      privateKey: createSecretKey(Buffer.alloc(16)),
      publicKey: { kind: 'rsa', modulus: 3233n, exponent: 17n },
    }
    expect(svc.fromServiceKey(serviceKey)).toBe('5kt5jj4425xluynv')
  })

  it('reports versions for keys and addresses', () => {
    expect(svc.versionOfKey(toyKey)).toBe(2)
    expect(svc.version('5kt5jj4425xluynv.onion')).toBe(2)
    expect(svc.version(ZERO_V3_ADDRESS)).toBe(3)
    expect(() => svc.version('short')).toThrow(InvalidEncodingError)
  })

  it('decodes addresses', () => {
    expect(Buffer.from(svc.decode('5kt5jj4425xluynv')).toString('hex')).toBe(
      'eaa7d4a79cd76eba61b5',
    )
    expect([...svc.decodeV3(ZERO_V3_ADDRESS).publicKey]).toEqual(new Array(32).fill(0))
  })

  it('derives the permanent ID', () => {
    expect(Buffer.from(svc.permanentId(toyKey)).toString('hex')).toBe('eaa7d4a79cd76eba61b5')
  })
})
