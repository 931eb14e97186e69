import { CryptoErrorCode, InvalidEncodingError } from '../errors/crypto.error'
import { toUtf8Bytes } from '../utils/encoding'

import { addPkcs1Padding } from './pkcs1-padding'

describe('addPkcs1Padding', () => {
  it('frames "abc" with 122 bytes of 0xff', () => {
    const block = addPkcs1Padding(toUtf8Bytes('abc'))

    expect(block).toHaveLength(128)
    expect([...block.subarray(0, 2)]).toEqual([0x00, 0x01])
    expect([...block.subarray(2, 124)]).toEqual(Array.from({ length: 122 }, () => 0xFF))
    expect(block[124]).toBe(0x00)
    expect([...block.subarray(125)]).toEqual([0x61, 0x62, 0x63])
  })

  it('is 128 bytes for every message length from 0 to 125', () => {
    for (let length = 0; length <= 125; length++) {
      const block = addPkcs1Padding(new Uint8Array(length).fill(0x42))
      expect(block).toHaveLength(128)
      expect(block[127 - length]).toBe(0x00)
    }
  })

  it('omits the 0xff run for a 125-byte message', () => {
    const block = addPkcs1Padding(new Uint8Array(125).fill(7))
    expect([...block.subarray(0, 4)]).toEqual([0x00, 0x01, 0x00, 0x07])
  })

  it('rejects messages longer than 125 bytes', () => {
    expect(() => addPkcs1Padding(new Uint8Array(126))).toThrow(InvalidEncodingError)
    expect(() => addPkcs1Padding(new Uint8Array(200))).toThrow(
      expect.objectContaining({ code: CryptoErrorCode.INVALID_ENCODING }),
    )
  })
})
