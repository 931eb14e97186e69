import * as pkg from './index'

describe('package barrel exports', () => {
  it('exposes the module, services and identifier functions', () => {
    expect(pkg.OnionModule).toBeDefined()
    expect(pkg.OnionAddressService).toBeDefined()
    expect(pkg.DescriptorIdService).toBeDefined()
    expect(pkg.ServiceKeyLoader).toBeDefined()
    expect(pkg.ControlAuthService).toBeDefined()
    expect(pkg.calcDescriptorIdB32).toBeInstanceOf(Function)
    expect(pkg.calcOnionAddress).toBeInstanceOf(Function)
    expect(pkg.addPkcs1Padding).toBeInstanceOf(Function)
    expect(pkg.roundedTimestamp).toBeInstanceOf(Function)
    expect(pkg.zeroize).toBeInstanceOf(Function)
  })

  it('derives a descriptor ID through the public API', () => {
    expect(pkg.calcDescriptorIdB32('abcdefghijklmnop', 1_700_000_000, 1)).toBe(
      'pmt76dlnijzivmspu4sxdh54piqs66y3',
    )
  })
})
