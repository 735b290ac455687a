import { describe, expect, it } from 'vitest'
import { ConfigurationError, createConfig, noTieBreak } from '../../src'

describe('createConfig', () => {
  it('should apply defaults', () => {
    const config = createConfig({ logLevel: 'off' })
    expect(config.epochStabilityDepth).toBe(10)
    expect(config.retentionWindow).toBe(10)
    expect(config.maxPageSize).toBe(100)
    expect(config.orphanBufferLimit).toBe(1024)
    expect(config.datadir).toBeUndefined()
    expect(config.rpc).toEqual({
      enabled: true,
      address: '127.0.0.1',
      port: 8546,
      bodyLimit: 1024 * 1024,
      stacktraces: false,
      debug: false,
    })
    expect(config.fees.constant).toBe(BigInt(0))
    expect(config.scorer).toBe(noTieBreak)
  })

  it('should follow the stability depth for the retention window', () => {
    expect(createConfig({ epochStabilityDepth: 4 }).retentionWindow).toBe(4)
    expect(
      createConfig({ epochStabilityDepth: 4, retentionWindow: 7 })
        .retentionWindow,
    ).toBe(7)
  })

  it('should read fees from numbers and decimal strings', () => {
    const config = createConfig({
      fees: { constant: 1, coefficient: '25', certificate: BigInt(3) },
    })
    expect(config.fees.constant).toBe(BigInt(1))
    expect(config.fees.coefficient).toBe(BigInt(25))
    expect(config.fees.certificate).toBe(BigInt(3))
    expect(config.fees.certificateVoteCast).toBe(BigInt(0))
  })

  it('should name the offending option', () => {
    expect(() => createConfig({ maxPageSize: 0 })).toThrow(ConfigurationError)
    expect(() => createConfig({ rpc: { port: 70000 } })).toThrow(
      /Invalid config option rpc\.port/,
    )
  })

  it('should freeze the result', () => {
    const config = createConfig()
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.rpc)).toBe(true)
  })
})
