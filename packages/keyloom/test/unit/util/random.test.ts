import { describe, it, expect } from 'vitest'
import { nodeRandomSource } from '../../../src/util/random.js'

describe('nodeRandomSource', () => {
  it('returns the requested number of bytes', () => {
    const bytes = nodeRandomSource.getRandomBytes(16)
    expect(bytes).toBeInstanceOf(Uint8Array)
    expect(bytes.byteLength).toBe(16)
  })

  it('returns an empty array for zero bytes', () => {
    expect(nodeRandomSource.getRandomBytes(0).byteLength).toBe(0)
  })

  it('returns distinct output on successive calls', () => {
    const a = nodeRandomSource.getRandomBytes(32)
    const b = nodeRandomSource.getRandomBytes(32)
    expect(Buffer.from(a).toString('hex')).not.toBe(Buffer.from(b).toString('hex'))
  })

  it('rejects negative and fractional lengths', () => {
    expect(() => nodeRandomSource.getRandomBytes(-1)).toThrow(RangeError)
    expect(() => nodeRandomSource.getRandomBytes(1.5)).toThrow(
      'Random byte length must be a non-negative integer, got 1.5',
    )
  })
})
