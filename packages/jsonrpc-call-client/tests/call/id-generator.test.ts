/**
 * @file Correlation ID Generator Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { randomLongId, sequentialIds } from '../../src/call/id-generator.js'

const MIN_LONG = -(2n ** 63n)
const MAX_LONG = 2n ** 63n - 1n

describe('randomLongId', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should produce a signed 64-bit integer as a decimal string', () => {
    for (let i = 0; i < 50; i++) {
      const id = randomLongId()

      expect(id).toMatch(/^-?\d+$/)
      const value = BigInt(id)
      expect(value >= MIN_LONG && value <= MAX_LONG).toBe(true)
    }
  })

  it('should combine two 32-bit halves of the random source', () => {
    vi.spyOn(Math, 'random').mockReturnValueOnce(0).mockReturnValueOnce(0.5)

    expect(randomLongId()).toBe('2147483648')
  })

  it('should wrap into the negative range when the high bit is set', () => {
    vi.spyOn(Math, 'random').mockReturnValueOnce(0.5).mockReturnValueOnce(0)

    expect(randomLongId()).toBe('-9223372036854775808')
  })
})

describe('sequentialIds', () => {
  it('should count up from 1 by default', () => {
    const nextId = sequentialIds()

    expect(nextId()).toBe('1')
    expect(nextId()).toBe('2')
    expect(nextId()).toBe('3')
  })

  it('should start from the given number', () => {
    const nextId = sequentialIds(100)

    expect(nextId()).toBe('100')
    expect(nextId()).toBe('101')
  })

  it('should keep separate generators independent', () => {
    const a = sequentialIds()
    const b = sequentialIds()

    a()
    a()

    expect(b()).toBe('1')
  })
})
