/**
 * @file JSON Helper Tests
 */

import { describe, it, expect } from 'vitest'
import { findValue, isJsonObject } from '../../src/call/json.js'
import type { JsonValue } from '../../src/call/json.js'

describe('isJsonObject', () => {
  it('should accept plain objects', () => {
    expect(isJsonObject({})).toBe(true)
    expect(isJsonObject({ result: 1 })).toBe(true)
  })

  it('should reject arrays, null and primitives', () => {
    expect(isJsonObject([])).toBe(false)
    expect(isJsonObject(null)).toBe(false)
    expect(isJsonObject('result')).toBe(false)
    expect(isJsonObject(42)).toBe(false)
  })
})

describe('findValue', () => {
  it('should find a top-level field', () => {
    expect(findValue({ id: '1', result: { version: 1 } }, 'result')).toEqual({ version: 1 })
  })

  it('should find a field nested below intermediate structure', () => {
    const response = { payload: { envelope: { result: ['a', 'b'] } } }

    expect(findValue(response, 'result')).toEqual(['a', 'b'])
  })

  it('should search inside arrays', () => {
    const node: JsonValue = { items: [{ other: 1 }, { label: 'second' }] }

    expect(findValue(node, 'label')).toBe('second')
  })

  it('should return null for a field holding JSON null', () => {
    expect(findValue({ id: '1', result: null }, 'result')).toBeNull()
  })

  it('should return undefined when no field matches', () => {
    expect(findValue({ id: '1' }, 'result')).toBeUndefined()
    expect(findValue('result', 'result')).toBeUndefined()
    expect(findValue([], 'result')).toBeUndefined()
  })

  it('should return the first match in document order, depth first', () => {
    const node = {
      first: { result: 'nested' },
      result: 'top-level',
    }

    expect(findValue(node, 'result')).toBe('nested')
  })

  it('should prefer a field over deeper matches inside its own value', () => {
    const node = { result: { result: 'inner' } }

    expect(findValue(node, 'result')).toEqual({ result: 'inner' })
  })

  it('should keep falsy values', () => {
    expect(findValue({ result: 0 }, 'result')).toBe(0)
    expect(findValue({ result: false }, 'result')).toBe(false)
    expect(findValue({ result: '' }, 'result')).toBe('')
  })
})
