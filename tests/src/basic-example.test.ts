import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { runBasicExample } from 'radix-heap-example-basic'
import { DEFAULT_CAPACITY_HINT, loadConfig } from 'radix-heap-example-basic/config'

describe('basic example', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('prints the words in key order', () => {
    const result = runBasicExample(8)
    expect(result.sentence).toBe('hello amazing world of rust development')
    expect(result.remaining).toBe('rust development')
    expect(result.extracted).toEqual([1, 7, 13, 18])
    expect(console.log).toHaveBeenNthCalledWith(1, 'hello amazing world of rust development')
    expect(console.log).toHaveBeenNthCalledWith(2, 'rust development')
  })

  test('works without a capacity hint', () => {
    expect(runBasicExample(0).remaining).toBe('rust development')
  })

  test('checks the capacity against the hint', () => {
    expect(runBasicExample(12).sentence).toBe('hello amazing world of rust development')
  })

  test('uses the default capacity hint', () => {
    expect(loadConfig({})).toEqual({ capacityHint: DEFAULT_CAPACITY_HINT })
    expect(console.log).toHaveBeenCalledWith('Using default capacity hint, 8')
  })

  test('reads the capacity hint from the environment', () => {
    expect(loadConfig({ RADIX_HEAP_CAPACITY: '12' })).toEqual({ capacityHint: 12 })
    expect(console.log).toHaveBeenCalledWith(
      'Using capacity hint from environment variable RADIX_HEAP_CAPACITY',
    )
  })

  test('falls back to the default for invalid values', () => {
    expect(loadConfig({ RADIX_HEAP_CAPACITY: 'lots' })).toEqual({ capacityHint: 8 })
    expect(loadConfig({ RADIX_HEAP_CAPACITY: '-3' })).toEqual({ capacityHint: 8 })
    expect(console.warn).toHaveBeenCalledTimes(2)
  })
})
