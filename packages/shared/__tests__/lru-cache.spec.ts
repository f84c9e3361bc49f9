import { describe, expect, it } from 'vitest'

import { LruCache } from '../src/lru-cache.js'

describe('LruCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new LruCache<string, number>(2)
    cache.set('a', 1)
    cache.set('b', 2)
    expect(cache.get('a')).toBe(1)
    cache.set('c', 3)

    expect(cache.get('b')).toBeUndefined()
    expect(cache.get('a')).toBe(1)
    expect(cache.get('c')).toBe(3)
    expect(cache.size).toBe(2)
    expect(cache.hits).toBe(3)
    expect(cache.misses).toBe(1)
  })

  it('rejects non-positive capacities', () => {
    expect(() => new LruCache(0)).toThrow(RangeError)
  })
})
