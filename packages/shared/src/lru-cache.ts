/**
 * Insertion-ordered Map with least-recently-used eviction.
 */
export class LruCache<K, V> {
  private readonly entries = new Map<K, V>()
  private hitCount = 0
  private missCount = 0

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LruCache capacity must be a positive integer (received ${capacity}).`)
    }
  }

  get size() {
    return this.entries.size
  }

  get hits() {
    return this.hitCount
  }

  get misses() {
    return this.missCount
  }

  get(key: K): V | undefined {
    if (!this.entries.has(key)) {
      this.missCount += 1
      return undefined
    }
    const value = this.entries.get(key)
    this.entries.delete(key)
    if (value !== undefined) {
      this.entries.set(key, value)
    }
    this.hitCount += 1
    return value
  }

  set(key: K, value: V) {
    this.entries.delete(key)
    this.entries.set(key, value)
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key)
  }

  clear() {
    this.entries.clear()
    this.hitCount = 0
    this.missCount = 0
  }
}
