// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * A bounded cache that automatically evicts the oldest entries when the cache exceeds max size.
 * Uses FIFO eviction strategy.
 */
export class BoundedCache<K, V extends object> {
  private cache: Map<K, V> = new Map();
  private readonly maxLen: number;
  private readonly onEvict?: (key: K, value: V) => void;

  constructor(maxLen: number = 10, onEvict?: (key: K, value: V) => void) {
    if (!(maxLen >= 1)) {
      throw new RangeError('maxLen must be at least 1');
    }
    this.maxLen = maxLen;
    this.onEvict = onEvict;
  }

  set(key: K, value: V): void {
    // re-inserting moves the key to the newest position
    this.cache.delete(key);
    this.cache.set(key, value);
    if (this.cache.size > this.maxLen) {
      // Remove the oldest entry (first inserted)
      const first = this.cache.entries().next().value;
      if (first) {
        const [oldestKey, oldestValue] = first;
        this.cache.delete(oldestKey);
        this.onEvict?.(oldestKey, oldestValue);
      }
    }
  }

  get(key: K): V | undefined {
    return this.cache.get(key);
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  values(): IterableIterator<V> {
    return this.cache.values();
  }

  keys(): IterableIterator<K> {
    return this.cache.keys();
  }
}
