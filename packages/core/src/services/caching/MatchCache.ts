import type { CacheStats } from '../../types/index.js';

/**
 * Match Cache
 *
 * String-keyed memo for normalization and variation results.
 * - Unbounded by default, like a plain map that only grows until clear()
 * - Optional LRU bound: a hit moves the key to the back, the front is evicted
 * - Hit/miss/eviction counters for getStats()
 */
export class MatchCache<V> {
  private cache: Map<string, V> = new Map();
  private readonly maxEntries: number | null;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @param maxEntries - LRU bound; undefined, 0 or Infinity means unbounded
   */
  constructor(maxEntries?: number) {
    this.maxEntries =
      maxEntries !== undefined && Number.isFinite(maxEntries) && maxEntries > 0
        ? Math.floor(maxEntries)
        : null;
  }

  get(key: string): V | undefined {
    if (!this.cache.has(key)) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    const value = this.cache.get(key);
    if (value !== undefined && this.maxEntries !== null) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, value);
    }
    return value;
  }

  set(key: string, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }
    this.cache.set(key, value);

    if (this.maxEntries !== null) {
      while (this.cache.size > this.maxEntries) {
        const oldest = this.cache.keys().next();
        if (oldest.done) break;
        this.cache.delete(oldest.value);
        this.evictions++;
      }
    }
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Drop every entry and reset the counters
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  getStats(): CacheStats {
    return {
      size: this.cache.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
