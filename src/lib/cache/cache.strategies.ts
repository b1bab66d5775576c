/**
 * Cache Strategies
 * Eviction strategies for bounded dataset families
 */

export interface LRUCacheOptions<V> {
  onEvict?: (key: string, value: V) => void;
  // Entries for which this returns false are skipped when choosing a victim
  canEvict?: (key: string, value: V) => boolean;
}

/**
 * LRU (Least Recently Used) map with an eviction callback. When no entry may
 * be evicted the map grows past `maxSize` until one can.
 */
export class LRUCacheStrategy<V> {
  private cache: Map<string, V>;
  private maxSize: number;
  private onEvict?: (key: string, value: V) => void;
  private canEvict: (key: string, value: V) => boolean;

  constructor(maxSize: number = 1000, options: LRUCacheOptions<V> = {}) {
    this.cache = new Map();
    this.maxSize = maxSize;
    this.onEvict = options.onEvict;
    this.canEvict = options.canEvict ?? (() => true);
  }

  /**
   * Get entry and mark as recently used
   */
  get(key: string): V | undefined {
    const value = this.cache.get(key);
    if (value !== undefined) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, value);
    }
    return value;
  }

  /**
   * Set entry, evicting the least recently used one when full
   */
  set(key: string, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else {
      this.evictForInsert();
    }
    this.cache.set(key, value);
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  keys(): string[] {
    return Array.from(this.cache.keys());
  }

  size(): number {
    return this.cache.size;
  }

  /**
   * Evict least recently used entries until one more fits
   */
  private evictForInsert(): void {
    let excess = this.cache.size + 1 - this.maxSize;
    // Map iteration order is insertion order, oldest first
    for (const [key, value] of Array.from(this.cache.entries())) {
      if (excess <= 0) {
        return;
      }
      if (this.canEvict(key, value)) {
        this.cache.delete(key);
        this.onEvict?.(key, value);
        excess--;
      }
    }
  }
}
