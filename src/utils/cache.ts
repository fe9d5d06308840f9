/**
 * Cache Utility
 *
 * In-memory TTL cache. Used to keep explorer responses for a while, since
 * verified source for an address does not change.
 */

// ============================================================================
// Types
// ============================================================================

interface CacheEntry<T> {
  value: T;
  timestamp: number;
  ttl: number;
  hits: number;
}

// ============================================================================
// Cache Implementation
// ============================================================================

export class Cache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxSize: number;

  constructor(maxSize = 100) {
    this.maxSize = maxSize;
  }

  /**
   * @returns The cached value, or undefined when missing or expired
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    if (Date.now() - entry.timestamp > entry.ttl) {
      this.entries.delete(key);
      return undefined;
    }

    entry.hits++;
    return entry.value;
  }

  set(key: string, value: T, ttlMs = 60_000): void {
    if (this.entries.size >= this.maxSize) {
      this.cleanup();
    }

    this.entries.set(key, {
      value,
      timestamp: Date.now(),
      ttl: ttlMs,
      hits: 0,
    });
  }

  /**
   * Drop expired entries, then the least-hit fifth if still full.
   */
  private cleanup(): void {
    const now = Date.now();
    const live: Array<[string, CacheEntry<T>]> = [];

    for (const [key, entry] of this.entries) {
      if (now - entry.timestamp > entry.ttl) {
        this.entries.delete(key);
      } else {
        live.push([key, entry]);
      }
    }

    if (this.entries.size >= this.maxSize) {
      live.sort((a, b) => a[1].hits - b[1].hits);
      const toRemove = Math.ceil(this.maxSize * 0.2);

      for (const [key] of live.slice(0, toRemove)) {
        this.entries.delete(key);
      }
    }
  }
}
