/**
 * In-memory TTL cache. One instance per run; entries never cross processes.
 */
export class SimpleCache<T> {
  private cache = new Map<string, { value: T; expires: number }>();

  constructor(
    private readonly defaultTtlMs = 30 * 60 * 1000,
    private readonly now: () => number = Date.now,
  ) {}

  set(key: string, value: T, ttlMs = this.defaultTtlMs) {
    this.cache.set(key, { value, expires: this.now() + ttlMs });
  }

  get(key: string): T | null {
    const item = this.cache.get(key);
    if (!item || this.now() > item.expires) {
      if (item) this.cache.delete(key); // Clean up expired item
      return null;
    }
    return item.value;
  }

  get size(): number {
    return this.cache.size;
  }

  clear() {
    this.cache.clear();
  }
}
