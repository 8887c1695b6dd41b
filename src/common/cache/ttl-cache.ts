import { Clock } from '../clock/clock';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Process-local read-through cache with a fixed time-to-live.
 * Expired entries are evicted on read of their key and on every write.
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock,
  ) {}

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /** Stores `value` and sweeps out every entry that has already expired. */
  set(key: K, value: V): void {
    const now = this.clock.now().getTime();
    for (const [existing, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(existing);
      }
    }
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  /** Returns the cached value or loads, stores and returns a fresh one. */
  async getOrLoad(key: K, load: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await load();
    this.set(key, value);
    return value;
  }

  invalidate(key: K): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
