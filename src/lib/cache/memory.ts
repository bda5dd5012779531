type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export type Clock = () => number;

export class TtlCache<T> {
  private store = new Map<string, CacheEntry<T>>();
  private now: Clock;

  constructor(now: Clock = () => Date.now()) {
    this.now = now;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number) {
    this.store.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async wrap(key: string, ttlMs: number, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== null) return cached;
    const value = await loader();
    if (ttlMs > 0) this.set(key, value, ttlMs);
    return value;
  }

  clear() {
    this.store.clear();
  }
}

// NOTE: Process-local. A multi-node deployment would need a shared store.
