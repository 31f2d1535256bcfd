type Entry<V> = {
  value: V;
  expiresAt: number;
};

export type Clock = () => number;

/**
 * In-memory TTL cache owned by whoever builds a request context.
 * `now` returns milliseconds; tests pass a fake clock.
 */
export class TtlCache<V> {
  private readonly items = new Map<string, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = () => Date.now()
  ) {
    if (!(ttlMs > 0)) throw new Error("ttlMs must be > 0");
  }

  get(key: string): V | undefined {
    const entry = this.items.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.items.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.items.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  async getOrSet(key: string, factory: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = await factory();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.items.clear();
  }

  get size(): number {
    return this.items.size;
  }
}
