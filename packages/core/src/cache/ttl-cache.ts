export interface CacheEntry<V> {
  value: V
  /** Epoch millis from the cache clock */
  storedAt: number
}

export interface TtlCacheOptions {
  ttlMs: number
  now?: () => number
}

/**
 * In-memory map with time-derived staleness. Entries are never evicted, only
 * overwritten; a stale entry keeps its value until the next load replaces it.
 *
 * `getOrLoad` makes check → load → store one critical section per key:
 * concurrent misses share a single in-flight load.
 */
export class TtlCache<K, V> {
  readonly ttlMs: number
  private readonly now: () => number
  private readonly entries = new Map<K, CacheEntry<V>>()
  private readonly inflight = new Map<K, Promise<V>>()

  constructor(opts: TtlCacheOptions) {
    this.ttlMs = opts.ttlMs
    this.now = opts.now ?? Date.now
  }

  get size(): number {
    return this.entries.size
  }

  peek(key: K): CacheEntry<V> | undefined {
    return this.entries.get(key)
  }

  isFresh(entry: CacheEntry<V>): boolean {
    return this.now() - entry.storedAt < this.ttlMs
  }

  getFresh(key: K): V | undefined {
    const entry = this.entries.get(key)
    return entry && this.isFresh(entry) ? entry.value : undefined
  }

  set(key: K, value: V, storedAt: number = this.now()): CacheEntry<V> {
    const entry = { value, storedAt }
    this.entries.set(key, entry)
    return entry
  }

  /**
   * A rejected load is not stored and does not block the next attempt.
   * `stampOf` dates the entry from the loaded value; otherwise it is dated
   * when the load settles.
   */
  async getOrLoad(key: K, load: () => Promise<V>, stampOf?: (value: V) => number): Promise<V> {
    const entry = this.entries.get(key)
    if (entry && this.isFresh(entry)) return entry.value

    const pending = this.inflight.get(key)
    if (pending) return pending

    const p = load()
      .then((value) => {
        this.set(key, value, stampOf ? stampOf(value) : this.now())
        return value
      })
      .finally(() => {
        this.inflight.delete(key)
      })
    this.inflight.set(key, p)
    return p
  }
}
