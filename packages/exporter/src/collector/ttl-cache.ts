/**
 * Single-slot read-through cache. An entry is valid while
 * `now - writtenAt < ttl`; nothing else expires it apart from flush().
 */

export const DEFAULT_CACHE_TTL_MS = 5 * 60_000;

export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

export interface TtlCacheOptions {
  /** Clock in ms (default: Date.now) */
  now?: () => number;
}

interface Entry<T> {
  value: T;
  writtenAt: number;
}

export class TtlCache<T> {
  readonly ttl: number;
  private entry: Entry<T> | null = null;
  private now: () => number;

  /** A non-positive ttl falls back to DEFAULT_CACHE_TTL_MS */
  constructor(ttlMs: number, options?: TtlCacheOptions) {
    this.ttl = ttlMs > 0 ? ttlMs : DEFAULT_CACHE_TTL_MS;
    this.now = options?.now ?? Date.now;
  }

  get(): CacheLookup<T> {
    if (!this.entry) return { hit: false };
    if (this.now() - this.entry.writtenAt >= this.ttl) return { hit: false };
    return { hit: true, value: this.entry.value };
  }

  set(value: T): void {
    this.entry = { value, writtenAt: this.now() };
  }

  flush(): void {
    this.entry = null;
  }

  /** Time of the last set(), or null when empty */
  get lastWriteAt(): number | null {
    return this.entry?.writtenAt ?? null;
  }
}
