interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export interface CacheOptions<T> {
  ttl?: number;
  onEvict?: (key: string, value: T) => void;
}

/**
 * In-memory TTL store. Reads refresh nothing: an entry lives `ttl` ms from its
 * last `set`. Expired entries are evicted lazily on access and by `cleanup`.
 */
export class Cache<T> {
  private store: Map<string, CacheEntry<T>> = new Map();
  private defaultTTL: number;
  private onEvict?: (key: string, value: T) => void;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: CacheOptions<T> = {}) {
    this.defaultTTL = options.ttl ?? 5 * 60 * 1000;
    this.onEvict = options.onEvict;
  }

  set(key: string, value: T, ttl?: number): void {
    const expiresAt = Date.now() + (ttl ?? this.defaultTTL);
    this.store.set(key, { data: value, expiresAt });
  }

  get(key: string): T | null {
    const entry = this.store.get(key);

    if (!entry) {
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      this.evict(key, entry);
      return null;
    }

    return entry.data;
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  get size(): number {
    return this.store.size;
  }

  cleanup(now: number = Date.now()): void {
    for (const [key, entry] of this.store.entries()) {
      if (now > entry.expiresAt) {
        this.evict(key, entry);
      }
    }
  }

  clear(): void {
    for (const [key, entry] of this.store.entries()) {
      this.evict(key, entry);
    }
  }

  /** Periodic cleanup that never keeps the process alive on its own. */
  startCleanup(interval: number = 60 * 1000): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.cleanup(), interval);
    this.timer.unref();
  }

  stopCleanup(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private evict(key: string, entry: CacheEntry<T>): void {
    this.store.delete(key);
    this.onEvict?.(key, entry.data);
  }
}
