export interface LRUCacheOptions {
  maxSize: number;
  /** Entry lifetime in ms; 0 disables expiry */
  ttlMs: number;
  now?: () => number;
}

export interface LRUCacheMetrics {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  maxSize: number;
}

interface Entry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Size-bounded map with per-entry expiry. Map insertion order doubles as
 * recency order: a hit re-inserts the entry at the tail.
 */
export class LRUCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: LRUCacheOptions) {
    if (options.maxSize < 1) {
      throw new Error('Cache maxSize must be at least 1');
    }
    if (options.ttlMs < 0) {
      throw new Error('Cache ttlMs must be non-negative');
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);

    if (!entry || this.isExpired(entry)) {
      if (entry) {
        this.entries.delete(key);
      }
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);

    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next().value;
      if (oldest === undefined) {
        break;
      }
      this.entries.delete(oldest);
      this.evictions++;
    }

    this.entries.set(key, {
      value,
      expiresAt: this.ttlMs > 0 ? this.now() + this.ttlMs : 0,
    });
  }

  getMetrics(): LRUCacheMetrics {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      maxSize: this.maxSize,
    };
  }

  private isExpired(entry: Entry<T>): boolean {
    return entry.expiresAt > 0 && this.now() > entry.expiresAt;
  }
}
