/**
 * Cache entry with metadata
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
  createdAt: number;
  hitCount: number;
  lastAccessedAt: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  evictions: number;
  hitRate: number;
  size: number;
  capacity: number;
}

export interface CacheConfig {
  /**
   * Maximum number of entries
   */
  capacity: number;

  /**
   * Default TTL in milliseconds
   */
  defaultTTL: number;

  /**
   * Clock in epoch milliseconds
   * @default Date.now
   */
  now: () => number;
}

/**
 * In-memory TTL cache with LRU eviction.
 * Expiry is checked on read against the injected clock; there is no
 * background timer, so nothing keeps the process alive.
 */
export class CacheManager<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();
  private config: CacheConfig;
  private stats: CacheStats;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = {
      capacity: config.capacity ?? 1000,
      defaultTTL: config.defaultTTL ?? 60_000,
      now: config.now ?? Date.now,
    };
    this.stats = this.emptyStats();
  }

  /**
   * @returns the cached value, or undefined if missing or expired
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      this.recordMiss();
      return undefined;
    }

    if (!this.isFresh(entry)) {
      this.entries.delete(key);
      this.stats.size = this.entries.size;
      this.recordMiss();
      return undefined;
    }

    entry.hitCount++;
    entry.lastAccessedAt = this.config.now();
    this.stats.hits++;
    this.updateHitRate();

    return entry.value;
  }

  /**
   * Stores `value`, replacing any previous entry for `key` wholesale
   * @param ttl - milliseconds; falls back to the configured default
   */
  set(key: string, value: T, ttl?: number): CacheEntry<T> {
    const now = this.config.now();

    if (this.entries.size >= this.config.capacity && !this.entries.has(key)) {
      this.evictLRU();
    }

    const entry: CacheEntry<T> = {
      value,
      expiresAt: now + (ttl ?? this.config.defaultTTL),
      createdAt: now,
      hitCount: 0,
      lastAccessedAt: now,
    };

    this.entries.set(key, entry);
    this.stats.sets++;
    this.stats.size = this.entries.size;
    return entry;
  }

  delete(key: string): boolean {
    const deleted = this.entries.delete(key);
    if (deleted) {
      this.stats.deletes++;
      this.stats.size = this.entries.size;
    }
    return deleted;
  }

  clear(): void {
    this.entries.clear();
    this.stats.size = 0;
  }

  getStats(): Readonly<CacheStats> {
    return { ...this.stats };
  }

  static generateKey(...parts: (string | number)[]): string {
    return parts.join(':');
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.config.now() < entry.expiresAt;
  }

  private evictLRU(): void {
    let lruKey: string | null = null;
    let lruTime = Infinity;

    for (const [key, entry] of this.entries) {
      if (entry.lastAccessedAt < lruTime) {
        lruTime = entry.lastAccessedAt;
        lruKey = key;
      }
    }

    if (lruKey !== null) {
      this.entries.delete(lruKey);
      this.stats.evictions++;
    }
  }

  private recordMiss(): void {
    this.stats.misses++;
    this.updateHitRate();
  }

  private updateHitRate(): void {
    const total = this.stats.hits + this.stats.misses;
    this.stats.hitRate = total > 0 ? this.stats.hits / total : 0;
  }

  private emptyStats(): CacheStats {
    return {
      hits: 0,
      misses: 0,
      sets: 0,
      deletes: 0,
      evictions: 0,
      hitRate: 0,
      size: this.entries.size,
      capacity: this.config.capacity,
    };
  }
}
