// In-memory cache for enrichment results

/**
 * Cache entry with TTL support
 */
interface CacheEntry<T> {
  data: T;
  timestamp: number;
  expiresAt: number;
}

/**
 * Cache configuration options
 */
export interface CacheConfig {
  /** Time-to-live in milliseconds (default: 5 minutes) */
  ttl: number;
  /** Maximum number of entries (default: 100) */
  maxEntries: number;
  /** Enable/disable cache (default: true) */
  enabled: boolean;
}

const DEFAULT_CONFIG: CacheConfig = {
  ttl: 300000,
  maxEntries: 100,
  enabled: true
};

/**
 * Simple in-memory cache with TTL and LRU eviction
 */
export class TtlCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();
  private config: CacheConfig;

  constructor(config: Partial<CacheConfig> = {}, private readonly now: () => number = Date.now) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Gets a cached value if available and not expired
   */
  get(key: string): T | null {
    if (!this.config.enabled) return null;

    const entry = this.cache.get(key);
    if (!entry) return null;

    // Check if expired
    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    // Refresh recency
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.data;
  }

  set(key: string, data: T): void {
    if (!this.config.enabled) return;

    this.cache.delete(key);
    while (this.cache.size >= this.config.maxEntries) {
      this.evictLeastRecent();
    }

    const now = this.now();
    this.cache.set(key, {
      data,
      timestamp: now,
      expiresAt: now + this.config.ttl
    });
  }

  /**
   * Invalidates all cache entries
   */
  invalidate(): void {
    this.cache.clear();
  }

  private evictLeastRecent(): void {
    const first = this.cache.keys().next();
    if (!first.done) {
      this.cache.delete(first.value);
    }
  }

  /**
   * Gets cache statistics
   */
  getStats(): { size: number; enabled: boolean; ttl: number } {
    return {
      size: this.cache.size,
      enabled: this.config.enabled,
      ttl: this.config.ttl
    };
  }

  /**
   * Updates cache configuration
   */
  configure(config: Partial<CacheConfig>): void {
    this.config = { ...this.config, ...config };
    if (!this.config.enabled) {
      this.invalidate();
    }
  }
}
