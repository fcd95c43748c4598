/**
 * Content-Addressed Caching Manager
 *
 * In-memory cache for rendered artifacts:
 * - SHA256-based content addressing
 * - TTL and LRU eviction policies
 * - Metrics and hit/miss events
 */

import { createHash } from 'crypto';
import { EventEmitter } from 'events';
import { Logger, silentLogger } from './logger.js';

/**
 * Cache configuration
 */
export interface CacheConfig {
  memoryMaxSize: number;          // Max items in memory cache
  defaultTtl: number;             // Default TTL in seconds
  maxTtl: number;                 // Maximum TTL in seconds
  minTtl: number;                 // Minimum TTL in seconds
}

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  memoryMaxSize: 50,
  defaultTtl: 3600,               // 1 hour
  maxTtl: 86400,                  // 24 hours
  minTtl: 1
};

/**
 * Cache entry metadata
 */
export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: number;
  expiresAt: number;
  accessCount: number;
  lastAccessed: number;
  size: number;                   // Size in bytes
}

/**
 * Cache metrics
 */
export interface CacheMetrics {
  hits_total: number;
  misses_total: number;
  writes_total: number;
  evictions_total: number;
  expirations_total: number;

  hit_rate: number;               // Cache hit rate (0-1)
  memory_entries: number;
  memory_size_bytes: number;
}

/**
 * Cache key types for different content types
 */
export enum CacheKeyType {
  RENDERED_PDF = 'rendered_pdf'
}

/**
 * Hash a string (or a list of strings) into a hex SHA256 digest
 */
export function contentHash(...parts: Array<string | Buffer>): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    // separator keeps ["ab","c"] and ["a","bc"] apart
    hash.update('\u0000');
  }
  return hash.digest('hex');
}

function defaultSizeOf(value: unknown): number {
  if (Buffer.isBuffer(value)) {
    return value.length;
  }
  if (typeof value === 'string') {
    return Buffer.byteLength(value, 'utf8');
  }
  return 0;
}

/**
 * LRU map; Map iteration order is insertion order, so the first key is the coldest
 */
class LRUCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private maxSize: number;

  constructor(maxSize: number) {
    this.maxSize = maxSize;
  }

  get(key: string): CacheEntry<T> | undefined {
    const entry = this.cache.get(key);
    if (entry) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, entry);
      return entry;
    }
    return undefined;
  }

  /**
   * Returns the evicted key, if any
   */
  set(key: string, entry: CacheEntry<T>): string | undefined {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    let evicted: string | undefined;
    if (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
        evicted = firstKey;
      }
    }

    this.cache.set(key, entry);
    return evicted;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  getMemorySize(): number {
    let total = 0;
    for (const entry of this.cache.values()) {
      total += entry.size;
    }
    return total;
  }
}

/**
 * Main cache manager class. Expired entries are dropped lazily on read.
 */
export class CacheManager<T> extends EventEmitter {
  private config: CacheConfig;
  private logger: Logger;
  private memoryCache: LRUCache<T>;
  private sizeOf: (value: T) => number;
  private now: () => number;

  private metrics: CacheMetrics = {
    hits_total: 0,
    misses_total: 0,
    writes_total: 0,
    evictions_total: 0,
    expirations_total: 0,
    hit_rate: 0,
    memory_entries: 0,
    memory_size_bytes: 0
  };

  constructor(
    config: Partial<CacheConfig> = {},
    logger: Logger = silentLogger,
    options: { sizeOf?: (value: T) => number; now?: () => number } = {}
  ) {
    super();
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
    this.logger = logger;
    this.memoryCache = new LRUCache<T>(Math.max(1, this.config.memoryMaxSize));
    this.sizeOf = options.sizeOf ?? defaultSizeOf;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get value by content digest
   */
  get(keyType: CacheKeyType, digest: string): T | undefined {
    const key = this.generateKey(keyType, digest);
    const entry = this.memoryCache.get(key);

    if (entry && this.isExpired(entry)) {
      this.memoryCache.delete(key);
      this.metrics.expirations_total++;
      this.emit('expired', { key });
    } else if (entry) {
      entry.accessCount++;
      entry.lastAccessed = this.now();
      this.metrics.hits_total++;
      this.emit('hit', { key });
      return entry.value;
    }

    this.metrics.misses_total++;
    this.emit('miss', { key });
    return undefined;
  }

  set(keyType: CacheKeyType, digest: string, value: T, ttl?: number): void {
    const key = this.generateKey(keyType, digest);
    const actualTtl = this.normalizeTtl(ttl ?? this.config.defaultTtl);
    const now = this.now();

    const entry: CacheEntry<T> = {
      key,
      value,
      createdAt: now,
      expiresAt: now + (actualTtl * 1000),
      accessCount: 0,
      lastAccessed: now,
      size: this.sizeOf(value)
    };

    const evicted = this.memoryCache.set(key, entry);
    if (evicted) {
      this.metrics.evictions_total++;
      this.logger('debug', 'Cache entry evicted', { key: evicted });
      this.emit('evict', { key: evicted });
    }

    this.metrics.writes_total++;
    this.emit('set', { key, size: entry.size, ttl: actualTtl });
  }

  delete(keyType: CacheKeyType, digest: string): boolean {
    const deleted = this.memoryCache.delete(this.generateKey(keyType, digest));
    if (deleted) {
      this.emit('delete', { keyType, digest });
    }
    return deleted;
  }

  clear(): void {
    this.memoryCache.clear();
    this.emit('clear');
  }

  private generateKey(keyType: CacheKeyType, digest: string): string {
    return `${keyType}:${digest}`;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() > entry.expiresAt;
  }

  /**
   * Normalize TTL to be within bounds
   */
  private normalizeTtl(ttl: number): number {
    return Math.max(this.config.minTtl, Math.min(this.config.maxTtl, ttl));
  }

  /**
   * Get current metrics
   */
  getMetrics(): CacheMetrics {
    const lookups = this.metrics.hits_total + this.metrics.misses_total;
    return {
      ...this.metrics,
      hit_rate: lookups > 0 ? this.metrics.hits_total / lookups : 0,
      memory_entries: this.memoryCache.size(),
      memory_size_bytes: this.memoryCache.getMemorySize()
    };
  }

  getHealth(): { healthy: boolean; entries: number } {
    return { healthy: true, entries: this.memoryCache.size() };
  }
}
