/**
 * Response Cache - TTL-bound memory tier for deterministic operations
 */

import { LRUCache } from 'lru-cache';
import * as crypto from 'crypto';
import { Logger } from '../utils/logger';
import { CacheStats, Operation } from '../types';

const logger = Logger.child({ component: 'response-cache' });

export interface CacheEntry<V> {
  key: string;
  value: V;
  createdAt: number;
  expiresAt: number;
}

export interface ResponseCacheOptions {
  enabled: boolean;
  maxEntries: number;
  sweepIntervalMs: number;
  ttlMs: Partial<Record<Operation, number>>;
  now: () => number;
}

const CACHEABLE: ReadonlySet<Operation> = new Set([Operation.SEARCH, Operation.EMBED]);

// Fields that never change the result of an operation
const NON_SEMANTIC_FIELDS = new Set(['requestId', 'receivedAt', 'urgent']);

export const isCacheable = (operation: Operation): boolean => CACHEABLE.has(operation);

const normalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(item => (item === undefined ? null : normalize(item)));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      if (NON_SEMANTIC_FIELDS.has(key)) continue;
      const field: unknown = Reflect.get(value, key);
      if (field === undefined) continue;
      result[key] = normalize(field);
    }
    return result;
  }
  return value;
};

/**
 * Deterministic key: `<model>:<operation>:<sha256>` over the normalized payload
 */
export const cacheKey = (model: string, operation: Operation, payload: unknown): string => {
  const hash = crypto.createHash('sha256');
  hash.update(`${operation}|${JSON.stringify(normalize(payload))}`);
  return `${model}:${operation}:${hash.digest('hex')}`;
};

export class ResponseCache<V = unknown> {
  private entries: LRUCache<string, CacheEntry<V>>;
  private options: ResponseCacheOptions;
  private sweepTimer?: NodeJS.Timeout;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: Partial<ResponseCacheOptions> = {}) {
    this.options = {
      enabled: true,
      maxEntries: 10000,
      sweepIntervalMs: 60000,
      now: Date.now,
      ...options,
      ttlMs: {
        [Operation.SEARCH]: 600000,
        [Operation.EMBED]: 300000,
        ...options.ttlMs,
      },
    };

    this.entries = new LRUCache<string, CacheEntry<V>>({
      max: this.options.maxEntries,
      dispose: (_entry, key, reason) => {
        if (reason === 'evict') {
          this.evictions++;
          logger.debug({ key }, 'Evicted least recently used entry');
        }
      },
    });
  }

  public get enabled(): boolean {
    return this.options.enabled;
  }

  public ttlFor(operation: Operation): number {
    return this.options.ttlMs[operation] ?? 300000;
  }

  /**
   * Cached value, or undefined on a miss. Expired entries are removed here.
   */
  public get(model: string, operation: Operation, payload: unknown): V | undefined {
    if (!this.options.enabled || !isCacheable(operation)) return undefined;

    const key = cacheKey(model, operation, payload);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.options.now()) {
      this.entries.delete(key);
      this.evictions++;
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  /**
   * Store a value, replacing any entry under the same key
   */
  public put(model: string, operation: Operation, payload: unknown, value: V, ttlMs?: number): void {
    if (!this.options.enabled || !isCacheable(operation)) return;

    const key = cacheKey(model, operation, payload);
    const now = this.options.now();
    this.entries.set(key, {
      key,
      value,
      createdAt: now,
      expiresAt: now + (ttlMs ?? this.ttlFor(operation)),
    });
  }

  /**
   * Remove every entry whose key matches a prefix (`model:search:`, `model:*`,
   * `*`) or a regular expression. Returns the number removed.
   */
  public invalidate(pattern: string | RegExp): number {
    const matches = this.matcher(pattern);
    const keys = Array.from(this.entries.keys()).filter(matches);
    keys.forEach(key => this.entries.delete(key));

    if (keys.length > 0) {
      logger.debug({ pattern: String(pattern), removed: keys.length }, 'Cache entries invalidated');
    }
    return keys.length;
  }

  public invalidateModel(model: string): number {
    return this.invalidate(`${model}:`);
  }

  /**
   * Drop all expired entries
   */
  public sweep(): number {
    const now = this.options.now();
    const expired: string[] = [];
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) expired.push(key);
    }
    expired.forEach(key => this.entries.delete(key));
    this.evictions += expired.length;

    logger.debug({ removed: expired.length, remaining: this.entries.size }, 'Cache sweep complete');
    return expired.length;
  }

  public start(): void {
    if (this.sweepTimer || !this.options.enabled) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  public stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      enabled: this.options.enabled,
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  public clear(): void {
    this.entries.clear();
  }

  private matcher(pattern: string | RegExp): (key: string) => boolean {
    if (pattern instanceof RegExp) {
      return key => {
        pattern.lastIndex = 0;
        return pattern.test(key);
      };
    }
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    return key => key.startsWith(prefix);
  }
}
