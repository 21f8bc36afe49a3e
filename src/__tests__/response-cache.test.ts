/**
 * Response Cache Unit Tests
 */

import { ResponseCache, cacheKey, isCacheable } from '../cache/response-cache';
import { Operation } from '../types';

describe('ResponseCache', () => {
  let clock: number;
  let cache: ResponseCache<{ value: number }>;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new ResponseCache({
      maxEntries: 3,
      ttlMs: { [Operation.SEARCH]: 1000, [Operation.EMBED]: 500 },
      now: () => clock,
    });
  });

  afterEach(() => {
    cache.stop();
  });

  describe('Keys', () => {
    it('should ignore field order and non-semantic fields', () => {
      const a = cacheKey('phi3', Operation.EMBED, { texts: ['hi'], collection: 'docs', urgent: true });
      const b = cacheKey('phi3', Operation.EMBED, { collection: 'docs', texts: ['hi'], requestId: 'r-1' });

      expect(a).toBe(b);
    });

    it('should prefix keys with model and operation', () => {
      expect(cacheKey('phi3', Operation.SEARCH, { limit: 5 })).toMatch(/^phi3:search:[0-9a-f]{64}$/);
    });

    it('should distinguish different payloads', () => {
      expect(cacheKey('phi3', Operation.EMBED, { texts: ['a'] }))
        .not.toBe(cacheKey('phi3', Operation.EMBED, { texts: ['b'] }));
    });

    it('should only cache deterministic operations', () => {
      expect(isCacheable(Operation.SEARCH)).toBe(true);
      expect(isCacheable(Operation.EMBED)).toBe(true);
      expect(isCacheable(Operation.UPSERT)).toBe(false);
      expect(isCacheable(Operation.DELETE)).toBe(false);
    });
  });

  describe('Get and put', () => {
    it('should return a stored value until it expires', () => {
      cache.put('phi3', Operation.EMBED, { texts: ['hi'] }, { value: 1 });

      clock += 499;
      expect(cache.get('phi3', Operation.EMBED, { texts: ['hi'] })).toEqual({ value: 1 });

      clock += 1;
      expect(cache.get('phi3', Operation.EMBED, { texts: ['hi'] })).toBeUndefined();
    });

    it('should count hits, misses and expirations', () => {
      cache.put('phi3', Operation.SEARCH, { limit: 1 }, { value: 1 });
      cache.get('phi3', Operation.SEARCH, { limit: 1 });
      cache.get('phi3', Operation.SEARCH, { limit: 2 });
      clock += 1000;
      cache.get('phi3', Operation.SEARCH, { limit: 1 });

      expect(cache.stats()).toEqual({
        enabled: true,
        entries: 0,
        hits: 1,
        misses: 2,
        evictions: 1,
        hitRate: 1 / 3,
      });
    });

    it('should honour an explicit ttl', () => {
      cache.put('phi3', Operation.SEARCH, { limit: 1 }, { value: 1 }, 10);
      clock += 10;

      expect(cache.get('phi3', Operation.SEARCH, { limit: 1 })).toBeUndefined();
    });

    it('should ignore non-cacheable operations', () => {
      cache.put('phi3', Operation.UPSERT, { items: [] }, { value: 1 });

      expect(cache.get('phi3', Operation.UPSERT, { items: [] })).toBeUndefined();
      expect(cache.stats().entries).toBe(0);
    });

    it('should do nothing when disabled', () => {
      const disabled = new ResponseCache<{ value: number }>({ enabled: false });
      disabled.put('phi3', Operation.EMBED, { texts: ['hi'] }, { value: 1 });

      expect(disabled.get('phi3', Operation.EMBED, { texts: ['hi'] })).toBeUndefined();
    });

    it('should evict the least recently used entry at capacity', () => {
      cache.put('m', Operation.SEARCH, { n: 1 }, { value: 1 });
      cache.put('m', Operation.SEARCH, { n: 2 }, { value: 2 });
      cache.put('m', Operation.SEARCH, { n: 3 }, { value: 3 });
      cache.get('m', Operation.SEARCH, { n: 1 });
      cache.put('m', Operation.SEARCH, { n: 4 }, { value: 4 });

      expect(cache.get('m', Operation.SEARCH, { n: 2 })).toBeUndefined();
      expect(cache.get('m', Operation.SEARCH, { n: 1 })).toEqual({ value: 1 });
      expect(cache.stats().evictions).toBe(1);
    });
  });

  describe('Invalidation', () => {
    beforeEach(() => {
      cache.put('phi3', Operation.SEARCH, { n: 1 }, { value: 1 });
      cache.put('phi3', Operation.EMBED, { n: 2 }, { value: 2 });
      cache.put('qwen', Operation.SEARCH, { n: 3 }, { value: 3 });
    });

    it('should remove entries by prefix', () => {
      expect(cache.invalidate('phi3:search:')).toBe(1);
      expect(cache.get('phi3', Operation.EMBED, { n: 2 })).toEqual({ value: 2 });
    });

    it('should accept a trailing wildcard', () => {
      expect(cache.invalidate('phi3:*')).toBe(2);
      expect(cache.invalidate('*')).toBe(1);
    });

    it('should accept a regular expression', () => {
      expect(cache.invalidate(/:search:/g)).toBe(2);
    });

    it('should remove every entry of a model', () => {
      expect(cache.invalidateModel('qwen')).toBe(1);
      expect(cache.stats().entries).toBe(2);
    });
  });

  describe('Sweep', () => {
    it('should drop only expired entries', () => {
      cache.put('phi3', Operation.EMBED, { n: 1 }, { value: 1 });
      cache.put('phi3', Operation.SEARCH, { n: 2 }, { value: 2 });
      clock += 600;

      expect(cache.sweep()).toBe(1);
      expect(cache.get('phi3', Operation.SEARCH, { n: 2 })).toEqual({ value: 2 });
    });
  });
});
