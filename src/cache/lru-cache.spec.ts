import { LRUCache } from './lru-cache';

describe('LRUCache', () => {
  let clock: number;
  let cache: LRUCache<string>;

  beforeEach(() => {
    clock = 1_000;
    cache = new LRUCache<string>({ maxSize: 3, ttlMs: 1000, now: () => clock });
  });

  describe('constructor', () => {
    it('should reject a maxSize below 1', () => {
      expect(() => new LRUCache<string>({ maxSize: 0, ttlMs: 10 })).toThrow(
        'Cache maxSize must be at least 1',
      );
    });

    it('should reject a negative ttl', () => {
      expect(() => new LRUCache<string>({ maxSize: 1, ttlMs: -1 })).toThrow(
        'Cache ttlMs must be non-negative',
      );
    });
  });

  describe('get/set', () => {
    it('should return stored values and undefined for unknown keys', () => {
      cache.set('user-1', 'calm week');
      expect(cache.get('user-1')).toBe('calm week');
      expect(cache.get('user-2')).toBeUndefined();
    });

    it('should overwrite an existing key without growing', () => {
      cache.set('user-1', 'a');
      cache.set('user-1', 'b');
      expect(cache.get('user-1')).toBe('b');
      expect(cache.getMetrics().size).toBe(1);
    });
  });

  describe('eviction', () => {
    it('should evict the least recently used entry when full', () => {
      cache.set('a', '1');
      cache.set('b', '2');
      cache.set('c', '3');
      cache.get('a');
      cache.set('d', '4');

      expect(cache.get('b')).toBeUndefined();
      expect(cache.get('a')).toBe('1');
      expect(cache.getMetrics().evictions).toBe(1);
    });
  });

  describe('expiry', () => {
    it('should expire entries after the ttl', () => {
      cache.set('a', '1');
      clock += 1000;
      expect(cache.get('a')).toBe('1');
      clock += 1;
      expect(cache.get('a')).toBeUndefined();
      expect(cache.getMetrics().size).toBe(0);
    });

    it('should keep entries forever when ttl is 0', () => {
      const forever = new LRUCache<string>({ maxSize: 2, ttlMs: 0, now: () => clock });
      forever.set('a', '1');
      clock += 10_000_000;
      expect(forever.get('a')).toBe('1');
    });
  });

  describe('metrics', () => {
    it('should count hits and misses', () => {
      cache.set('a', '1');
      cache.get('a');
      cache.get('missing');

      expect(cache.getMetrics()).toEqual({
        hits: 1,
        misses: 1,
        evictions: 0,
        size: 1,
        maxSize: 3,
      });
    });
  });
});
