// Cache tests

import { describe, it, expect, beforeEach } from 'vitest';
import { TtlCache } from './cache.js';

describe('TtlCache', () => {
  let now: number;
  let cache: TtlCache<string[]>;

  beforeEach(() => {
    now = 1_000;
    cache = new TtlCache<string[]>({ ttl: 100, maxEntries: 3 }, () => now);
  });

  describe('get/set', () => {
    it('should return null for a missing key', () => {
      expect(cache.get('missing')).toBeNull();
    });

    it('should store and retrieve values', () => {
      cache.set('a', ['one']);
      expect(cache.get('a')).toEqual(['one']);
    });

    it('should expire entries after the ttl', () => {
      cache.set('a', ['one']);

      now += 100;
      expect(cache.get('a')).toEqual(['one']);

      now += 1;
      expect(cache.get('a')).toBeNull();
      expect(cache.getStats().size).toBe(0);
    });
  });

  describe('eviction', () => {
    it('should evict the least recently used entry when full', () => {
      cache.set('a', ['a']);
      cache.set('b', ['b']);
      cache.set('c', ['c']);
      cache.get('a');

      cache.set('d', ['d']);

      expect(cache.get('b')).toBeNull();
      expect(cache.get('a')).toEqual(['a']);
      expect(cache.get('d')).toEqual(['d']);
      expect(cache.getStats().size).toBe(3);
    });

    it('should replace an existing key without evicting others', () => {
      cache.set('a', ['a']);
      cache.set('b', ['b']);
      cache.set('c', ['c']);

      cache.set('a', ['a2']);

      expect(cache.get('a')).toEqual(['a2']);
      expect(cache.get('b')).toEqual(['b']);
    });
  });

  describe('configuration', () => {
    it('should store nothing while disabled', () => {
      const disabled = new TtlCache<number>({ enabled: false });
      disabled.set('a', 1);
      expect(disabled.get('a')).toBeNull();
    });

    it('should clear entries when disabled later', () => {
      cache.set('a', ['a']);
      cache.configure({ enabled: false });

      expect(cache.getStats()).toEqual({ size: 0, enabled: false, ttl: 100 });
    });

    it('should invalidate all entries', () => {
      cache.set('a', ['a']);
      cache.set('b', ['b']);
      cache.invalidate();
      expect(cache.getStats().size).toBe(0);
    });
  });
});
