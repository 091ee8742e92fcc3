/**
 * Tests for LruCache eviction behavior
 */

import { describe, it, expect } from 'vitest';
import { LruCache } from '../lru-cache.js';
import { ValidationError } from '../errors.js';

describe('LruCache', () => {
  it('should evict the least recently used entry', () => {
    const cache = new LruCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);

    expect(cache.has('b')).toBe(false);
    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.stats().evictions).toBe(1);
  });

  it('should refresh recency when an existing key is set', () => {
    const cache = new LruCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);

    expect(cache.get('a')).toBe(10);
    expect(cache.has('b')).toBe(false);
  });

  it('should compute once per key with getOrCompute', () => {
    const cache = new LruCache<string, number>(4);
    let calls = 0;
    const compute = (): number => {
      calls++;
      return 42;
    };

    expect(cache.getOrCompute('k', compute)).toBe(42);
    expect(cache.getOrCompute('k', compute)).toBe(42);
    expect(calls).toBe(1);
    expect(cache.stats()).toEqual({ size: 1, capacity: 4, hits: 1, misses: 1, evictions: 0 });
  });

  it('should cache undefined values as hits', () => {
    const cache = new LruCache<string, undefined>(1);
    cache.set('empty', undefined);
    expect(cache.get('empty')).toBeUndefined();
    expect(cache.stats().hits).toBe(1);
  });

  it('should delete and clear', () => {
    const cache = new LruCache<number, string>(3);
    cache.set(1, 'one');
    cache.set(2, 'two');
    expect(cache.delete(1)).toBe(true);
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new LruCache(0)).toThrow(ValidationError);
  });
});
