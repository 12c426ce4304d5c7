import { describe, it, expect } from 'vitest';
import { Transform } from './transform';
import { TransformCache } from './transform-cache';

describe('TransformCache', () => {
  it('should return the same handle for structurally equal transforms', () => {
    const cache = new TransformCache();
    const first = cache.lookup(Transform.translate(1, 2, 3));
    const second = cache.lookup(Transform.translate(1, 2, 3));
    expect(second).toBe(first);
    expect(cache.size).toBe(1);
  });

  it('should return different handles for different transforms', () => {
    const cache = new TransformCache();
    const a = cache.lookup(Transform.translate(1, 0, 0));
    const b = cache.lookup(Transform.scale(2, 2, 2));
    expect(a).not.toBe(b);
    expect(cache.size).toBe(2);
  });

  it('should keep colliding transforms apart', () => {
    const cache = new TransformCache(() => 42);
    const a = cache.lookup(Transform.translate(1, 0, 0));
    const b = cache.lookup(Transform.translate(2, 0, 0));
    expect(a).not.toBe(b);
    expect(cache.lookup(Transform.translate(1, 0, 0))).toBe(a);
    expect(cache.lookup(Transform.translate(2, 0, 0))).toBe(b);
  });

  it('should count lookups, hits and stored bytes', () => {
    const cache = new TransformCache();
    cache.lookup(Transform.identity());
    cache.lookup(Transform.identity());
    cache.lookup(Transform.translate(0, 0, 1));
    expect(cache.stats).toEqual({ lookups: 3, hits: 1, entries: 2, bytes: 512 });
  });
});
