import { describe, it, expect, vi } from 'vitest';
import { TtlCache } from './ttl-cache.js';

function makeCache(maxSize = 10) {
  let now = 1_000;
  const cache = new TtlCache<string>({ maxSize, sweepIntervalMs: 60_000, now: () => now });
  return {
    cache,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('TtlCache', () => {
  it('should expire entries lazily on read', () => {
    const { cache, advance } = makeCache();
    cache.set('a', 'value', 100);

    expect(cache.get('a')).toBe('value');
    advance(100);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('should evict the oldest entry at capacity', () => {
    const { cache } = makeCache(2);
    cache.set('a', '1', 1000);
    cache.set('b', '2', 1000);
    cache.set('c', '3', 1000);

    expect(cache.has('a')).toBe(false);
    expect(cache.get('b')).toBe('2');
    expect(cache.get('c')).toBe('3');
  });

  it('should call fetchFn once for concurrent callers of the same key', async () => {
    const { cache } = makeCache();
    let resolveFetch: (value: string) => void = () => undefined;
    const fetchFn = vi.fn(() => new Promise<string>(resolve => {
      resolveFetch = resolve;
    }));

    const calls = Array.from({ length: 5 }, () => cache.getOrFetch('mint', 1000, fetchFn));
    resolveFetch('holders');
    const results = await Promise.all(calls);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(results).toEqual(['holders', 'holders', 'holders', 'holders', 'holders']);

    await cache.getOrFetch('mint', 1000, fetchFn);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should not cache failed fetches', async () => {
    const { cache } = makeCache();
    const failing = vi.fn().mockRejectedValueOnce(new Error('rpc down')).mockResolvedValueOnce('ok');

    await expect(cache.getOrFetch('k', 1000, failing)).rejects.toThrow('rpc down');
    await expect(cache.getOrFetch('k', 1000, failing)).resolves.toBe('ok');
    expect(failing).toHaveBeenCalledTimes(2);
  });

  it('should keep other keys independent of a failing fetch', async () => {
    const { cache } = makeCache();
    const bad = cache.getOrFetch('bad', 1000, () => Promise.reject(new Error('boom')));
    const good = cache.getOrFetch('good', 1000, () => Promise.resolve('fine'));

    await expect(bad).rejects.toThrow('boom');
    await expect(good).resolves.toBe('fine');
    expect(cache.get('good')).toBe('fine');
  });

  it('should sweep expired entries and clear on dispose', () => {
    const { cache, advance } = makeCache();
    cache.set('short', 'x', 10);
    cache.set('long', 'y', 10_000);
    advance(50);

    expect(cache.sweep()).toBe(1);
    expect(cache.size()).toBe(1);

    cache.startSweeper();
    cache.dispose();
    expect(cache.size()).toBe(0);
  });

  it('should not store a fetch that settles after dispose', async () => {
    const { cache } = makeCache();
    let resolveFetch: (value: string) => void = () => undefined;
    const pending = cache.getOrFetch('mint', 1000, () => new Promise<string>(resolve => {
      resolveFetch = resolve;
    }));

    cache.dispose();
    resolveFetch('late');

    await expect(pending).resolves.toBe('late');
    expect(cache.size()).toBe(0);
    expect(cache.get('mint')).toBeUndefined();
  });
});
