import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from './rate-limiter.js';

function makeLimiter(overrides: { maxRequestsPerMinute?: number; minDelayBetweenRequests?: number; maxConcurrent?: number } = {}) {
  let now = 10_000;
  const sleep = vi.fn(async (ms: number) => {
    now += ms;
  });
  const limiter = new RateLimiter(
    {
      serviceName: 'test',
      maxRequestsPerMinute: 60,
      minDelayBetweenRequests: 0,
      maxConcurrent: 5,
      ...overrides,
    },
    sleep,
    () => now
  );
  return { limiter, sleep };
}

describe('RateLimiter', () => {
  it('should pass results and errors through', async () => {
    const { limiter } = makeLimiter();

    await expect(limiter.schedule(async () => 42)).resolves.toBe(42);
    await expect(limiter.schedule(async () => {
      throw new Error('upstream');
    })).rejects.toThrow('upstream');
  });

  it('should bound concurrent requests', async () => {
    const { limiter } = makeLimiter({ maxConcurrent: 1 });
    const releases: Array<() => void> = [];
    const started: number[] = [];

    const run = (id: number) => limiter.schedule(() => new Promise<number>(resolve => {
      started.push(id);
      releases.push(() => resolve(id));
    }));

    const first = run(1);
    const second = run(2);
    await Promise.resolve();

    expect(started).toEqual([1]);
    expect(limiter.getInFlight()).toBe(1);

    releases[0]?.();
    await first;
    await vi.waitFor(() => expect(started).toEqual([1, 2]));
    releases[1]?.();
    await expect(second).resolves.toBe(2);
  });

  it('should wait for the next window when the per-minute budget is spent', async () => {
    const { limiter, sleep } = makeLimiter({ maxRequestsPerMinute: 2 });

    const results = await Promise.all([1, 2, 3].map(n => limiter.schedule(async () => n)));

    expect(results).toEqual([1, 2, 3]);
    expect(sleep).toHaveBeenCalledWith(60_000);
  });

  it('should space requests by the minimum delay', async () => {
    const { limiter, sleep } = makeLimiter({ minDelayBetweenRequests: 500 });

    await limiter.schedule(async () => 'a');
    await limiter.schedule(async () => 'b');

    expect(sleep).toHaveBeenCalledWith(500);
  });
});
