import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Scheduler } from './scheduler.js';

describe('Scheduler', () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new Scheduler();
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it('should run each task immediately and then on its interval', async () => {
    const run = vi.fn(async () => undefined);
    scheduler.start([{ name: 'dexscreener', intervalMs: 1000, run }]);

    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(5);
  });

  it('should never overlap a slow task with itself', async () => {
    const run = vi.fn(() => new Promise<void>(resolve => setTimeout(resolve, 5000)));
    scheduler.start([{ name: 'raydium', intervalMs: 1000, run }]);

    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(1);

    // finishes at 5000, next run 1000 later
    await vi.advanceTimersByTimeAsync(2999);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('should honour a longer back-off delay', async () => {
    const run = vi.fn(async () => undefined);
    scheduler.start([{ name: 'jupiter', intervalMs: 1000, run, nextDelayMs: () => 10_000 }]);

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(9999);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('should keep scheduling after a failure', async () => {
    const run = vi.fn(async () => {
      throw new Error('upstream down');
    });
    scheduler.start([{ name: 'pumpfun', intervalMs: 1000, run }]);

    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('should stop scheduling after stop', async () => {
    const run = vi.fn(async () => undefined);
    scheduler.start([{ name: 'dexscreener', intervalMs: 1000, run }]);
    await vi.advanceTimersByTimeAsync(0);

    scheduler.stop();
    await scheduler.idle();
    await vi.advanceTimersByTimeAsync(5000);
    expect(run).toHaveBeenCalledTimes(1);
  });
});
