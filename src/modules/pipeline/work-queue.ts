// ===========================================
// BOUNDED WORK QUEUE
// Fixed worker pool; producers wait while the queue is full
// ===========================================

import { logger } from '../../utils/logger.js';
import { QueueClosed } from '../../utils/errors.js';

export interface WorkQueueOptions {
  capacity: number;
  workers: number;
}

export interface QueueStats {
  pending: number;
  active: number;
  closed: boolean;
}

export class WorkQueue<T> {
  private items: T[] = [];
  private active = 0;
  private closed = false;
  private spaceWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: (item: T) => Promise<void>,
    private readonly options: WorkQueueOptions
  ) {}

  /**
   * Resolves once the item is accepted. Waits while the queue is at
   * capacity; rejects with QueueClosed after close().
   */
  async submit(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.options.capacity) {
      await new Promise<void>(resolve => this.spaceWaiters.push(resolve));
    }
    if (this.closed) throw new QueueClosed();

    this.items.push(item);
    this.pump();
  }

  /**
   * Stop accepting work. Items already accepted still run.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeProducers();
    this.settleIfIdle();
  }

  /**
   * Resolves when every accepted item has been handled.
   */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>(resolve => this.idleWaiters.push(resolve));
  }

  stats(): QueueStats {
    return { pending: this.items.length, active: this.active, closed: this.closed };
  }

  private pump(): void {
    while (this.active < this.options.workers) {
      const item = this.items.shift();
      if (item === undefined) break;
      this.active++;
      this.wakeProducers();
      void this.run(item);
    }
    this.settleIfIdle();
  }

  private async run(item: T): Promise<void> {
    try {
      await this.handler(item);
    } catch (error) {
      logger.error({ err: error }, 'Work item failed');
    } finally {
      this.active--;
      this.pump();
    }
  }

  private wakeProducers(): void {
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const wake of waiters) wake();
  }

  private isIdle(): boolean {
    return this.items.length === 0 && this.active === 0;
  }

  private settleIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
