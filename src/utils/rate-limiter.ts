// ===========================================
// PER-SOURCE RATE LIMITER
// Fixed per-minute window, minimum spacing, bounded concurrency
// ===========================================

import { logger } from './logger.js';
import { defaultSleep, type Sleep } from './retry.js';

// ============ TYPES ============

export interface RateLimiterConfig {
  serviceName: string;
  maxRequestsPerMinute: number;
  minDelayBetweenRequests: number; // ms
  maxConcurrent: number;
}

interface QueueItem {
  start: () => void;
}

const WINDOW_MS = 60_000;

// ============ RATE LIMITER CLASS ============

export class RateLimiter {
  private requestCount = 0;
  private windowStartTime: number;
  private lastRequestTime = 0;
  private inFlight = 0;
  private queue: QueueItem[] = [];
  private isProcessing = false;

  constructor(
    private readonly config: RateLimiterConfig,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {
    this.windowStartTime = this.now();
  }

  /**
   * Run a request once a slot in the window and a concurrency slot are free.
   * Failures propagate to the caller unchanged.
   */
  schedule<T>(request: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => {
          this.inFlight++;
          void request()
            .then(resolve, reject)
            .finally(() => {
              this.inFlight--;
              this.kick();
            });
        },
      });
      this.kick();
    });
  }

  private kick(): void {
    if (this.isProcessing) return;
    this.processQueue().catch(err => {
      this.isProcessing = false;
      logger.error({ err, service: this.config.serviceName }, 'Rate limiter queue failed');
    });
  }

  private async processQueue(): Promise<void> {
    this.isProcessing = true;

    while (this.queue.length > 0 && this.inFlight < this.config.maxConcurrent) {
      const now = this.now();
      if (now - this.windowStartTime >= WINDOW_MS) {
        this.requestCount = 0;
        this.windowStartTime = now;
      }

      // If we've hit the per-minute limit, wait until next window
      if (this.requestCount >= this.config.maxRequestsPerMinute) {
        const waitTime = WINDOW_MS - (now - this.windowStartTime);
        if (waitTime > 0) {
          logger.debug({
            service: this.config.serviceName,
            waitMs: waitTime,
            queueSize: this.queue.length,
          }, 'Rate limit reached, waiting for next window');
          await this.sleep(waitTime);
        }
        this.requestCount = 0;
        this.windowStartTime = this.now();
      }

      const sinceLast = this.now() - this.lastRequestTime;
      if (this.lastRequestTime > 0 && sinceLast < this.config.minDelayBetweenRequests) {
        await this.sleep(this.config.minDelayBetweenRequests - sinceLast);
      }

      const item = this.queue.shift();
      if (!item) break;

      this.requestCount++;
      this.lastRequestTime = this.now();
      item.start();
    }

    this.isProcessing = false;
  }

  getQueueDepth(): number {
    return this.queue.length;
  }

  getInFlight(): number {
    return this.inFlight;
  }

  getRemainingRequests(): number {
    if (this.now() - this.windowStartTime >= WINDOW_MS) {
      return this.config.maxRequestsPerMinute;
    }
    return Math.max(0, this.config.maxRequestsPerMinute - this.requestCount);
  }
}
