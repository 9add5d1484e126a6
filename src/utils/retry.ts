// ===========================================
// RETRY POLICY
// Exponential backoff around a single adapter call
// ===========================================

import axios from 'axios';
import type { RetryConfig } from '../types/index.js';
import { RateLimited } from './errors.js';

// ============ TYPES ============

export type RetryOutcome<T> =
  | { kind: 'ok'; value: T; attempts: number }
  | { kind: 'transient_failure'; error: unknown; attempts: number }
  | { kind: 'permanent_failure'; error: unknown; attempts: number };

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

/**
 * Timeouts, network failures and 5xx responses are worth another attempt.
 * Rate limits and everything else are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof RateLimited) return false;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return error.code === undefined || TRANSIENT_NETWORK_CODES.has(error.code);
    }
    return status >= 500;
  }

  return false;
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: unknown, now = Date.now()): number | null {
  if (typeof header !== 'string' && typeof header !== 'number') return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, Math.round(seconds * 1000));

  const date = Date.parse(String(header));
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

// ============ POLICY ============

export class RetryPolicy {
  constructor(
    private readonly config: RetryConfig,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  delayFor(attempt: number): number {
    return Math.min(
      this.config.baseDelayMs * Math.pow(this.config.multiplier, attempt - 1),
      this.config.maxDelayMs
    );
  }

  async run<T>(fn: () => Promise<T>): Promise<RetryOutcome<T>> {
    let attempts = 0;
    let lastError: unknown = null;

    while (attempts < this.config.maxAttempts) {
      attempts++;
      try {
        const value = await fn();
        return { kind: 'ok', value, attempts };
      } catch (error) {
        lastError = error;
        if (!isTransientError(error)) {
          return { kind: 'permanent_failure', error, attempts };
        }
        if (attempts < this.config.maxAttempts) {
          await this.sleep(this.delayFor(attempts));
        }
      }
    }

    return { kind: 'transient_failure', error: lastError, attempts };
  }
}
