import { logger } from '../../utils/logger.js';
import { StoreWriteConflict, errorMessage } from '../../utils/errors.js';
import type { TokenStore } from './types.js';
import type { CanonicalToken, Snapshot, SnapshotReason, TokenQuery } from '../../types/index.js';

export interface StoreHealth {
  consecutiveFailures: number;
  lastError: string | null;
}

/**
 * Wraps a store and counts consecutive failures for health reporting.
 * Version conflicts are expected under concurrency and do not count.
 */
export class MonitoredTokenStore implements TokenStore {
  private consecutiveFailures = 0;
  private lastError: string | null = null;

  constructor(private readonly inner: TokenStore) {}

  health(): StoreHealth {
    return { consecutiveFailures: this.consecutiveFailures, lastError: this.lastError };
  }

  private async track<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      this.consecutiveFailures = 0;
      return result;
    } catch (error) {
      if (!(error instanceof StoreWriteConflict)) {
        this.consecutiveFailures++;
        this.lastError = errorMessage(error);
        logger.error({ err: error, operation, consecutiveFailures: this.consecutiveFailures }, 'Store operation failed');
      }
      throw error;
    }
  }

  init(): Promise<void> {
    return this.track('init', () => this.inner.init());
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  getToken(mintAddress: string): Promise<CanonicalToken | null> {
    return this.track('getToken', () => this.inner.getToken(mintAddress));
  }

  upsertCanonical(token: CanonicalToken, expectedVersion: number | null): Promise<CanonicalToken> {
    return this.track('upsertCanonical', () => this.inner.upsertCanonical(token, expectedVersion));
  }

  touch(mintAddress: string, updatedAt: number): Promise<void> {
    return this.track('touch', () => this.inner.touch(mintAddress, updatedAt));
  }

  appendSnapshot(mintAddress: string, reason: SnapshotReason, at: number): Promise<Snapshot> {
    return this.track('appendSnapshot', () => this.inner.appendSnapshot(mintAddress, reason, at));
  }

  history(mintAddress: string, since?: number): Promise<Snapshot[]> {
    return this.track('history', () => this.inner.history(mintAddress, since));
  }

  lastSnapshot(mintAddress: string): Promise<Snapshot | null> {
    return this.track('lastSnapshot', () => this.inner.lastSnapshot(mintAddress));
  }

  query(query: TokenQuery): Promise<CanonicalToken[]> {
    return this.track('query', () => this.inner.query(query));
  }

  countTokens(): Promise<number> {
    return this.track('countTokens', () => this.inner.countTokens());
  }
}
