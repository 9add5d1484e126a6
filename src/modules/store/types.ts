import type { CanonicalToken, Snapshot, SnapshotReason, TokenQuery } from '../../types/index.js';

/**
 * Durable canonical state plus append-only snapshots.
 *
 * `upsertCanonical` is optimistic: it succeeds only when the stored version
 * equals `expectedVersion` (`null` meaning the mint must not exist yet) and
 * throws StoreWriteConflict otherwise. The returned token carries the new
 * version.
 */
export interface TokenStore {
  init(): Promise<void>;
  close(): Promise<void>;

  getToken(mintAddress: string): Promise<CanonicalToken | null>;
  upsertCanonical(token: CanonicalToken, expectedVersion: number | null): Promise<CanonicalToken>;
  /** Bump updatedAt without touching state or version. */
  touch(mintAddress: string, updatedAt: number): Promise<void>;

  /**
   * Copy the stored token into a snapshot. Timestamps strictly increase per
   * mint; a timestamp at or before the previous one is moved to previous + 1.
   */
  appendSnapshot(mintAddress: string, reason: SnapshotReason, at: number): Promise<Snapshot>;
  history(mintAddress: string, since?: number): Promise<Snapshot[]>;
  lastSnapshot(mintAddress: string): Promise<Snapshot | null>;

  query(query: TokenQuery): Promise<CanonicalToken[]>;
  countTokens(): Promise<number>;
}
