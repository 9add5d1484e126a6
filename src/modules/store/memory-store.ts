// ===========================================
// IN-MEMORY TOKEN STORE
// Default backend when DATABASE_URL is unset, and the test backend
// ===========================================

import { v4 as uuidv4 } from 'uuid';
import { InvalidTokenState, StoreWriteConflict } from '../../utils/errors.js';
import { applyQuery } from './query.js';
import type { TokenStore } from './types.js';
import type { CanonicalToken, Snapshot, SnapshotReason, TokenQuery } from '../../types/index.js';

export class MemoryTokenStore implements TokenStore {
  private tokens: Map<string, CanonicalToken> = new Map();
  private snapshots: Map<string, Snapshot[]> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  async init(): Promise<void> {
    // nothing to prepare
  }

  async close(): Promise<void> {
    this.tokens.clear();
    this.snapshots.clear();
  }

  async getToken(mintAddress: string): Promise<CanonicalToken | null> {
    const token = this.tokens.get(mintAddress);
    return token ? structuredClone(token) : null;
  }

  async upsertCanonical(token: CanonicalToken, expectedVersion: number | null): Promise<CanonicalToken> {
    const current = this.tokens.get(token.mintAddress);
    const currentVersion = current ? current.version : null;

    if (currentVersion !== expectedVersion) {
      throw new StoreWriteConflict(token.mintAddress, expectedVersion);
    }

    const stored: CanonicalToken = {
      ...structuredClone(token),
      // first discovery is immutable once written
      firstDiscoveredAt: current ? current.firstDiscoveredAt : token.firstDiscoveredAt,
      version: (currentVersion ?? 0) + 1,
    };
    this.tokens.set(token.mintAddress, stored);
    return structuredClone(stored);
  }

  async touch(mintAddress: string, updatedAt: number): Promise<void> {
    const current = this.tokens.get(mintAddress);
    if (current) current.updatedAt = updatedAt;
  }

  async appendSnapshot(mintAddress: string, reason: SnapshotReason, at: number): Promise<Snapshot> {
    const token = this.tokens.get(mintAddress);
    if (!token) {
      throw new InvalidTokenState(mintAddress, `Cannot snapshot unknown token ${mintAddress}`);
    }

    const list = this.snapshots.get(mintAddress) ?? [];
    const last = list[list.length - 1];
    const snapshotTimestamp = last && at <= last.snapshotTimestamp ? last.snapshotTimestamp + 1 : at;

    const snapshot: Snapshot = {
      id: uuidv4(),
      mintAddress,
      snapshotTimestamp,
      reason,
      status: token.status,
      market: structuredClone(token.market),
      riskScore: token.riskScore,
      investScore: token.investScore,
    };

    list.push(snapshot);
    this.snapshots.set(mintAddress, list);
    return structuredClone(snapshot);
  }

  async history(mintAddress: string, since = 0): Promise<Snapshot[]> {
    const list = this.snapshots.get(mintAddress) ?? [];
    return list.filter(s => s.snapshotTimestamp >= since).map(s => structuredClone(s));
  }

  async lastSnapshot(mintAddress: string): Promise<Snapshot | null> {
    const list = this.snapshots.get(mintAddress) ?? [];
    const last = list[list.length - 1];
    return last ? structuredClone(last) : null;
  }

  async query(query: TokenQuery): Promise<CanonicalToken[]> {
    return applyQuery(this.tokens.values(), query, query.now ?? this.now()).map(t => structuredClone(t));
  }

  async countTokens(): Promise<number> {
    return this.tokens.size;
  }
}
