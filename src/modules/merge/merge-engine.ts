// ===========================================
// DEDUPLICATION & MERGE ENGINE
// One canonical record per mint, rescored on every merge
// ===========================================

import { logger, shortMint } from '../../utils/logger.js';
import { InvalidTokenState, StoreWriteConflict } from '../../utils/errors.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { isValidMintAddress } from '../../utils/mint-address.js';
import { MARKET_FIELD_KEYS, activityTimestamp, emptyMarket, mergeFields } from './field-merge.js';
import { canEnterSideState, deriveTargetStatus, planTransitions } from './status-machine.js';
import { SnapshotReason, TokenSource, TokenStatus } from '../../types/index.js';
import type { RiskScoringEngine } from '../scoring/risk-engine.js';
import type { TokenStore } from '../store/types.js';
import type { NotificationSink } from '../notifications/types.js';
import type {
  CanonicalToken,
  MarketFields,
  MergeOutcome,
  RawTokenObservation,
  ScoreResult,
  Snapshot,
  StatusTransition,
} from '../../types/index.js';

// ============ CONSTANTS ============

// Identity (symbol/name) is replaced only by a strictly more trusted source
const IDENTITY_TRUST: Record<TokenSource, number> = {
  [TokenSource.MANUAL]: 4,
  [TokenSource.JUPITER]: 3,
  [TokenSource.PUMPFUN]: 2,
  [TokenSource.DEXSCREENER]: 1,
  [TokenSource.RAYDIUM]: 1,
  [TokenSource.SOLANA_RPC]: 0,
  [TokenSource.RUGCHECK]: 0,
};

// Liquidity at or below this share of its recorded peak counts as drained
const DRAINED_LIQUIDITY_SHARE = 0.1;

type Identity = Pick<CanonicalToken, 'symbol' | 'name' | 'identitySource'>;

export interface MergeEngineOptions {
  // Relative move in price, liquidity or risk that triggers a snapshot
  changeThreshold: number;
  now?: () => number;
}

// ============ HELPERS ============

function newToken(observation: RawTokenObservation, now: number): CanonicalToken {
  return {
    mintAddress: observation.mintAddress,
    symbol: null,
    name: null,
    identitySource: null,
    firstDiscoveredAt: observation.observedAt,
    updatedAt: now,
    lastSeenAt: observation.observedAt,
    lastActivityAt: null,
    status: TokenStatus.CREATED,
    market: emptyMarket(),
    fieldObservedAt: {},
    sources: [],
    riskScore: 0,
    investScore: 0,
    manualBlacklist: false,
    version: 0,
  };
}

export function resolveIdentity(current: Identity, observation: RawTokenObservation): Identity {
  const symbol = observation.identity?.symbol?.trim() || null;
  const name = observation.identity?.name?.trim() || null;
  if (symbol === null && name === null) return current;

  const outranks = current.identitySource === null ||
    IDENTITY_TRUST[observation.source] > IDENTITY_TRUST[current.identitySource];

  if (outranks) {
    return {
      symbol: symbol ?? current.symbol,
      name: name ?? current.name,
      identitySource: observation.source,
    };
  }

  // Lower or equal trust only fills gaps
  return {
    symbol: current.symbol ?? symbol,
    name: current.name ?? name,
    identitySource: current.identitySource,
  };
}

function latest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

export function movedBeyond(before: number | null, after: number | null, threshold: number): boolean {
  if (before === null || after === null) return before !== after;
  if (before === 0) return after !== 0;
  return Math.abs(after - before) / Math.abs(before) > threshold;
}

/**
 * Evidence beyond the score that a token is a rug, or null.
 */
export function blacklistConfirmation(token: CanonicalToken, history: Snapshot[]): string | null {
  if (token.manualBlacklist) return 'manual confirmation';
  if (token.market.flaggedRugged === true) return 'source flagged rug';

  const liquidity = token.market.liquidityUsd;
  if (liquidity !== null) {
    const peak = history.reduce((max, s) => Math.max(max, s.market.liquidityUsd ?? 0), 0);
    if (peak > 0 && liquidity <= peak * DRAINED_LIQUIDITY_SHARE) {
      const drained = ((1 - liquidity / peak) * 100).toFixed(0);
      return `liquidity drained ${drained}% from peak $${peak.toFixed(0)}`;
    }
  }

  return null;
}

function sameFreshness(a: CanonicalToken, b: CanonicalToken): boolean {
  return MARKET_FIELD_KEYS.every(key => a.fieldObservedAt[key] === b.fieldObservedAt[key]);
}

function sameState(a: CanonicalToken, b: CanonicalToken): boolean {
  return (
    sameFreshness(a, b) &&
    a.symbol === b.symbol &&
    a.name === b.name &&
    a.identitySource === b.identitySource &&
    a.lastSeenAt === b.lastSeenAt &&
    a.lastActivityAt === b.lastActivityAt &&
    a.status === b.status &&
    a.sources.length === b.sources.length &&
    a.riskScore === b.riskScore &&
    a.investScore === b.investScore &&
    a.manualBlacklist === b.manualBlacklist
  );
}

// ============ ENGINE ============

export class MergeEngine {
  private readonly locks = new KeyedMutex();
  private readonly now: () => number;

  constructor(
    private readonly store: TokenStore,
    private readonly scorer: RiskScoringEngine,
    private readonly sink: NotificationSink,
    private readonly options: MergeEngineOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Merge one observation into its canonical record.
   * Calls for the same mint are serialized; a version conflict from a
   * concurrent writer elsewhere is retried once.
   */
  async merge(observation: RawTokenObservation): Promise<MergeOutcome> {
    if (!isValidMintAddress(observation.mintAddress)) {
      throw new InvalidTokenState(observation.mintAddress, `Invalid mint address: ${observation.mintAddress}`);
    }

    return this.locks.runExclusive(observation.mintAddress, () =>
      this.withConflictRetry(observation.mintAddress, () => this.mergeOnce(observation))
    );
  }

  /**
   * Move a token into a side state (terminated, archived, blacklisted).
   * Returns null for an unknown mint.
   */
  async applyStatus(
    mintAddress: string,
    target: TokenStatus,
    reason: string,
    options: { manualBlacklist?: boolean } = {}
  ): Promise<MergeOutcome | null> {
    return this.locks.runExclusive(mintAddress, () =>
      this.withConflictRetry(mintAddress, () => this.applyStatusOnce(mintAddress, target, reason, options))
    );
  }

  private async withConflictRetry<T>(mintAddress: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof StoreWriteConflict)) throw error;
      logger.debug({ mint: shortMint(mintAddress) }, 'Write conflict, retrying once');
      return fn();
    }
  }

  private async mergeOnce(observation: RawTokenObservation): Promise<MergeOutcome> {
    const now = this.now();
    const { mintAddress, source } = observation;

    const existing = await this.store.getToken(mintAddress);
    const base = existing ?? newToken(observation, now);

    const { market, fieldObservedAt, changedFields } = mergeFields(base.market, base.fieldObservedAt, observation);

    const candidate: CanonicalToken = {
      ...base,
      ...resolveIdentity(base, observation),
      market,
      fieldObservedAt,
      sources: base.sources.includes(source) ? base.sources : [...base.sources, source],
      lastSeenAt: Math.max(base.lastSeenAt, observation.observedAt),
      lastActivityAt: latest(base.lastActivityAt, activityTimestamp(observation)),
      updatedAt: now,
    };

    const history = existing ? await this.store.history(mintAddress) : [];
    const score = this.scorer.score(candidate, history, now);
    candidate.riskScore = score.riskScore;
    candidate.investScore = score.investScore;

    const transitions = this.statusTransitions(base.status, candidate, history, score, `${source} observation`);
    candidate.status = transitions[transitions.length - 1]?.to ?? base.status;

    if (existing && changedFields.length === 0 && sameState(existing, candidate)) {
      await this.store.touch(mintAddress, now);
      return {
        result: 'unchanged',
        token: { ...existing, updatedAt: now },
        previousStatus: existing.status,
        transitions: [],
        score,
      };
    }

    const saved = await this.store.upsertCanonical(candidate, existing ? existing.version : null);
    await this.recordSnapshots(saved, existing, transitions, now);
    this.emit(saved, existing === null, transitions);

    if (!existing) {
      logger.info({
        mint: shortMint(mintAddress),
        symbol: saved.symbol,
        source,
        status: saved.status,
        riskScore: saved.riskScore,
      }, 'New token discovered');
    } else if (transitions.length > 0) {
      logger.info({
        mint: shortMint(mintAddress),
        from: existing.status,
        to: saved.status,
      }, 'Token status changed');
    }

    return {
      result: existing ? 'updated' : 'created',
      token: saved,
      previousStatus: existing ? existing.status : null,
      transitions,
      score,
    };
  }

  private statusTransitions(
    current: TokenStatus,
    token: CanonicalToken,
    history: Snapshot[],
    score: ScoreResult,
    reason: string
  ): StatusTransition[] {
    const transitions = planTransitions(current, deriveTargetStatus(token.market), reason);
    const status = transitions[transitions.length - 1]?.to ?? current;

    if (score.riskScore >= this.scorer.blacklistThreshold && canEnterSideState(status, TokenStatus.BLACKLISTED)) {
      const confirmation = blacklistConfirmation(token, history);
      if (confirmation !== null) {
        transitions.push({
          from: status,
          to: TokenStatus.BLACKLISTED,
          reason: `risk ${score.riskScore.toFixed(1)} with ${confirmation}`,
        });
      }
    }

    return transitions;
  }

  private async applyStatusOnce(
    mintAddress: string,
    target: TokenStatus,
    reason: string,
    options: { manualBlacklist?: boolean }
  ): Promise<MergeOutcome | null> {
    const existing = await this.store.getToken(mintAddress);
    if (!existing) return null;

    const now = this.now();
    const history = await this.store.history(mintAddress);
    const manualBlacklist = existing.manualBlacklist || options.manualBlacklist === true;
    const candidate: CanonicalToken = { ...existing, manualBlacklist, updatedAt: now };
    const score = this.scorer.score(candidate, history, now);

    const transitions: StatusTransition[] = canEnterSideState(existing.status, target)
      ? [{ from: existing.status, to: target, reason }]
      : [];

    if (transitions.length === 0 && manualBlacklist === existing.manualBlacklist) {
      return { result: 'unchanged', token: existing, previousStatus: existing.status, transitions, score };
    }

    candidate.status = transitions[0]?.to ?? existing.status;
    candidate.riskScore = score.riskScore;
    candidate.investScore = score.investScore;

    const saved = await this.store.upsertCanonical(candidate, existing.version);
    await this.recordSnapshots(saved, existing, transitions, now);
    this.emit(saved, false, transitions);

    logger.info({ mint: shortMint(mintAddress), from: existing.status, to: saved.status, reason }, 'Token status applied');

    return { result: 'updated', token: saved, previousStatus: existing.status, transitions, score };
  }

  // ============ SNAPSHOTS & EVENTS ============

  private async recordSnapshots(
    saved: CanonicalToken,
    previous: CanonicalToken | null,
    transitions: StatusTransition[],
    now: number
  ): Promise<void> {
    const { mintAddress } = saved;

    if (!previous || transitions.length > 0) {
      const count = Math.max(1, transitions.length);
      for (let i = 0; i < count; i++) {
        await this.store.appendSnapshot(mintAddress, SnapshotReason.STATUS_CHANGE, now);
      }
      return;
    }

    const last = await this.store.lastSnapshot(mintAddress);
    if (!last || this.significantChange(last.market, last.riskScore, saved)) {
      await this.store.appendSnapshot(mintAddress, SnapshotReason.THRESHOLD_TRIGGERED, now);
    }
  }

  private significantChange(market: MarketFields, riskScore: number, token: CanonicalToken): boolean {
    const threshold = this.options.changeThreshold;
    return (
      movedBeyond(market.priceUsd, token.market.priceUsd, threshold) ||
      movedBeyond(market.liquidityUsd, token.market.liquidityUsd, threshold) ||
      movedBeyond(riskScore, token.riskScore, threshold)
    );
  }

  private emit(token: CanonicalToken, created: boolean, transitions: StatusTransition[]): void {
    if (created) {
      this.notify('onNewToken', token.mintAddress, () => this.sink.onNewToken(token));
    }
    for (const transition of transitions) {
      this.notify('onStatusChange', token.mintAddress, () => this.sink.onStatusChange(token, transition));
      if (transition.to === TokenStatus.BLACKLISTED) {
        this.notify('onBlacklist', token.mintAddress, () => this.sink.onBlacklist(token, transition.reason));
      }
    }
  }

  // Fire-and-forget: sink failures never reach the merge
  private notify(event: string, mintAddress: string, send: () => Promise<void>): void {
    void Promise.resolve()
      .then(send)
      .catch(error => {
        logger.warn({ err: error, event, mint: shortMint(mintAddress) }, 'Notification failed');
      });
  }
}
