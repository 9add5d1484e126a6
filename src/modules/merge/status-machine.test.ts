import { describe, it, expect } from 'vitest';
import { canEnterSideState, deriveTargetStatus, planTransitions } from './status-machine.js';
import { emptyMarket } from './field-merge.js';
import { TokenStatus } from '../../types/index.js';
import { makeMint } from '../../testing/fixtures.js';

const ALL_STATUSES = Object.values(TokenStatus);

describe('deriveTargetStatus', () => {
  it('should derive the main-line target from fields', () => {
    expect(deriveTargetStatus(emptyMarket())).toBe(TokenStatus.CREATED);
    expect(deriveTargetStatus({ ...emptyMarket(), liquidityUsd: 8000 })).toBe(TokenStatus.CREATED);
    expect(deriveTargetStatus({ ...emptyMarket(), hasDexData: false })).toBe(TokenStatus.NO_DEX_DATA);
    expect(deriveTargetStatus({ ...emptyMarket(), volume24h: 10 })).toBe(TokenStatus.ACTIVE);
    expect(deriveTargetStatus({ ...emptyMarket(), bondingCurveProgress: 40 })).toBe(TokenStatus.ACTIVE);
    expect(deriveTargetStatus({ ...emptyMarket(), bondingCurveProgress: 100 })).toBe(TokenStatus.COMPLETED);
    expect(deriveTargetStatus({ ...emptyMarket(), bondingCurveComplete: true })).toBe(TokenStatus.COMPLETED);
    expect(deriveTargetStatus({ ...emptyMarket(), migratedPoolAddress: makeMint(4) })).toBe(TokenStatus.MIGRATED);
  });
});

describe('planTransitions', () => {
  it('should step through intermediate states', () => {
    expect(planTransitions(TokenStatus.CREATED, TokenStatus.MIGRATED, 'pool').map(t => [t.from, t.to])).toEqual([
      [TokenStatus.CREATED, TokenStatus.ACTIVE],
      [TokenStatus.ACTIVE, TokenStatus.COMPLETED],
      [TokenStatus.COMPLETED, TokenStatus.MIGRATED],
    ]);
    expect(planTransitions(TokenStatus.NO_DEX_DATA, TokenStatus.ACTIVE, 'trades')).toEqual([
      { from: TokenStatus.NO_DEX_DATA, to: TokenStatus.ACTIVE, reason: 'trades' },
    ]);
  });

  it('should ignore backward targets', () => {
    expect(planTransitions(TokenStatus.MIGRATED, TokenStatus.ACTIVE, 'x')).toEqual([]);
    expect(planTransitions(TokenStatus.COMPLETED, TokenStatus.CREATED, 'x')).toEqual([]);
    expect(planTransitions(TokenStatus.NO_DEX_DATA, TokenStatus.CREATED, 'x')).toEqual([]);
  });

  it('should allow the lateral move to no_dex_data', () => {
    expect(planTransitions(TokenStatus.CREATED, TokenStatus.NO_DEX_DATA, 'no pairs')).toHaveLength(1);
  });

  it('should never move a token out of a side state', () => {
    for (const side of [TokenStatus.TERMINATED, TokenStatus.ARCHIVED, TokenStatus.BLACKLISTED]) {
      expect(planTransitions(side, TokenStatus.MIGRATED, 'x')).toEqual([]);
    }
  });
});

describe('canEnterSideState', () => {
  it('should allow blacklisting from anything but itself', () => {
    for (const status of ALL_STATUSES) {
      expect(canEnterSideState(status, TokenStatus.BLACKLISTED)).toBe(status !== TokenStatus.BLACKLISTED);
    }
  });

  it('should never leave blacklisted', () => {
    for (const target of ALL_STATUSES) {
      expect(canEnterSideState(TokenStatus.BLACKLISTED, target)).toBe(false);
    }
  });

  it('should only terminate early-life tokens', () => {
    expect(canEnterSideState(TokenStatus.CREATED, TokenStatus.TERMINATED)).toBe(true);
    expect(canEnterSideState(TokenStatus.ACTIVE, TokenStatus.TERMINATED)).toBe(true);
    expect(canEnterSideState(TokenStatus.NO_DEX_DATA, TokenStatus.TERMINATED)).toBe(true);
    expect(canEnterSideState(TokenStatus.MIGRATED, TokenStatus.TERMINATED)).toBe(false);
    expect(canEnterSideState(TokenStatus.MIGRATED, TokenStatus.ARCHIVED)).toBe(true);
  });
});
