import { describe, it, expect } from 'vitest';
import { analyzeLiquidity, LIQUIDITY_NEUTRAL } from './liquidity.js';
import { analyzeHolders, HOLDERS_UNKNOWN } from './holders.js';
import { analyzeMaturity, tokenAgeHours } from './maturity.js';
import { analyzeTradingPattern, isRoundAmount, coefficientOfVariation } from './trading-pattern.js';
import { makeMint, makeSnapshot, makeToken, testConfig, HOUR, T0 } from '../../../testing/fixtures.js';
import type { AnalyzerInput } from './types.js';
import type { MarketFields, Snapshot, TradeSample } from '../../../types/index.js';

const config = testConfig().scoring;
const mint = makeMint(5);

function input(market: Partial<MarketFields>, options: { now?: number; history?: Snapshot[]; firstDiscoveredAt?: number } = {}): AnalyzerInput {
  return {
    token: makeToken({ mintAddress: mint, market, firstDiscoveredAt: options.firstDiscoveredAt ?? T0 }),
    history: options.history ?? [],
    now: options.now ?? T0,
    config,
  };
}

describe('analyzeLiquidity', () => {
  it('should return neutral when liquidity is unknown', () => {
    const result = analyzeLiquidity(input({}));
    expect(result.value).toBe(LIQUIDITY_NEUTRAL);
    expect(result.neutral).toBe(true);
  });

  it('should score floors', () => {
    expect(analyzeLiquidity(input({ liquidityUsd: 500 })).value).toBe(1);
    expect(analyzeLiquidity(input({ liquidityUsd: 3000 })).value).toBe(0.85);
    expect(analyzeLiquidity(input({ liquidityUsd: 60_000 })).value).toBe(0.1);
  });

  it('should ramp on a log scale between the floor and healthy depth', () => {
    const result = analyzeLiquidity(input({ liquidityUsd: 8000 }));
    expect(result.value).toBeCloseTo(0.418352, 5);
    expect(result.neutral).toBe(false);
    expect(result.reasons).toEqual(['Moderate liquidity: $8000']);
  });

  it('should penalize liquidity concentrated in one pool', () => {
    expect(analyzeLiquidity(input({ liquidityUsd: 60_000, largestPoolShare: 0.9 })).value).toBeCloseTo(0.2, 10);
    expect(analyzeLiquidity(input({ liquidityUsd: 60_000, largestPoolShare: 0.7 })).value).toBeCloseTo(0.15, 10);
    expect(analyzeLiquidity(input({ liquidityUsd: 500, largestPoolShare: 0.95 })).value).toBe(1);
  });
});

describe('analyzeHolders', () => {
  it('should return the unknown-distribution value when nothing is known', () => {
    const result = analyzeHolders(input({}));
    expect(result.value).toBe(HOLDERS_UNKNOWN);
    expect(result.neutral).toBe(true);
  });

  it('should score top-10 concentration', () => {
    expect(analyzeHolders(input({ top10HolderPct: 85 })).value).toBe(1);
    expect(analyzeHolders(input({ top10HolderPct: 65 })).value).toBe(0.75);
    expect(analyzeHolders(input({ top10HolderPct: 30 })).value).toBe(0.2);
  });

  it('should adjust for holder count', () => {
    expect(analyzeHolders(input({ top10HolderPct: 50, holderCount: 50 })).value).toBeCloseTo(0.55, 10);
    expect(analyzeHolders(input({ top10HolderPct: 30, holderCount: 5000 })).value).toBeCloseTo(0.1, 10);
    expect(analyzeHolders(input({ holderCount: 10 })).value).toBeCloseTo(0.8, 10);
  });

  it('should add suspicion for live mint and freeze authorities', () => {
    expect(analyzeHolders(input({ top10HolderPct: 30, mintAuthorityEnabled: true })).value).toBeCloseTo(0.5, 10);
    expect(analyzeHolders(input({ top10HolderPct: 85, mintAuthorityEnabled: true, freezeAuthorityEnabled: true })).value).toBe(1);

    const freezeOnly = analyzeHolders(input({ freezeAuthorityEnabled: true }));
    expect(freezeOnly.value).toBeCloseTo(0.8, 10);
    expect(freezeOnly.neutral).toBe(false);
    expect(freezeOnly.reasons).toEqual(['Freeze authority active']);
  });

  it('should not move the score for revoked authorities', () => {
    const result = analyzeHolders(input({ top10HolderPct: 30, mintAuthorityEnabled: false, freezeAuthorityEnabled: false }));
    expect(result.value).toBe(0.2);
    expect(result.reasons).toEqual([]);
  });
});

describe('analyzeMaturity', () => {
  it('should use the earlier of discovery and pair creation', () => {
    expect(tokenAgeHours(T0, T0 - 30 * HOUR, T0)).toBe(30);
    expect(tokenAgeHours(T0, null, T0 + 2 * HOUR)).toBe(2);
    expect(tokenAgeHours(T0, T0 + HOUR, T0 + 2 * HOUR)).toBe(2);
  });

  it('should score by age band', () => {
    expect(analyzeMaturity(input({}, { now: T0 + 2 * HOUR })).value).toBe(0.7);
    expect(analyzeMaturity(input({}, { now: T0 + 10 * HOUR })).value).toBe(0.4);
    expect(analyzeMaturity(input({ pairCreatedAt: T0 - 30 * HOUR })).value).toBe(0.15);
  });

  it('should flag a stalled bonding curve', () => {
    const stalled = analyzeMaturity(input(
      { bondingCurveProgress: 2, bondingCurveComplete: false },
      { now: T0 + 13 * HOUR }
    ));
    expect(stalled.value).toBeCloseTo(0.55, 10);
    expect(stalled.reasons).toContain('Bonding curve stalled at 2.0%');

    const migrated = analyzeMaturity(input(
      { bondingCurveProgress: 2, migratedPoolAddress: makeMint(9) },
      { now: T0 + 13 * HOUR }
    ));
    expect(migrated.value).toBe(0.4);
  });
});

describe('analyzeTradingPattern', () => {
  const trades = (amounts: number[], offsetsSec: number[]): TradeSample[] =>
    amounts.map((amount, i): TradeSample => ({ amount, timestamp: T0 + (offsetsSec[i] ?? 0) * 1000, side: i % 2 === 0 ? 'buy' : 'sell' }));

  it('should detect round amounts', () => {
    for (const amount of [1, 5, 20, 300, 0.5]) expect(isRoundAmount(amount)).toBe(true);
    for (const amount of [1.25, 37, 0, -5]) expect(isRoundAmount(amount)).toBe(false);
  });

  it('should compute the coefficient of variation', () => {
    expect(coefficientOfVariation([60, 60, 60])).toBe(0);
    expect(coefficientOfVariation([5])).toBeNull();
  });

  it('should stay neutral below the minimum sample count', () => {
    const result = analyzeTradingPattern(input({ buys24h: 3, sells24h: 4 }));
    expect(result.value).toBe(0.5);
    expect(result.neutral).toBe(true);
    expect(result.reasons).toEqual(['Insufficient trading data (7 < 10 samples)']);
  });

  it('should flag bot-like trading', () => {
    const amounts = Array.from({ length: 12 }, () => 1);
    const offsets = Array.from({ length: 12 }, (_, i) => i * 60);
    const result = analyzeTradingPattern(input({ recentTrades: trades(amounts, offsets) }));

    expect(result.neutral).toBe(false);
    expect(result.value).toBeCloseTo(0.9, 10);
    expect(result.reasons).toContain('Repetitive trade sizes (1 distinct amounts)');
  });

  it('should keep organic trading near the clean base', () => {
    const amounts = [0.137, 0.52, 1.33, 0.071, 2.46, 0.83, 0.29, 1.07, 0.64, 3.18, 0.417, 0.93];
    const offsets = [0, 5, 70, 90, 300, 310, 600, 1000, 1020, 1500, 1900, 1950];
    const result = analyzeTradingPattern(input({ recentTrades: trades(amounts, offsets) }));

    expect(result.value).toBeCloseTo(0.1, 10);
    expect(result.reasons).toEqual([]);
  });

  it('should flag volume far beyond liquidity', () => {
    const result = analyzeTradingPattern(input({ buys24h: 30, sells24h: 25, volume24h: 250_000, liquidityUsd: 10_000 }));
    expect(result.value).toBeCloseTo(0.4, 10);
    expect(result.reasons).toEqual(['Extreme volume/liquidity ratio: 25.0x']);
  });

  it('should flag extreme buy/sell imbalance', () => {
    const result = analyzeTradingPattern(input({ buys24h: 50, sells24h: 2 }));
    expect(result.value).toBeCloseTo(0.2, 10);
  });

  it('should detect the pump-and-dump signature', () => {
    const history = [makeSnapshot(mint, T0 - 6 * HOUR, { priceUsd: 0.001, holderCount: 500 })];
    const market: Partial<MarketFields> = {
      priceUsd: 0.003,
      volume1h: 50_000,
      volume24h: 120_000,
      holderCount: 480,
      buys24h: 60,
      sells24h: 50,
    };

    const pumped = analyzeTradingPattern(input(market, { history }));
    expect(pumped.value).toBeCloseTo(0.45, 10);

    const grew = analyzeTradingPattern(input({ ...market, holderCount: 900 }, { history }));
    expect(grew.value).toBeCloseTo(0.1, 10);
  });
});
