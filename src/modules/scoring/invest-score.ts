// ===========================================
// INVEST SCORE
// Attractiveness 0-100, independent of the risk weights
// ===========================================

import type { CanonicalToken, ScoringConfig, Snapshot } from '../../types/index.js';

const SAFETY_WEIGHT = 0.4;
const MOMENTUM_WEIGHT = 0.2;
const LIQUIDITY_WEIGHT = 0.15;
const HOLDERS_WEIGHT = 0.1;
const GROWTH_WEIGHT = 0.15;

// Each log term saturates at 1 once its value hits ref * (cap)
const logTerm = (value: number | null, reference: number, saturation: number): number =>
  value === null || value <= 0 ? 0 : Math.min(1, Math.log1p(value / reference) / Math.log1p(saturation));

/**
 * Mean positive growth of holders, 24h volume and liquidity since the
 * oldest snapshot in the window. 0 when nothing comparable is known.
 */
export function growthTrend(token: CanonicalToken, history: Snapshot[]): number {
  const baseline = history[0];
  if (!baseline) return 0;

  const pairs: Array<[number | null, number | null]> = [
    [baseline.market.holderCount, token.market.holderCount],
    [baseline.market.volume24h, token.market.volume24h],
    [baseline.market.liquidityUsd, token.market.liquidityUsd],
  ];

  const growths: number[] = [];
  for (const [before, after] of pairs) {
    if (before === null || after === null || before <= 0) continue;
    growths.push(Math.min(1, Math.max(0, (after - before) / before)));
  }

  return growths.length > 0 ? growths.reduce((a, b) => a + b, 0) / growths.length : 0;
}

export function computeInvestScore(
  token: CanonicalToken,
  history: Snapshot[],
  riskScore: number,
  config: ScoringConfig
): number {
  const { market } = token;

  const safety = (100 - riskScore) * SAFETY_WEIGHT;
  const momentum = logTerm(market.volume24h, 50_000, 20) * 100 * MOMENTUM_WEIGHT;
  const depth = logTerm(market.liquidityUsd, 100_000, 10) * 100 * LIQUIDITY_WEIGHT;
  const holders = logTerm(market.holderCount, 1_000, 10) * 100 * HOLDERS_WEIGHT;
  const growth = growthTrend(token, history) * 100 * GROWTH_WEIGHT;

  let score = Math.min(100, Math.max(0, safety + momentum + depth + holders + growth));

  // Blacklist-level risk is never investable
  if (riskScore >= config.blacklistThreshold) {
    score = Math.min(score, config.investableThreshold - 0.1);
  }

  return Math.round(score * 10) / 10;
}
