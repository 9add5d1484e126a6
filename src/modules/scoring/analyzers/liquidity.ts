// ===========================================
// LIQUIDITY ANALYZER
// Depth against fixed floors, plus concentration in a single pool
// ===========================================

import { clamp01, type AnalyzerInput, type AnalyzerResult } from './types.js';

export const LIQUIDITY_NEUTRAL = 0.5;

export function analyzeLiquidity({ token, config }: AnalyzerInput): AnalyzerResult {
  const liquidity = token.market.liquidityUsd;

  if (liquidity === null) {
    return { value: LIQUIDITY_NEUTRAL, neutral: true, reasons: ['Liquidity unknown'] };
  }

  const reasons: string[] = [];
  let value: number;

  if (liquidity < config.veryLowLiquidityUsd) {
    value = 1.0;
    reasons.push(`Very low liquidity: $${liquidity.toFixed(0)}`);
  } else if (liquidity < config.minLiquidityUsd) {
    value = 0.85;
    reasons.push(`Low liquidity: $${liquidity.toFixed(0)}`);
  } else if (liquidity < config.healthyLiquidityUsd) {
    // log-scale ramp 0.5 -> 0.1 between the floor and healthy depth
    const t = Math.log(liquidity / config.minLiquidityUsd) / Math.log(config.healthyLiquidityUsd / config.minLiquidityUsd);
    value = 0.5 - 0.4 * t;
    reasons.push(`Moderate liquidity: $${liquidity.toFixed(0)}`);
  } else {
    value = 0.1;
  }

  const share = token.market.largestPoolShare;
  if (share !== null) {
    if (share > 0.8) {
      value += 0.1;
      reasons.push(`Liquidity concentrated in one pool (${(share * 100).toFixed(0)}%)`);
    } else if (share > 0.6) {
      value += 0.05;
      reasons.push(`Liquidity mostly in one pool (${(share * 100).toFixed(0)}%)`);
    }
  }

  return { value: clamp01(value), neutral: false, reasons };
}
