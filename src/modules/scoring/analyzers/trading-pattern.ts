// ===========================================
// TRADING PATTERN ANALYZER
// Wash trading and pump-and-dump heuristics
// ===========================================

import { clamp01, type AnalyzerInput, type AnalyzerResult } from './types.js';
import type { TradeSample } from '../../../types/index.js';

export const TRADING_NEUTRAL = 0.5;
const CLEAN_BASE = 0.1;

// Heuristic thresholds
const ROUND_FRACTION_HIGH = 0.6;
const ROUND_FRACTION_MEDIUM = 0.4;
const REPETITIVE_MAX_DISTINCT = 2;
const TIMING_CV_BOT = 0.1;
const TIMING_CV_SUSPICIOUS = 0.25;
const VOLUME_LIQUIDITY_EXTREME = 20;
const VOLUME_LIQUIDITY_HIGH = 10;
const IMBALANCE_RATIO = 10;
const PUMP_PRICE_MULTIPLE = 2;       // +100%
const PUMP_HOURLY_SPIKE = 3;          // hourly volume vs 24h hourly average

/**
 * 1, 5, 20, 300, 0.5 are round; 1.25 and 37 are not.
 */
export function isRoundAmount(amount: number): boolean {
  if (!(amount > 0) || !Number.isFinite(amount)) return false;
  const magnitude = Math.pow(10, Math.floor(Math.log10(amount)));
  const mantissa = amount / magnitude;
  return Math.abs(mantissa - Math.round(mantissa)) < 1e-9;
}

export function coefficientOfVariation(values: number[]): number | null {
  if (values.length < 2) return null;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  if (mean <= 0) return null;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance) / mean;
}

function tradeSignals(trades: TradeSample[], reasons: string[]): number {
  let score = 0;

  const roundFraction = trades.filter(t => isRoundAmount(t.amount)).length / trades.length;
  if (roundFraction >= ROUND_FRACTION_HIGH) {
    score += 0.3;
    reasons.push(`${(roundFraction * 100).toFixed(0)}% of trades are round amounts`);
  } else if (roundFraction >= ROUND_FRACTION_MEDIUM) {
    score += 0.15;
    reasons.push(`${(roundFraction * 100).toFixed(0)}% of trades are round amounts`);
  }

  const distinct = new Set(trades.map(t => t.amount.toFixed(9))).size;
  if (distinct <= REPETITIVE_MAX_DISTINCT) {
    score += 0.2;
    reasons.push(`Repetitive trade sizes (${distinct} distinct amounts)`);
  }

  const times = trades.map(t => t.timestamp).sort((a, b) => a - b);
  const intervals = times.slice(1).map((t, i) => t - (times[i] ?? t));
  const cv = coefficientOfVariation(intervals);
  if (cv !== null) {
    if (cv < TIMING_CV_BOT) {
      score += 0.3;
      reasons.push(`Bot-like regular trade timing (cv ${cv.toFixed(2)})`);
    } else if (cv < TIMING_CV_SUSPICIOUS) {
      score += 0.15;
      reasons.push(`Unusually regular trade timing (cv ${cv.toFixed(2)})`);
    }
  }

  return score;
}

export function analyzeTradingPattern({ token, history, config }: AnalyzerInput): AnalyzerResult {
  const { market } = token;
  const trades = market.recentTrades ?? [];

  const txCount = market.buys24h !== null || market.sells24h !== null
    ? (market.buys24h ?? 0) + (market.sells24h ?? 0)
    : 0;
  const sampleCount = trades.length > 0 ? trades.length : txCount;

  if (sampleCount < config.minSampleCount) {
    return {
      value: TRADING_NEUTRAL,
      neutral: true,
      reasons: [`Insufficient trading data (${sampleCount} < ${config.minSampleCount} samples)`],
    };
  }

  const reasons: string[] = [];
  let value = CLEAN_BASE;

  if (trades.length >= config.minSampleCount) {
    value += tradeSignals(trades, reasons);
  }

  // Volume far beyond pool depth
  if (market.volume24h !== null && market.liquidityUsd !== null && market.liquidityUsd > 0) {
    const ratio = market.volume24h / market.liquidityUsd;
    if (ratio > VOLUME_LIQUIDITY_EXTREME) {
      value += 0.3;
      reasons.push(`Extreme volume/liquidity ratio: ${ratio.toFixed(1)}x`);
    } else if (ratio > VOLUME_LIQUIDITY_HIGH) {
      value += 0.2;
      reasons.push(`High volume/liquidity ratio: ${ratio.toFixed(1)}x`);
    }
  }

  // Extreme buy/sell imbalance
  if (market.buys24h !== null && market.sells24h !== null) {
    const { buys24h, sells24h } = market;
    const ratio = sells24h === 0 ? Infinity : buys24h / sells24h;
    if (ratio > IMBALANCE_RATIO || ratio < 1 / IMBALANCE_RATIO) {
      value += 0.1;
      reasons.push(`Extreme buy/sell imbalance: ${buys24h} buys / ${sells24h} sells`);
    }
  }

  // Pump-and-dump: price doubled in the window, hourly volume spike, no holder growth
  const baseline = history.find(s => s.market.priceUsd !== null);
  if (baseline && market.priceUsd !== null && market.volume1h !== null && market.volume24h !== null) {
    const startPrice = baseline.market.priceUsd ?? 0;
    const priceUp = startPrice > 0 && market.priceUsd >= startPrice * PUMP_PRICE_MULTIPLE;
    const hourlyAverage = market.volume24h / 24;
    const spike = hourlyAverage > 0 && market.volume1h > hourlyAverage * PUMP_HOURLY_SPIKE;
    const startHolders = baseline.market.holderCount;
    const noHolderGrowth = startHolders !== null && market.holderCount !== null && market.holderCount <= startHolders;

    if (priceUp && spike && noHolderGrowth) {
      value += 0.35;
      reasons.push('Pump-and-dump signature: price doubled on a volume spike without new holders');
    }
  }

  return { value: clamp01(value), neutral: false, reasons };
}
