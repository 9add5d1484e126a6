// ===========================================
// MATURITY / BONDING-CURVE ANALYZER
// ===========================================

import { clamp01, type AnalyzerInput, type AnalyzerResult } from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const STALL_AFTER_HOURS = 12;
const STALL_PROGRESS_PCT = 5;

/**
 * Hours since the earliest evidence of the token: first discovery or pool creation.
 */
export function tokenAgeHours(firstDiscoveredAt: number, pairCreatedAt: number | null, now: number): number {
  const birth = pairCreatedAt !== null ? Math.min(firstDiscoveredAt, pairCreatedAt) : firstDiscoveredAt;
  return Math.max(0, (now - birth) / HOUR_MS);
}

export function analyzeMaturity({ token, now, config }: AnalyzerInput): AnalyzerResult {
  const { market } = token;
  const age = tokenAgeHours(token.firstDiscoveredAt, market.pairCreatedAt, now);
  const reasons: string[] = [];
  let value: number;

  if (age < config.youngAgeHours) {
    value = 0.7;
    reasons.push(`Very new token (${age.toFixed(1)}h)`);
  } else if (age < 24) {
    value = 0.4;
    reasons.push(`New token (${age.toFixed(1)}h)`);
  } else {
    value = 0.15;
  }

  const onCurve = market.bondingCurveComplete !== true && market.migratedPoolAddress === null;
  const progress = market.bondingCurveProgress;
  if (onCurve && progress !== null && progress < STALL_PROGRESS_PCT && age >= STALL_AFTER_HOURS) {
    value += 0.15;
    reasons.push(`Bonding curve stalled at ${progress.toFixed(1)}%`);
  }

  return { value: clamp01(value), neutral: false, reasons };
}
