// ===========================================
// HOLDER CONCENTRATION ANALYZER
// Distribution plus live mint and freeze authorities
// ===========================================

import { clamp01, type AnalyzerInput, type AnalyzerResult } from './types.js';

// Nothing known about the distribution
export const HOLDERS_UNKNOWN = 0.6;

export function analyzeHolders({ token }: AnalyzerInput): AnalyzerResult {
  const { top10HolderPct, holderCount, mintAuthorityEnabled, freezeAuthorityEnabled } = token.market;

  if (top10HolderPct === null && holderCount === null && mintAuthorityEnabled === null && freezeAuthorityEnabled === null) {
    return { value: HOLDERS_UNKNOWN, neutral: true, reasons: ['Holder distribution unknown'] };
  }

  const reasons: string[] = [];
  let value = HOLDERS_UNKNOWN;

  if (top10HolderPct !== null) {
    if (top10HolderPct >= 80) {
      value = 1.0;
      reasons.push(`Top 10 holders own ${top10HolderPct.toFixed(1)}%`);
    } else if (top10HolderPct >= 60) {
      value = 0.75;
      reasons.push(`Top 10 holders own ${top10HolderPct.toFixed(1)}%`);
    } else if (top10HolderPct >= 40) {
      value = 0.45;
    } else {
      value = 0.2;
    }
  }

  if (holderCount !== null) {
    if (holderCount < 20) {
      value += 0.2;
      reasons.push(`Only ${holderCount} holders`);
    } else if (holderCount < 100) {
      value += 0.1;
      reasons.push(`Few holders: ${holderCount}`);
    } else if (holderCount >= 1000) {
      value -= 0.1;
    }
  }

  // Supply can still be inflated or holders frozen
  if (mintAuthorityEnabled === true) {
    value += 0.3;
    reasons.push('Mint authority not revoked');
  }
  if (freezeAuthorityEnabled === true) {
    value += 0.2;
    reasons.push('Freeze authority active');
  }

  return { value: clamp01(value), neutral: false, reasons };
}
