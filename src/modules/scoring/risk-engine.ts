// ===========================================
// RISK SCORING ENGINE
// Weighted blend of independent sub-analyzers
// ===========================================

import { InvalidTokenState } from '../../utils/errors.js';
import { isValidMintAddress } from '../../utils/mint-address.js';
import { analyzeLiquidity } from './analyzers/liquidity.js';
import { analyzeHolders } from './analyzers/holders.js';
import { analyzeTradingPattern } from './analyzers/trading-pattern.js';
import { analyzeMaturity } from './analyzers/maturity.js';
import { computeInvestScore } from './invest-score.js';
import type { AnalyzerInput, AnalyzerResult } from './analyzers/types.js';
import type {
  AnalyzerKey,
  CanonicalToken,
  ContributingFactor,
  ScoreResult,
  ScoringConfig,
  ScoringWeights,
  Snapshot,
} from '../../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

interface AnalyzerEntry {
  key: AnalyzerKey;
  weight: keyof ScoringWeights;
  run: (input: AnalyzerInput) => AnalyzerResult;
}

const ANALYZERS: readonly AnalyzerEntry[] = [
  { key: 'liquidity', weight: 'liquidity', run: analyzeLiquidity },
  { key: 'holders', weight: 'holders', run: analyzeHolders },
  { key: 'trading_pattern', weight: 'tradingPattern', run: analyzeTradingPattern },
  { key: 'maturity', weight: 'maturity', run: analyzeMaturity },
];

const round1 = (value: number): number => Math.round(value * 10) / 10;

export class RiskScoringEngine {
  constructor(private readonly config: ScoringConfig) {}

  get blacklistThreshold(): number {
    return this.config.blacklistThreshold;
  }

  get historyWindowMs(): number {
    return this.config.historyWindowHours * HOUR_MS;
  }

  /**
   * Pure: same token, history and clock give the same result.
   * Missing data falls back to each analyzer's neutral value.
   */
  score(token: CanonicalToken, history: Snapshot[], now: number): ScoreResult {
    if (!isValidMintAddress(token.mintAddress)) {
      throw new InvalidTokenState(token.mintAddress, `Cannot score malformed mint ${token.mintAddress}`);
    }

    const windowStart = now - this.historyWindowMs;
    const windowed = history
      .filter(s => s.snapshotTimestamp >= windowStart && s.snapshotTimestamp <= now)
      .sort((a, b) => a.snapshotTimestamp - b.snapshotTimestamp);

    const input: AnalyzerInput = { token, history: windowed, now, config: this.config };

    const rawWeights = ANALYZERS.map(a => Math.max(0, this.config.weights[a.weight]));
    const weightSum = rawWeights.reduce((a, b) => a + b, 0);

    const contributingFactors: ContributingFactor[] = ANALYZERS.map((analyzer, i) => {
      const result = analyzer.run(input);
      // All-zero weights fall back to an even split
      const weight = weightSum > 0 ? (rawWeights[i] ?? 0) / weightSum : 1 / ANALYZERS.length;
      return {
        analyzer: analyzer.key,
        value: result.value,
        weight,
        contribution: 100 * weight * result.value,
        neutral: result.neutral,
        reasons: result.reasons,
      };
    });

    const total = contributingFactors.reduce((acc, f) => acc + f.contribution, 0);
    const riskScore = round1(Math.min(100, Math.max(0, total)));

    return {
      riskScore,
      investScore: computeInvestScore(token, windowed, riskScore, this.config),
      contributingFactors,
    };
  }
}
