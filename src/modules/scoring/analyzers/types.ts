import type { CanonicalToken, ScoringConfig, Snapshot } from '../../../types/index.js';

export interface AnalyzerInput {
  token: CanonicalToken;
  // Snapshots inside the scoring window, oldest first
  history: Snapshot[];
  now: number;
  config: ScoringConfig;
}

export interface AnalyzerResult {
  value: number;       // 0 = clean, 1 = maximum suspicion
  neutral: boolean;
  reasons: string[];
}

export const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));
