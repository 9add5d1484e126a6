// ===========================================
// DASHBOARD STRATEGY PRESETS
// ===========================================

import { TokenStatus } from '../../types/index.js';
import type { ScoringConfig, TokenQuery } from '../../types/index.js';

export const PRESET_NAMES = [
  'fresh_launches',
  'safe_picks',
  'bonding_near_completion',
  'migrated_momentum',
  'high_risk_watch',
] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some(name => name === value);
}

type PresetQuery = Omit<TokenQuery, 'limit' | 'offset' | 'now'>;

/**
 * Candidate presets keep an invest floor at or above the investable threshold.
 * The high-risk watch list has no floor: risk and invest scores move in
 * opposite directions, so a floor would empty it. Blacklisted tokens stay out
 * of every preset through the status filter.
 */
export function buildPresets(scoring: ScoringConfig): Record<PresetName, PresetQuery> {
  const floor = scoring.investableThreshold;

  return {
    fresh_launches: {
      statuses: [TokenStatus.CREATED, TokenStatus.ACTIVE],
      ageHours: { max: 6 },
      ranges: { investScore: { min: floor } },
      sortBy: 'firstDiscoveredAt',
      sortDirection: 'desc',
    },
    safe_picks: {
      statuses: [TokenStatus.ACTIVE, TokenStatus.COMPLETED, TokenStatus.MIGRATED],
      ranges: {
        riskScore: { max: 30 },
        investScore: { min: Math.max(floor, 65) },
        liquidityUsd: { min: scoring.healthyLiquidityUsd },
      },
      sortBy: 'investScore',
      sortDirection: 'desc',
    },
    bonding_near_completion: {
      statuses: [TokenStatus.ACTIVE],
      ranges: {
        bondingCurveProgress: { min: 80, max: 99.99 },
        investScore: { min: floor },
      },
      sortBy: 'bondingCurveProgress',
      sortDirection: 'desc',
    },
    migrated_momentum: {
      statuses: [TokenStatus.MIGRATED],
      ranges: {
        volume1h: { min: 1 },
        investScore: { min: floor },
      },
      sortBy: 'volume24h',
      sortDirection: 'desc',
    },
    high_risk_watch: {
      statuses: [TokenStatus.ACTIVE, TokenStatus.COMPLETED, TokenStatus.MIGRATED],
      ranges: {
        riskScore: { min: 60 },
      },
      sortBy: 'riskScore',
      sortDirection: 'desc',
    },
  };
}
