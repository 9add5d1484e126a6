import { describe, it, expect } from 'vitest';
import { buildPresets, isPresetName } from './presets.js';
import { applyQuery } from '../store/query.js';
import { makeMint, makeToken, testConfig, T0 } from '../../testing/fixtures.js';
import { TokenStatus } from '../../types/index.js';

const presets = buildPresets(testConfig().scoring);

describe('buildPresets', () => {
  it('should list risky live tokens regardless of invest score', () => {
    const risky = makeToken({ mintAddress: makeMint(1), status: TokenStatus.ACTIVE, riskScore: 72, investScore: 18 });
    const riskier = makeToken({ mintAddress: makeMint(2), status: TokenStatus.MIGRATED, riskScore: 85, investScore: 5 });
    const calm = makeToken({ mintAddress: makeMint(3), status: TokenStatus.ACTIVE, riskScore: 35, investScore: 70 });
    const blacklisted = makeToken({ mintAddress: makeMint(4), status: TokenStatus.BLACKLISTED, riskScore: 95, investScore: 0 });

    const tokens = applyQuery([risky, riskier, calm, blacklisted], presets.high_risk_watch, T0);

    expect(tokens.map(t => t.mintAddress)).toEqual([makeMint(2), makeMint(1)]);
  });

  it('should keep the invest floor on candidate presets', () => {
    const floor = testConfig().scoring.investableThreshold;

    expect(presets.fresh_launches.ranges?.investScore).toEqual({ min: floor });
    expect(presets.bonding_near_completion.ranges?.investScore).toEqual({ min: floor });
    expect(presets.migrated_momentum.ranges?.investScore).toEqual({ min: floor });
    expect(presets.safe_picks.ranges?.investScore).toEqual({ min: 65 });
    expect(presets.high_risk_watch.ranges?.investScore).toBeUndefined();
  });

  it('should recognise preset names', () => {
    expect(isPresetName('high_risk_watch')).toBe(true);
    expect(isPresetName('moonshots')).toBe(false);
  });
});
