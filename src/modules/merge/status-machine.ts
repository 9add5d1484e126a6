// ===========================================
// TOKEN STATUS STATE MACHINE
// ===========================================

import { TokenStatus } from '../../types/index.js';
import type { MarketFields, StatusTransition } from '../../types/index.js';

// Main line, in lifecycle order. no_dex_data shares the created rank.
const MAIN_LINE: readonly TokenStatus[] = [
  TokenStatus.CREATED,
  TokenStatus.ACTIVE,
  TokenStatus.COMPLETED,
  TokenStatus.MIGRATED,
];

const RANK: Partial<Record<TokenStatus, number>> = {
  [TokenStatus.CREATED]: 0,
  [TokenStatus.NO_DEX_DATA]: 0,
  [TokenStatus.ACTIVE]: 1,
  [TokenStatus.COMPLETED]: 2,
  [TokenStatus.MIGRATED]: 3,
};

const SIDE_STATES: ReadonlySet<TokenStatus> = new Set([
  TokenStatus.TERMINATED,
  TokenStatus.ARCHIVED,
  TokenStatus.BLACKLISTED,
]);

export function isSideState(status: TokenStatus): boolean {
  return SIDE_STATES.has(status);
}

export function hasTradingActivity(market: MarketFields): boolean {
  const trades = (market.buys1h ?? 0) + (market.sells1h ?? 0) + (market.buys24h ?? 0) + (market.sells24h ?? 0);
  return (
    (market.volume1h ?? 0) > 0 ||
    (market.volume24h ?? 0) > 0 ||
    trades > 0 ||
    (market.recentTrades?.length ?? 0) > 0 ||
    (market.bondingCurveProgress ?? 0) > 0
  );
}

/**
 * Main-line status the current fields point at.
 */
export function deriveTargetStatus(market: MarketFields): TokenStatus {
  if (market.migratedPoolAddress) return TokenStatus.MIGRATED;
  if (market.bondingCurveComplete === true || (market.bondingCurveProgress ?? 0) >= 100) {
    return TokenStatus.COMPLETED;
  }
  if (hasTradingActivity(market)) return TokenStatus.ACTIVE;
  if (market.hasDexData === false) return TokenStatus.NO_DEX_DATA;
  return TokenStatus.CREATED;
}

/**
 * Transitions from `current` toward a main-line `target`.
 * Forward moves step through every intermediate state; backward moves
 * and any target for a token in a side state yield nothing.
 */
export function planTransitions(current: TokenStatus, target: TokenStatus, reason: string): StatusTransition[] {
  if (isSideState(current) || current === target) return [];

  const from = RANK[current];
  const to = RANK[target];
  if (from === undefined || to === undefined) return [];

  // Lateral move on rank 0
  if (from === to) {
    return current === TokenStatus.CREATED && target === TokenStatus.NO_DEX_DATA
      ? [{ from: current, to: target, reason }]
      : [];
  }
  if (to < from) return [];

  const transitions: StatusTransition[] = [];
  let previous = current;
  for (const step of MAIN_LINE.slice(from + 1, to + 1)) {
    transitions.push({ from: previous, to: step, reason });
    previous = step;
  }
  return transitions;
}

/**
 * Whether a side transition is allowed. Blacklisted is never exited.
 */
export function canEnterSideState(current: TokenStatus, target: TokenStatus): boolean {
  if (current === target || current === TokenStatus.BLACKLISTED) return false;
  switch (target) {
    case TokenStatus.BLACKLISTED:
      return true;
    case TokenStatus.ARCHIVED:
      return true;
    case TokenStatus.TERMINATED:
      return current === TokenStatus.CREATED || current === TokenStatus.ACTIVE || current === TokenStatus.NO_DEX_DATA;
    default:
      return false;
  }
}
