// ===========================================
// TOKEN QUERY EVALUATION
// Shared by the in-memory store and tests of the Postgres one
// ===========================================

import type { CanonicalToken, NumericRange, RangeField, SortField, TokenQuery } from '../../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_QUERY_LIMIT = 100;
export const MAX_QUERY_LIMIT = 1000;

export const RANGE_FIELDS: readonly RangeField[] = [
  'priceUsd',
  'liquidityUsd',
  'marketCap',
  'volume1h',
  'volume6h',
  'volume24h',
  'buys1h',
  'sells1h',
  'buys6h',
  'sells6h',
  'buys24h',
  'sells24h',
  'priceChange1h',
  'priceChange24h',
  'holderCount',
  'top10HolderPct',
  'poolCount',
  'largestPoolShare',
  'bondingCurveProgress',
  'riskScore',
  'investScore',
];

export function ageHours(token: Pick<CanonicalToken, 'firstDiscoveredAt'>, now: number): number {
  return Math.max(0, (now - token.firstDiscoveredAt) / HOUR_MS);
}

export function rangeValue(token: CanonicalToken, field: RangeField): number | null {
  switch (field) {
    case 'riskScore':
      return token.riskScore;
    case 'investScore':
      return token.investScore;
    default:
      return token.market[field];
  }
}

function inRange(value: number | null, range: NumericRange | undefined): boolean {
  if (!range) return true;
  // Unknown values never satisfy a bound
  if (value === null) return range.min === undefined && range.max === undefined;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
}

export function matchesFilters(token: CanonicalToken, query: TokenQuery, now: number): boolean {
  if (query.statuses && query.statuses.length > 0 && !query.statuses.includes(token.status)) {
    return false;
  }

  if (query.ranges) {
    for (const field of RANGE_FIELDS) {
      if (!inRange(rangeValue(token, field), query.ranges[field])) return false;
    }
  }

  if (!inRange(ageHours(token, now), query.ageHours)) return false;

  if (query.symbol) {
    const needle = query.symbol.toLowerCase();
    if (!token.symbol || !token.symbol.toLowerCase().includes(needle)) return false;
  }

  return true;
}

export function sortValue(token: CanonicalToken, field: SortField, now: number): number | string | null {
  switch (field) {
    case 'ageHours':
      return ageHours(token, now);
    case 'firstDiscoveredAt':
      return token.firstDiscoveredAt;
    case 'updatedAt':
      return token.updatedAt;
    case 'symbol':
      return token.symbol?.toLowerCase() ?? null;
    default:
      return rangeValue(token, field);
  }
}

/**
 * Order by one field; unknown values sort last in either direction.
 * Ties fall back to mint address so pages are stable.
 */
export function compareTokens(field: SortField, direction: 'asc' | 'desc', now: number) {
  const sign = direction === 'asc' ? 1 : -1;

  return (a: CanonicalToken, b: CanonicalToken): number => {
    const av = sortValue(a, field, now);
    const bv = sortValue(b, field, now);

    if (av === null && bv !== null) return 1;
    if (bv === null && av !== null) return -1;
    if (av !== null && bv !== null && av !== bv) {
      const diff = typeof av === 'number' && typeof bv === 'number'
        ? av - bv
        : String(av).localeCompare(String(bv));
      return Math.sign(diff) * sign;
    }
    return a.mintAddress < b.mintAddress ? -1 : a.mintAddress > b.mintAddress ? 1 : 0;
  };
}

export function normalizePage(query: TokenQuery): { limit: number; offset: number } {
  const limit = Math.min(Math.max(1, Math.floor(query.limit ?? DEFAULT_QUERY_LIMIT)), MAX_QUERY_LIMIT);
  const offset = Math.max(0, Math.floor(query.offset ?? 0));
  return { limit, offset };
}

export function applyQuery(tokens: Iterable<CanonicalToken>, query: TokenQuery, now: number): CanonicalToken[] {
  const { limit, offset } = normalizePage(query);
  const matched = [...tokens].filter(token => matchesFilters(token, query, now));
  matched.sort(compareTokens(query.sortBy ?? 'firstDiscoveredAt', query.sortDirection ?? 'desc', now));
  return matched.slice(offset, offset + limit);
}
