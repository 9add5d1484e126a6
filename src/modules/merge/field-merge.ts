// ===========================================
// FIELD-LEVEL MERGE
// ===========================================

import type {
  MarketFieldKey,
  MarketFields,
  ObservationFields,
  RawTokenObservation,
  TradeSample,
} from '../../types/index.js';

export const MARKET_FIELD_KEYS = [
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
  'bondingCurveComplete',
  'migratedPoolAddress',
  'pairCreatedAt',
  'hasDexData',
  'flaggedRugged',
  'mintAuthorityEnabled',
  'freezeAuthorityEnabled',
  'recentTrades',
] as const satisfies readonly MarketFieldKey[];

export function emptyMarket(): MarketFields {
  return {
    priceUsd: null,
    liquidityUsd: null,
    marketCap: null,
    volume1h: null,
    volume6h: null,
    volume24h: null,
    buys1h: null,
    sells1h: null,
    buys6h: null,
    sells6h: null,
    buys24h: null,
    sells24h: null,
    priceChange1h: null,
    priceChange24h: null,
    holderCount: null,
    top10HolderPct: null,
    poolCount: null,
    largestPoolShare: null,
    bondingCurveProgress: null,
    bondingCurveComplete: null,
    migratedPoolAddress: null,
    pairCreatedAt: null,
    hasDexData: null,
    flaggedRugged: null,
    mintAuthorityEnabled: null,
    freezeAuthorityEnabled: null,
    recentTrades: null,
  };
}

type FieldValue = MarketFields[MarketFieldKey];

export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return a === b;
}

function writeField<K extends MarketFieldKey>(target: MarketFields, key: K, value: MarketFields[K]): void {
  target[key] = value;
}

export interface FieldMergeResult {
  market: MarketFields;
  fieldObservedAt: Partial<Record<MarketFieldKey, number>>;
  changedFields: MarketFieldKey[];
}

/**
 * Apply an observation onto the current fields.
 * A reported field wins only when the observation is strictly newer than
 * the stored value's freshness. Unreported (null/undefined) fields never
 * overwrite known ones. Windowed aggregates are replaced, not summed.
 */
export function mergeFields(
  market: MarketFields,
  fieldObservedAt: Partial<Record<MarketFieldKey, number>>,
  observation: Pick<RawTokenObservation, 'fields' | 'observedAt'>
): FieldMergeResult {
  const next: MarketFields = { ...market };
  const freshness: Partial<Record<MarketFieldKey, number>> = { ...fieldObservedAt };
  const changedFields: MarketFieldKey[] = [];
  const fields: ObservationFields = observation.fields;

  for (const key of MARKET_FIELD_KEYS) {
    const incoming = fields[key];
    if (incoming === undefined || incoming === null) continue;

    const storedAt = freshness[key];
    if (storedAt !== undefined && observation.observedAt <= storedAt) continue;

    freshness[key] = observation.observedAt;
    if (!fieldValuesEqual(next[key], incoming)) {
      writeField(next, key, incoming);
      changedFields.push(key);
    }
  }

  return { market: next, fieldObservedAt: freshness, changedFields };
}

/**
 * Latest moment the observation proves trading happened, or null.
 */
export function activityTimestamp(observation: Pick<RawTokenObservation, 'fields' | 'observedAt'>): number | null {
  const { fields, observedAt } = observation;
  const trades: TradeSample[] = fields.recentTrades ?? [];

  let latest: number | null = null;
  for (const trade of trades) {
    if (latest === null || trade.timestamp > latest) latest = trade.timestamp;
  }

  const hourlyTrades = (fields.buys1h ?? 0) + (fields.sells1h ?? 0);
  if ((fields.volume1h ?? 0) > 0 || hourlyTrades > 0) {
    latest = latest === null ? observedAt : Math.max(latest, observedAt);
  }

  return latest;
}
