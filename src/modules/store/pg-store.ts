// ===========================================
// POSTGRES TOKEN STORE
// ===========================================

import pg from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { initializeSchema } from '../../utils/database.js';
import { logger } from '../../utils/logger.js';
import { InvalidTokenState, StoreWriteConflict } from '../../utils/errors.js';
import { RANGE_FIELDS, normalizePage } from './query.js';
import { emptyMarket } from '../merge/field-merge.js';
import type { TokenStore } from './types.js';
import type {
  CanonicalToken,
  MarketFieldKey,
  MarketFields,
  RangeField,
  Snapshot,
  SnapshotReason,
  SortField,
  TokenQuery,
  TokenSource,
  TokenStatus,
} from '../../types/index.js';

// ============ ROW TYPES ============

// BIGINT columns come back from pg as strings
type TokenRow = {
  mint_address: string;
  symbol: string | null;
  name: string | null;
  identity_source: TokenSource | null;
  status: TokenStatus;
  first_discovered_at: string;
  updated_at: string;
  last_seen_at: string;
  last_activity_at: string | null;
  market: MarketFields;
  field_observed_at: Partial<Record<MarketFieldKey, number>>;
  sources: TokenSource[];
  risk_score: number;
  invest_score: number;
  manual_blacklist: boolean;
  version: number;
};

type SnapshotRow = {
  id: string;
  mint_address: string;
  snapshot_timestamp: string;
  snapshot_reason: SnapshotReason;
  status: TokenStatus;
  market: MarketFields;
  risk_score: number;
  invest_score: number;
};

export function rowToToken(row: TokenRow): CanonicalToken {
  return {
    mintAddress: row.mint_address,
    symbol: row.symbol,
    name: row.name,
    identitySource: row.identity_source,
    firstDiscoveredAt: Number(row.first_discovered_at),
    updatedAt: Number(row.updated_at),
    lastSeenAt: Number(row.last_seen_at),
    lastActivityAt: row.last_activity_at === null ? null : Number(row.last_activity_at),
    status: row.status,
    // Rows written before a field existed lack its key
    market: { ...emptyMarket(), ...row.market },
    fieldObservedAt: row.field_observed_at,
    sources: row.sources,
    riskScore: row.risk_score,
    investScore: row.invest_score,
    manualBlacklist: row.manual_blacklist,
    version: row.version,
  };
}

export function rowToSnapshot(row: SnapshotRow): Snapshot {
  return {
    id: row.id,
    mintAddress: row.mint_address,
    snapshotTimestamp: Number(row.snapshot_timestamp),
    reason: row.snapshot_reason,
    status: row.status,
    market: { ...emptyMarket(), ...row.market },
    riskScore: row.risk_score,
    investScore: row.invest_score,
  };
}

// ============ QUERY BUILDER ============

function rangeExpression(field: RangeField): string {
  switch (field) {
    case 'riskScore':
      return 'risk_score';
    case 'investScore':
      return 'invest_score';
    default:
      // field names come from the RangeField union, never from input text
      return `(market->>'${field}')::double precision`;
  }
}

function sortExpression(field: SortField, nowParam: string): string {
  switch (field) {
    case 'ageHours':
      return `(${nowParam}::bigint - first_discovered_at)`;
    case 'firstDiscoveredAt':
      return 'first_discovered_at';
    case 'updatedAt':
      return 'updated_at';
    case 'symbol':
      return 'LOWER(symbol)';
    default:
      return rangeExpression(field);
  }
}

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, ch => `\\${ch}`);

export function buildTokenQuery(query: TokenQuery, now: number): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const where: string[] = [];
  const param = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (query.statuses && query.statuses.length > 0) {
    where.push(`status = ANY(${param(query.statuses)})`);
  }

  if (query.ranges) {
    for (const field of RANGE_FIELDS) {
      const range = query.ranges[field];
      if (!range) continue;
      const expr = rangeExpression(field);
      if (range.min !== undefined) where.push(`${expr} >= ${param(range.min)}`);
      if (range.max !== undefined) where.push(`${expr} <= ${param(range.max)}`);
    }
  }

  if (query.ageHours) {
    const HOUR_MS = 60 * 60 * 1000;
    if (query.ageHours.min !== undefined) {
      where.push(`first_discovered_at <= ${param(Math.floor(now - query.ageHours.min * HOUR_MS))}`);
    }
    if (query.ageHours.max !== undefined) {
      where.push(`first_discovered_at >= ${param(Math.ceil(now - query.ageHours.max * HOUR_MS))}`);
    }
  }

  if (query.symbol) {
    where.push(`symbol ILIKE ${param(`%${escapeLike(query.symbol)}%`)}`);
  }

  const sortBy = query.sortBy ?? 'firstDiscoveredAt';
  const direction = (query.sortDirection ?? 'desc') === 'asc' ? 'ASC' : 'DESC';
  const orderExpr = sortExpression(sortBy, sortBy === 'ageHours' ? param(now) : '');
  const { limit, offset } = normalizePage(query);

  const text = [
    'SELECT * FROM tokens',
    where.length > 0 ? `WHERE ${where.join(' AND ')}` : '',
    `ORDER BY ${orderExpr} ${direction} NULLS LAST, mint_address ASC`,
    `LIMIT ${param(limit)} OFFSET ${param(offset)}`,
  ].filter(Boolean).join(' ');

  return { text, values };
}

// ============ STORE ============

const TOKEN_COLUMNS = `
  symbol, name, identity_source, status, updated_at, last_seen_at, last_activity_at,
  price_usd, liquidity_usd, market_cap, volume_1h, volume_6h, volume_24h,
  holder_count, top10_holder_pct, bonding_curve_progress,
  market, field_observed_at, sources, risk_score, invest_score, manual_blacklist
`;

function tokenParams(token: CanonicalToken): unknown[] {
  const m = token.market;
  return [
    token.symbol,
    token.name,
    token.identitySource,
    token.status,
    token.updatedAt,
    token.lastSeenAt,
    token.lastActivityAt,
    m.priceUsd,
    m.liquidityUsd,
    m.marketCap,
    m.volume1h,
    m.volume6h,
    m.volume24h,
    m.holderCount,
    m.top10HolderPct,
    m.bondingCurveProgress,
    JSON.stringify(m),
    JSON.stringify(token.fieldObservedAt),
    JSON.stringify(token.sources),
    token.riskScore,
    token.investScore,
    token.manualBlacklist,
  ];
}

export class PgTokenStore implements TokenStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly now: () => number = Date.now
  ) {}

  async init(): Promise<void> {
    await initializeSchema(this.pool);
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database pool closed');
  }

  async getToken(mintAddress: string): Promise<CanonicalToken | null> {
    const result = await this.pool.query<TokenRow>('SELECT * FROM tokens WHERE mint_address = $1', [mintAddress]);
    const row = result.rows[0];
    return row ? rowToToken(row) : null;
  }

  async upsertCanonical(token: CanonicalToken, expectedVersion: number | null): Promise<CanonicalToken> {
    const params = tokenParams(token);
    // $1..$22 are the shared columns
    const placeholders = params.map((_, i) => `$${i + 1}`).join(', ');

    let result: pg.QueryResult<TokenRow>;

    if (expectedVersion === null) {
      result = await this.pool.query<TokenRow>(
        `INSERT INTO tokens (${TOKEN_COLUMNS}, mint_address, first_discovered_at, version)
         VALUES (${placeholders}, $${params.length + 1}, $${params.length + 2}, 1)
         ON CONFLICT (mint_address) DO NOTHING
         RETURNING *`,
        [...params, token.mintAddress, token.firstDiscoveredAt]
      );
    } else {
      const assignments = TOKEN_COLUMNS.split(',')
        .map(c => c.trim())
        .map((column, i) => `${column} = $${i + 1}`)
        .join(', ');
      result = await this.pool.query<TokenRow>(
        `UPDATE tokens SET ${assignments}, version = version + 1
         WHERE mint_address = $${params.length + 1} AND version = $${params.length + 2}
         RETURNING *`,
        [...params, token.mintAddress, expectedVersion]
      );
    }

    const row = result.rows[0];
    if (!row) {
      throw new StoreWriteConflict(token.mintAddress, expectedVersion);
    }
    return rowToToken(row);
  }

  async touch(mintAddress: string, updatedAt: number): Promise<void> {
    await this.pool.query('UPDATE tokens SET updated_at = $2 WHERE mint_address = $1', [mintAddress, updatedAt]);
  }

  async appendSnapshot(mintAddress: string, reason: SnapshotReason, at: number): Promise<Snapshot> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      // Row lock keeps concurrent appends for one mint ordered
      const tokenResult = await client.query<TokenRow>(
        'SELECT * FROM tokens WHERE mint_address = $1 FOR UPDATE',
        [mintAddress]
      );
      const row = tokenResult.rows[0];
      if (!row) {
        throw new InvalidTokenState(mintAddress, `Cannot snapshot unknown token ${mintAddress}`);
      }
      const token = rowToToken(row);

      const lastResult = await client.query<{ last: string | null }>(
        'SELECT MAX(snapshot_timestamp) AS last FROM snapshots WHERE mint_address = $1',
        [mintAddress]
      );
      const lastValue = lastResult.rows[0]?.last ?? null;
      const last = lastValue === null ? null : Number(lastValue);
      const snapshotTimestamp = last !== null && at <= last ? last + 1 : at;

      const inserted = await client.query<SnapshotRow>(
        `INSERT INTO snapshots (id, mint_address, snapshot_timestamp, snapshot_reason, status, market, risk_score, invest_score)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING *`,
        [
          uuidv4(),
          mintAddress,
          snapshotTimestamp,
          reason,
          token.status,
          JSON.stringify(token.market),
          token.riskScore,
          token.investScore,
        ]
      );

      await client.query('COMMIT');

      const snapshotRow = inserted.rows[0];
      if (!snapshotRow) {
        throw new InvalidTokenState(mintAddress, 'Snapshot insert returned no row');
      }
      return rowToSnapshot(snapshotRow);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async history(mintAddress: string, since = 0): Promise<Snapshot[]> {
    const result = await this.pool.query<SnapshotRow>(
      `SELECT * FROM snapshots
       WHERE mint_address = $1 AND snapshot_timestamp >= $2
       ORDER BY snapshot_timestamp ASC`,
      [mintAddress, since]
    );
    return result.rows.map(rowToSnapshot);
  }

  async lastSnapshot(mintAddress: string): Promise<Snapshot | null> {
    const result = await this.pool.query<SnapshotRow>(
      `SELECT * FROM snapshots WHERE mint_address = $1
       ORDER BY snapshot_timestamp DESC LIMIT 1`,
      [mintAddress]
    );
    const row = result.rows[0];
    return row ? rowToSnapshot(row) : null;
  }

  async query(query: TokenQuery): Promise<CanonicalToken[]> {
    const { text, values } = buildTokenQuery(query, query.now ?? this.now());
    const result = await this.pool.query<TokenRow>(text, values);
    return result.rows.map(rowToToken);
  }

  async countTokens(): Promise<number> {
    const result = await this.pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM tokens');
    return Number(result.rows[0]?.count ?? 0);
  }
}
