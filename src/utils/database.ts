// ===========================================
// DATABASE CLIENT & SCHEMA
// ===========================================

import pg from 'pg';
import { logger } from './logger.js';

const { Pool } = pg;

export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  return pool;
}

// ============ SCHEMA CREATION ============

export const SCHEMA_SQL = `
-- Canonical token state, one row per mint
CREATE TABLE IF NOT EXISTS tokens (
  mint_address VARCHAR(64) PRIMARY KEY,
  symbol VARCHAR(64),
  name VARCHAR(256),
  identity_source VARCHAR(20),
  status VARCHAR(20) NOT NULL DEFAULT 'created',
  first_discovered_at BIGINT NOT NULL,
  updated_at BIGINT NOT NULL,
  last_seen_at BIGINT NOT NULL,
  last_activity_at BIGINT,

  price_usd DOUBLE PRECISION,
  liquidity_usd DOUBLE PRECISION,
  market_cap DOUBLE PRECISION,
  volume_1h DOUBLE PRECISION,
  volume_6h DOUBLE PRECISION,
  volume_24h DOUBLE PRECISION,
  holder_count INTEGER,
  top10_holder_pct DOUBLE PRECISION,
  bonding_curve_progress DOUBLE PRECISION,

  market JSONB NOT NULL,
  field_observed_at JSONB NOT NULL DEFAULT '{}'::jsonb,
  sources JSONB NOT NULL DEFAULT '[]'::jsonb,

  risk_score DOUBLE PRECISION NOT NULL DEFAULT 0,
  invest_score DOUBLE PRECISION NOT NULL DEFAULT 0,
  manual_blacklist BOOLEAN NOT NULL DEFAULT FALSE,
  version INTEGER NOT NULL DEFAULT 1
);

CREATE INDEX IF NOT EXISTS idx_tokens_status ON tokens(status);
CREATE INDEX IF NOT EXISTS idx_tokens_risk ON tokens(risk_score);
CREATE INDEX IF NOT EXISTS idx_tokens_invest ON tokens(invest_score DESC);
CREATE INDEX IF NOT EXISTS idx_tokens_discovered ON tokens(first_discovered_at DESC);

-- Append-only point-in-time copies
CREATE TABLE IF NOT EXISTS snapshots (
  id UUID PRIMARY KEY,
  mint_address VARCHAR(64) NOT NULL REFERENCES tokens(mint_address),
  snapshot_timestamp BIGINT NOT NULL,
  snapshot_reason VARCHAR(30) NOT NULL,
  status VARCHAR(20) NOT NULL,
  market JSONB NOT NULL,
  risk_score DOUBLE PRECISION NOT NULL,
  invest_score DOUBLE PRECISION NOT NULL,
  UNIQUE (mint_address, snapshot_timestamp)
);

CREATE INDEX IF NOT EXISTS idx_snapshots_mint_time ON snapshots(mint_address, snapshot_timestamp);
`;

export async function initializeSchema(pool: pg.Pool): Promise<void> {
  await pool.query(SCHEMA_SQL);
  logger.info('Database schema initialized');
}
