// ===========================================
// ENRICHMENT - MODULE INDEX
// ===========================================

import axios from 'axios';
import { Connection } from '@solana/web3.js';
import { HolderEnricher } from './holders.js';
import { RugCheckEnricher } from './rugcheck.js';
import { TradeEnricher, type TradeFetcher } from './trades.js';
import type { TtlCache } from '../../utils/ttl-cache.js';
import type { AppConfig } from '../../types/index.js';
import type { Enricher, EnrichmentResult } from './types.js';

export type { Enricher, EnrichmentResult } from './types.js';
export { HolderEnricher, custodyAccounts, type HolderRpc } from './holders.js';
export { RugCheckEnricher, reportToFields } from './rugcheck.js';
export { TradeEnricher, type TradeFetcher } from './trades.js';

const TRADE_SAMPLE_LIMIT = 50;

export function createEnrichers(
  config: AppConfig,
  cache: TtlCache<EnrichmentResult>,
  trades: TradeFetcher
): Enricher[] {
  const { enrichment } = config;
  const enrichers: Enricher[] = [];

  if (enrichment.holdersEnabled) {
    const connection = new Connection(enrichment.solanaRpcUrl, 'confirmed');
    enrichers.push(new HolderEnricher(connection, cache, {
      ttlMs: enrichment.holderTtlMs,
      timeoutMs: enrichment.rpcTimeoutMs,
    }));
  }

  if (enrichment.rugcheckEnabled) {
    const http = axios.create({
      baseURL: enrichment.rugcheckBaseUrl,
      timeout: enrichment.rugcheckTimeoutMs,
      headers: { Accept: 'application/json' },
    });
    enrichers.push(new RugCheckEnricher(http, cache, { ttlMs: enrichment.rugcheckTtlMs }));
  }

  if (enrichment.tradesEnabled) {
    enrichers.push(new TradeEnricher(trades, cache, {
      ttlMs: enrichment.tradeTtlMs,
      sampleLimit: TRADE_SAMPLE_LIMIT,
    }));
  }

  return enrichers;
}
