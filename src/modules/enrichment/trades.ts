// ===========================================
// TRADE SAMPLE ENRICHER
// Recent bonding-curve trades for pattern analysis
// ===========================================

import { logger, shortMint } from '../../utils/logger.js';
import { TokenSource, TokenStatus } from '../../types/index.js';
import type { TtlCache } from '../../utils/ttl-cache.js';
import type { CanonicalToken, RawTokenObservation, TradeSample } from '../../types/index.js';
import type { Enricher, EnrichmentResult } from './types.js';

export interface TradeFetcher {
  fetchTrades(mintAddress: string, limit: number): Promise<TradeSample[]>;
}

export interface TradeEnricherOptions {
  ttlMs: number;
  sampleLimit: number;
  now?: () => number;
}

export class TradeEnricher implements Enricher {
  readonly name = 'trades';
  private readonly now: () => number;

  constructor(
    private readonly fetcher: TradeFetcher,
    private readonly cache: TtlCache<EnrichmentResult>,
    private readonly options: TradeEnricherOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  // Only launchpad tokens have a trade feed
  appliesTo(token: CanonicalToken): boolean {
    return token.sources.includes(TokenSource.PUMPFUN) &&
      (token.status === TokenStatus.CREATED || token.status === TokenStatus.ACTIVE || token.status === TokenStatus.COMPLETED);
  }

  async enrich(token: CanonicalToken): Promise<RawTokenObservation | null> {
    const { mintAddress } = token;
    const result = await this.cache.getOrFetch(`trades:${mintAddress}`, this.options.ttlMs, async () => {
      const trades = await this.fetcher.fetchTrades(mintAddress, this.options.sampleLimit);
      logger.debug({ mint: shortMint(mintAddress), trades: trades.length }, 'Trade samples fetched');
      return { fields: trades.length > 0 ? { recentTrades: trades } : {}, fetchedAt: this.now() };
    });

    if (!result.fields.recentTrades) return null;
    return {
      mintAddress,
      source: TokenSource.PUMPFUN,
      observedAt: result.fetchedAt,
      fields: result.fields,
    };
  }
}
