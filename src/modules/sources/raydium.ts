// ===========================================
// RAYDIUM SOURCE
// New liquidity pools from the v3 pool listing
// ===========================================

import { z } from 'zod';
import { BaseSourceAdapter, numeric, toNumber, type SourceBatch } from './base-adapter.js';
import { SourceUnavailable } from '../../utils/errors.js';
import { isLaunchpadMint } from '../../utils/mint-address.js';
import { TokenSource } from '../../types/index.js';
import type { RawTokenObservation } from '../../types/index.js';

export const SOL_MINT = 'So11111111111111111111111111111111111111112';
export const USDC_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
export const USDT_MINT = 'Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB';

const QUOTE_MINTS = new Set([SOL_MINT, USDC_MINT, USDT_MINT]);
const USD_QUOTES = new Set([USDC_MINT, USDT_MINT]);

// ============ UPSTREAM SCHEMAS ============

const mintInfo = z.object({
  address: z.string(),
  symbol: z.string().optional(),
  name: z.string().optional(),
});

const poolSchema = z.object({
  id: z.string(),
  mintA: mintInfo,
  mintB: mintInfo,
  price: numeric,
  tvl: numeric,
  day: z.object({ volume: numeric }).partial().optional(),
  openTime: numeric,
});

const listResponseSchema = z.object({
  success: z.boolean(),
  data: z.object({
    data: z.array(z.unknown()),
    hasNextPage: z.boolean().optional(),
  }),
});

// The listing has no open-time sort key, so new pools can sit on any page
const PAGE_SIZE = 500;
const MAX_PAGES = 4;

export type RaydiumPool = z.output<typeof poolSchema>;

/**
 * The non-quote side of a pool is the token being listed.
 * Returns null for quote/quote pools. A pool only counts as a migration
 * target for launchpad mints; anything else is a plain DEX listing.
 */
export function poolToObservation(pool: RaydiumPool, observedAt: number): RawTokenObservation | null {
  const aIsQuote = QUOTE_MINTS.has(pool.mintA.address);
  const bIsQuote = QUOTE_MINTS.has(pool.mintB.address);
  if (aIsQuote === bIsQuote) return null;

  const token = aIsQuote ? pool.mintB : pool.mintA;
  const quote = aIsQuote ? pool.mintA : pool.mintB;

  // price is mintB per mintA
  const rawPrice = toNumber(pool.price);
  let priceUsd: number | null = null;
  if (rawPrice !== null && rawPrice > 0 && USD_QUOTES.has(quote.address)) {
    priceUsd = aIsQuote ? 1 / rawPrice : rawPrice;
  }

  const openTime = toNumber(pool.openTime);

  return {
    mintAddress: token.address,
    source: TokenSource.RAYDIUM,
    observedAt,
    identity: { symbol: token.symbol, name: token.name },
    fields: {
      priceUsd,
      liquidityUsd: toNumber(pool.tvl),
      volume24h: toNumber(pool.day?.volume),
      pairCreatedAt: openTime !== null && openTime > 0 ? openTime * 1000 : null,
      migratedPoolAddress: isLaunchpadMint(token.address) ? pool.id : null,
      hasDexData: true,
    },
  };
}

// ============ ADAPTER ============

export class RaydiumAdapter extends BaseSourceAdapter {
  readonly source = TokenSource.RAYDIUM;

  protected async collect(since: number, limit: number, observedAt: number): Promise<SourceBatch> {
    const fresh: RaydiumPool[] = [];
    let malformed = 0;

    for (let page = 1; page <= MAX_PAGES; page++) {
      const raw = await this.request<unknown>({
        url: '/pools/info/list',
        method: 'GET',
        params: {
          poolType: 'all',
          poolSortField: 'default',
          sortType: 'desc',
          pageSize: PAGE_SIZE,
          page,
        },
      });

      const envelope = listResponseSchema.safeParse(raw);
      if (!envelope.success || !envelope.data.success) {
        throw new SourceUnavailable(this.source, 'pool listing returned an error envelope');
      }

      const pools = this.parseItems(poolSchema, envelope.data.data.data);
      malformed += pools.malformed;
      fresh.push(...pools.items.filter(pool => (toNumber(pool.openTime) ?? 0) * 1000 >= since));

      if (fresh.length >= limit || envelope.data.data.hasNextPage !== true) break;
    }

    // Newest pools first
    fresh.sort((a, b) => (toNumber(b.openTime) ?? 0) - (toNumber(a.openTime) ?? 0));

    const observations: RawTokenObservation[] = [];
    for (const pool of fresh) {
      const observation = poolToObservation(pool, observedAt);
      if (observation) observations.push(observation);
    }

    return { observations, malformed };
  }
}
