// ===========================================
// DEXSCREENER SOURCE
// Latest token profiles, then batched pair lookups
// ===========================================

import { z } from 'zod';
import { BaseSourceAdapter, numeric, toNumber, type SourceBatch } from './base-adapter.js';
import { isLaunchpadMint } from '../../utils/mint-address.js';
import { TokenSource } from '../../types/index.js';
import type { ObservationFields, RawTokenObservation } from '../../types/index.js';

// DexScreener accepts up to 30 addresses per /tokens lookup
const ADDRESS_BATCH_SIZE = 30;

// For a launchpad mint, a deepest pool on one of these means it left the curve
export const MIGRATION_DEXES = new Set(['raydium', 'pumpswap', 'meteora', 'orca']);

// ============ UPSTREAM SCHEMAS ============

const profileSchema = z.object({
  chainId: z.string(),
  tokenAddress: z.string(),
});

const windowCounts = z.object({ buys: z.number().optional(), sells: z.number().optional() }).partial();

const pairSchema = z.object({
  chainId: z.string(),
  dexId: z.string(),
  pairAddress: z.string(),
  baseToken: z.object({
    address: z.string(),
    name: z.string().optional(),
    symbol: z.string().optional(),
  }),
  priceUsd: numeric,
  txns: z.object({ h1: windowCounts, h6: windowCounts, h24: windowCounts }).partial().optional(),
  volume: z.object({ h1: numeric, h6: numeric, h24: numeric }).partial().optional(),
  priceChange: z.object({ h1: numeric, h24: numeric }).partial().optional(),
  liquidity: z.object({ usd: numeric }).partial().optional(),
  marketCap: numeric,
  fdv: numeric,
  pairCreatedAt: z.number().optional(),
});

export type DexPair = z.output<typeof pairSchema>;

// ============ PAIR AGGREGATION ============

const sum = (values: Array<number | null>): number | null => {
  const known = values.filter((v): v is number => v !== null);
  return known.length > 0 ? known.reduce((a, b) => a + b, 0) : null;
};

/**
 * Fold every pair of one base token into observation fields.
 * Price and change come from the deepest pool; volumes and counts are summed.
 */
export function aggregatePairs(pairs: DexPair[]): ObservationFields {
  const byDepth = [...pairs].sort(
    (a, b) => (toNumber(b.liquidity?.usd) ?? 0) - (toNumber(a.liquidity?.usd) ?? 0)
  );
  const deepest = byDepth[0];
  if (!deepest) return { hasDexData: false };

  const liquidities = pairs.map(p => toNumber(p.liquidity?.usd));
  const totalLiquidity = sum(liquidities);
  const deepestLiquidity = toNumber(deepest.liquidity?.usd);

  const createdTimes = pairs.map(p => p.pairCreatedAt).filter((t): t is number => typeof t === 'number');

  return {
    priceUsd: toNumber(deepest.priceUsd),
    liquidityUsd: totalLiquidity,
    marketCap: toNumber(deepest.marketCap) ?? toNumber(deepest.fdv),
    volume1h: sum(pairs.map(p => toNumber(p.volume?.h1))),
    volume6h: sum(pairs.map(p => toNumber(p.volume?.h6))),
    volume24h: sum(pairs.map(p => toNumber(p.volume?.h24))),
    buys1h: sum(pairs.map(p => p.txns?.h1?.buys ?? null)),
    sells1h: sum(pairs.map(p => p.txns?.h1?.sells ?? null)),
    buys6h: sum(pairs.map(p => p.txns?.h6?.buys ?? null)),
    sells6h: sum(pairs.map(p => p.txns?.h6?.sells ?? null)),
    buys24h: sum(pairs.map(p => p.txns?.h24?.buys ?? null)),
    sells24h: sum(pairs.map(p => p.txns?.h24?.sells ?? null)),
    priceChange1h: toNumber(deepest.priceChange?.h1),
    priceChange24h: toNumber(deepest.priceChange?.h24),
    poolCount: pairs.length,
    largestPoolShare: totalLiquidity && deepestLiquidity !== null ? deepestLiquidity / totalLiquidity : null,
    pairCreatedAt: createdTimes.length > 0 ? Math.min(...createdTimes) : null,
    migratedPoolAddress: MIGRATION_DEXES.has(deepest.dexId) && isLaunchpadMint(deepest.baseToken.address)
      ? deepest.pairAddress
      : null,
    hasDexData: true,
  };
}

// ============ ADAPTER ============

export class DexScreenerAdapter extends BaseSourceAdapter {
  readonly source = TokenSource.DEXSCREENER;

  protected async collect(_since: number, limit: number, observedAt: number): Promise<SourceBatch> {
    const rawProfiles = await this.request<unknown>({ url: '/token-profiles/latest/v1', method: 'GET' });
    const profiles = this.parseItems(profileSchema, rawProfiles);

    const addresses = [...new Set(
      profiles.items.filter(p => p.chainId === 'solana').map(p => p.tokenAddress)
    )].slice(0, limit);

    let malformed = profiles.malformed;
    const pairsByToken = new Map<string, DexPair[]>();

    for (let i = 0; i < addresses.length; i += ADDRESS_BATCH_SIZE) {
      const chunk = addresses.slice(i, i + ADDRESS_BATCH_SIZE);
      const rawPairs = await this.request<unknown>({ url: `/tokens/v1/solana/${chunk.join(',')}`, method: 'GET' });
      const pairs = this.parseItems(pairSchema, rawPairs);
      malformed += pairs.malformed;

      for (const pair of pairs.items) {
        if (pair.chainId !== 'solana') continue;
        const list = pairsByToken.get(pair.baseToken.address) ?? [];
        list.push(pair);
        pairsByToken.set(pair.baseToken.address, list);
      }
    }

    const observations: RawTokenObservation[] = addresses.map(mintAddress => {
      const pairs = pairsByToken.get(mintAddress) ?? [];
      const first = pairs[0];
      return {
        mintAddress,
        source: this.source,
        observedAt,
        identity: first ? { symbol: first.baseToken.symbol, name: first.baseToken.name } : undefined,
        fields: aggregatePairs(pairs),
      };
    });

    return { observations, malformed };
  }
}
