// ===========================================
// JUPITER SOURCE
// Recently listed tokens from the token registry
// ===========================================

import { z } from 'zod';
import { BaseSourceAdapter, numeric, toNumber, type SourceBatch } from './base-adapter.js';
import { TokenSource } from '../../types/index.js';
import type { RawTokenObservation } from '../../types/index.js';

const tokenSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  symbol: z.string().optional(),
  holderCount: numeric,
  mcap: numeric,
  usdPrice: numeric,
  liquidity: numeric,
  firstPool: z.object({
    id: z.string().optional(),
    createdAt: z.string().optional(),
  }).optional(),
  stats24h: z.object({
    buyVolume: numeric,
    sellVolume: numeric,
    numBuys: numeric,
    numSells: numeric,
    priceChange: numeric,
  }).partial().optional(),
  stats1h: z.object({
    buyVolume: numeric,
    sellVolume: numeric,
    numBuys: numeric,
    numSells: numeric,
    priceChange: numeric,
  }).partial().optional(),
});

export type JupiterToken = z.output<typeof tokenSchema>;

const addVolumes = (a: number | null, b: number | null): number | null =>
  a === null && b === null ? null : (a ?? 0) + (b ?? 0);

const toCount = (value: number | null): number | null => (value === null ? null : Math.round(value));

export function registryToObservation(token: JupiterToken, observedAt: number): RawTokenObservation {
  const createdAt = token.firstPool?.createdAt ? Date.parse(token.firstPool.createdAt) : NaN;

  return {
    mintAddress: token.id,
    source: TokenSource.JUPITER,
    observedAt,
    identity: { symbol: token.symbol, name: token.name },
    fields: {
      priceUsd: toNumber(token.usdPrice),
      liquidityUsd: toNumber(token.liquidity),
      marketCap: toNumber(token.mcap),
      holderCount: toCount(toNumber(token.holderCount)),
      volume1h: token.stats1h
        ? addVolumes(toNumber(token.stats1h.buyVolume), toNumber(token.stats1h.sellVolume))
        : null,
      volume24h: token.stats24h
        ? addVolumes(toNumber(token.stats24h.buyVolume), toNumber(token.stats24h.sellVolume))
        : null,
      buys1h: toCount(toNumber(token.stats1h?.numBuys)),
      sells1h: toCount(toNumber(token.stats1h?.numSells)),
      buys24h: toCount(toNumber(token.stats24h?.numBuys)),
      sells24h: toCount(toNumber(token.stats24h?.numSells)),
      priceChange1h: toNumber(token.stats1h?.priceChange),
      priceChange24h: toNumber(token.stats24h?.priceChange),
      pairCreatedAt: Number.isNaN(createdAt) ? null : createdAt,
    },
  };
}

export class JupiterAdapter extends BaseSourceAdapter {
  readonly source = TokenSource.JUPITER;

  protected async collect(_since: number, limit: number, observedAt: number): Promise<SourceBatch> {
    const raw = await this.request<unknown>({ url: '/tokens/v2/recent', method: 'GET' });
    const parsed = this.parseItems(tokenSchema, raw);

    return {
      observations: parsed.items.slice(0, limit).map(token => registryToObservation(token, observedAt)),
      malformed: parsed.malformed,
    };
  }
}
