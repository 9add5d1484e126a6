// ===========================================
// PUMP.FUN SOURCE
// Latest bonding-curve launches
// ===========================================

import { z } from 'zod';
import { BaseSourceAdapter, numeric, toNumber, type SourceBatch } from './base-adapter.js';
import { TokenSource } from '../../types/index.js';
import type { RawTokenObservation, TradeSample } from '../../types/index.js';

// Curve completes (and migrates) around a $69k market cap
export const COMPLETION_MARKET_CAP_USD = 69000;

const LAMPORTS_PER_SOL = 1_000_000_000;

// ============ UPSTREAM SCHEMAS ============

const coinSchema = z.object({
  mint: z.string(),
  name: z.string().optional(),
  symbol: z.string().optional(),
  created_timestamp: numeric,
  complete: z.boolean().nullish(),
  raydium_pool: z.string().nullish(),
  pump_swap_pool: z.string().nullish(),
  usd_market_cap: numeric,
});

export const tradeSchema = z.object({
  timestamp: z.number(),
  sol_amount: numeric,
  is_buy: z.boolean(),
});

export type PumpCoin = z.output<typeof coinSchema>;

export function bondingCurveProgress(usdMarketCap: number | null, complete: boolean): number | null {
  if (complete) return 100;
  if (usdMarketCap === null) return null;
  return Math.min(100, Math.max(0, (usdMarketCap / COMPLETION_MARKET_CAP_USD) * 100));
}

export function coinToObservation(coin: PumpCoin, observedAt: number): RawTokenObservation {
  const marketCap = toNumber(coin.usd_market_cap);
  const complete = coin.complete ?? false;
  const created = toNumber(coin.created_timestamp);

  return {
    mintAddress: coin.mint,
    source: TokenSource.PUMPFUN,
    observedAt,
    identity: { symbol: coin.symbol, name: coin.name },
    fields: {
      marketCap,
      bondingCurveProgress: bondingCurveProgress(marketCap, complete),
      bondingCurveComplete: complete,
      migratedPoolAddress: coin.raydium_pool ?? coin.pump_swap_pool ?? null,
      pairCreatedAt: created !== null && created > 0 ? Math.round(created) : null,
    },
  };
}

/**
 * Pump.fun trade rows carry lamports and unix seconds.
 */
export function toTradeSample(trade: z.output<typeof tradeSchema>): TradeSample | null {
  const lamports = toNumber(trade.sol_amount);
  if (lamports === null || lamports < 0) return null;
  return {
    timestamp: trade.timestamp * 1000,
    amount: lamports / LAMPORTS_PER_SOL,
    side: trade.is_buy ? 'buy' : 'sell',
  };
}

// ============ ADAPTER ============

export class PumpFunAdapter extends BaseSourceAdapter {
  readonly source = TokenSource.PUMPFUN;

  protected async collect(_since: number, limit: number, observedAt: number): Promise<SourceBatch> {
    const raw = await this.request<unknown>({
      url: '/coins',
      method: 'GET',
      params: {
        offset: 0,
        limit,
        sort: 'created_timestamp',
        order: 'DESC',
        includeNsfw: false,
      },
    });

    const parsed = this.parseItems(coinSchema, raw);

    return {
      observations: parsed.items.map(coin => coinToObservation(coin, observedAt)),
      malformed: parsed.malformed,
    };
  }

  /**
   * Recent trades for one mint, used by trade enrichment.
   */
  async fetchTrades(mintAddress: string, limit: number): Promise<TradeSample[]> {
    const raw = await this.request<unknown>({
      url: `/trades/all/${mintAddress}`,
      method: 'GET',
      params: { limit, offset: 0, minimumSize: 0 },
    });

    const parsed = this.parseItems(tradeSchema, raw);
    return parsed.items
      .map(toTradeSample)
      .filter((t): t is TradeSample => t !== null)
      .sort((a, b) => a.timestamp - b.timestamp);
  }
}
