// ===========================================
// SOURCE ADAPTERS - MODULE INDEX
// ===========================================

import type { AppConfig } from '../../types/index.js';
import { TokenSource } from '../../types/index.js';
import { RetryPolicy } from '../../utils/retry.js';
import { createHttpClient, createSourceLimiter, type SourceAdapter } from './base-adapter.js';
import { DexScreenerAdapter } from './dexscreener.js';
import { RaydiumAdapter } from './raydium.js';
import { JupiterAdapter } from './jupiter.js';
import { PumpFunAdapter } from './pumpfun.js';

export * from './base-adapter.js';
export { DexScreenerAdapter, aggregatePairs, MIGRATION_DEXES } from './dexscreener.js';
export { RaydiumAdapter, poolToObservation } from './raydium.js';
export { JupiterAdapter, registryToObservation } from './jupiter.js';
export { PumpFunAdapter, coinToObservation, bondingCurveProgress, COMPLETION_MARKET_CAP_USD } from './pumpfun.js';

export interface SourceSet {
  adapters: SourceAdapter[];
  pumpfun: PumpFunAdapter;
}

/**
 * Build one adapter per configured upstream, each with its own client and limiter.
 * The Pump.fun adapter is always built: trade enrichment reads through it.
 */
export function createSourceAdapters(config: AppConfig): SourceSet {
  const retry = new RetryPolicy(config.retry);
  const { dexscreener, raydium, jupiter, pumpfun } = config.sources;

  const pumpfunAdapter = new PumpFunAdapter({
    http: createHttpClient(pumpfun, { Origin: 'https://pump.fun' }),
    limiter: createSourceLimiter(TokenSource.PUMPFUN, pumpfun),
    retry,
  });

  const adapters: SourceAdapter[] = [];

  if (dexscreener.enabled) {
    adapters.push(new DexScreenerAdapter({
      http: createHttpClient(dexscreener),
      limiter: createSourceLimiter(TokenSource.DEXSCREENER, dexscreener),
      retry,
    }));
  }

  if (raydium.enabled) {
    adapters.push(new RaydiumAdapter({
      http: createHttpClient(raydium),
      limiter: createSourceLimiter(TokenSource.RAYDIUM, raydium),
      retry,
    }));
  }

  if (jupiter.enabled) {
    adapters.push(new JupiterAdapter({
      http: createHttpClient(jupiter, jupiter.apiKey ? { 'x-api-key': jupiter.apiKey } : {}),
      limiter: createSourceLimiter(TokenSource.JUPITER, jupiter),
      retry,
    }));
  }

  if (pumpfun.enabled) {
    adapters.push(pumpfunAdapter);
  }

  return { adapters, pumpfun: pumpfunAdapter };
}
