import { describe, it, expect, vi } from 'vitest';
import { PublicKey } from '@solana/web3.js';
import { HolderEnricher, type HolderRpc } from './holders.js';
import { TradeEnricher, type TradeFetcher } from './trades.js';
import { RugCheckEnricher, reportToFields } from './rugcheck.js';
import { createEnrichers } from './index.js';
import { SourceUnavailable } from '../../utils/errors.js';
import { TtlCache } from '../../utils/ttl-cache.js';
import { makeMint, makeToken, stubHttp, testConfig, T0 } from '../../testing/fixtures.js';
import { TokenSource, TokenStatus } from '../../types/index.js';
import type { EnrichmentResult } from './types.js';
import type { TradeSample } from '../../types/index.js';

const mint = makeMint(21);

function newCache(): TtlCache<EnrichmentResult> {
  return new TtlCache<EnrichmentResult>({ maxSize: 100, sweepIntervalMs: 60_000, now: () => T0 });
}

const PUMP_PROGRAM = new PublicKey('6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P');
const TOKEN_2022_PROGRAM = new PublicKey('TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb');
const ATA_PROGRAM = new PublicKey('ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL');
const LEGACY_TOKEN_PROGRAM = new PublicKey('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');

function ataOf(owner: PublicKey, tokenProgram: PublicKey): PublicKey {
  return PublicKey.findProgramAddressSync([owner.toBuffer(), tokenProgram.toBuffer(), new PublicKey(mint).toBuffer()], ATA_PROGRAM)[0];
}

function fakeRpc(amounts: number[], supply: number, addresses: PublicKey[] = []) {
  const getTokenLargestAccounts = vi.fn(async () => ({
    context: { slot: 1 },
    value: amounts.map((amount, i) => ({
      address: addresses[i] ?? new PublicKey(makeMint(100 + i)),
      amount: String(amount),
      decimals: 6,
      uiAmount: amount / 1e6,
      uiAmountString: String(amount / 1e6),
    })),
  }));
  const getTokenSupply = vi.fn(async () => ({
    context: { slot: 1 },
    value: { amount: String(supply), decimals: 6, uiAmount: supply / 1e6, uiAmountString: String(supply / 1e6) },
  }));
  const rpc: HolderRpc = { getTokenLargestAccounts, getTokenSupply };
  return { rpc, getTokenLargestAccounts };
}

describe('HolderEnricher', () => {
  it('should report top-10 concentration from the largest accounts', async () => {
    const { rpc } = fakeRpc([600, 200, 100], 2000);
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 1000, now: () => T0 });

    expect(await enricher.enrich(makeToken({ mintAddress: mint }))).toEqual({
      mintAddress: mint,
      source: TokenSource.SOLANA_RPC,
      observedAt: T0,
      fields: { top10HolderPct: 45 },
    });
  });

  it('should leave the bonding curve account out of the top holders', async () => {
    const [curve] = PublicKey.findProgramAddressSync([Buffer.from('bonding-curve'), new PublicKey(mint).toBuffer()], PUMP_PROGRAM);
    const curveAccount = ataOf(curve, LEGACY_TOKEN_PROGRAM);
    const { rpc } = fakeRpc([800, 600, 200, 100], 2000, [curveAccount]);
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 1000, now: () => T0 });

    const result = await enricher.enrich(makeToken({ mintAddress: mint }));

    expect(result?.fields).toEqual({ top10HolderPct: 45 });
  });

  it('should leave the migrated pool account out of the top holders', async () => {
    const pool = makeMint(60);
    const poolAccount = ataOf(new PublicKey(pool), TOKEN_2022_PROGRAM);
    const { rpc } = fakeRpc([1000, 300], 2000, [poolAccount]);
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 1000, now: () => T0 });

    const result = await enricher.enrich(makeToken({ mintAddress: mint, market: { migratedPoolAddress: pool } }));

    expect(result?.fields).toEqual({ top10HolderPct: 15 });
  });

  it('should fetch once for concurrent and repeated calls', async () => {
    const { rpc, getTokenLargestAccounts } = fakeRpc([600], 2000);
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 1000, now: () => T0 });
    const token = makeToken({ mintAddress: mint });

    await Promise.all([enricher.enrich(token), enricher.enrich(token)]);
    await enricher.enrich(token);

    expect(getTokenLargestAccounts).toHaveBeenCalledTimes(1);
  });

  it('should return null without holder data', async () => {
    const { rpc } = fakeRpc([], 0);
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 1000 });

    expect(await enricher.enrich(makeToken({ mintAddress: mint }))).toBeNull();
  });

  it('should time out a hanging RPC call', async () => {
    const hanging = new Promise<never>(() => undefined);
    const rpc: HolderRpc = {
      getTokenLargestAccounts: () => hanging,
      getTokenSupply: () => hanging,
    };
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 10 });

    await expect(enricher.enrich(makeToken({ mintAddress: mint }))).rejects.toThrow('timed out after 10ms');
  });

  it('should skip tokens in side states', () => {
    const { rpc } = fakeRpc([], 0);
    const enricher = new HolderEnricher(rpc, newCache(), { ttlMs: 60_000, timeoutMs: 1000 });

    expect(enricher.appliesTo(makeToken({ status: TokenStatus.BLACKLISTED }))).toBe(false);
    expect(enricher.appliesTo(makeToken({ status: TokenStatus.MIGRATED }))).toBe(true);
  });
});

describe('TradeEnricher', () => {
  const trades: TradeSample[] = [
    { timestamp: T0 - 2000, amount: 0.5, side: 'buy' },
    { timestamp: T0 - 1000, amount: 0.2, side: 'sell' },
  ];

  it('should turn recent trades into an observation', async () => {
    const fetchTrades = vi.fn<TradeFetcher['fetchTrades']>().mockResolvedValue(trades);
    const enricher = new TradeEnricher({ fetchTrades }, newCache(), { ttlMs: 60_000, sampleLimit: 50, now: () => T0 });
    const token = makeToken({ mintAddress: mint, sources: [TokenSource.PUMPFUN] });

    const result = await enricher.enrich(token);

    expect(fetchTrades).toHaveBeenCalledWith(mint, 50);
    expect(result).toEqual({
      mintAddress: mint,
      source: TokenSource.PUMPFUN,
      observedAt: T0,
      fields: { recentTrades: trades },
    });
  });

  it('should only apply to launchpad tokens still on the curve', () => {
    const fetchTrades = vi.fn<TradeFetcher['fetchTrades']>().mockResolvedValue([]);
    const enricher = new TradeEnricher({ fetchTrades }, newCache(), { ttlMs: 60_000, sampleLimit: 50 });

    expect(enricher.appliesTo(makeToken({ sources: [TokenSource.RAYDIUM] }))).toBe(false);
    expect(enricher.appliesTo(makeToken({ sources: [TokenSource.PUMPFUN], status: TokenStatus.ACTIVE }))).toBe(true);
    expect(enricher.appliesTo(makeToken({ sources: [TokenSource.PUMPFUN], status: TokenStatus.MIGRATED }))).toBe(false);
  });

  it('should return null when there are no trades', async () => {
    const fetchTrades = vi.fn<TradeFetcher['fetchTrades']>().mockResolvedValue([]);
    const enricher = new TradeEnricher({ fetchTrades }, newCache(), { ttlMs: 60_000, sampleLimit: 50 });

    expect(await enricher.enrich(makeToken({ mintAddress: mint, sources: [TokenSource.PUMPFUN] }))).toBeNull();
  });
});

describe('RugCheckEnricher', () => {
  const report = `/tokens/${mint}/report`;

  it('should turn a report into rug and authority flags', async () => {
    const { http } = stubHttp({ [report]: { data: { mintAuthority: null, freezeAuthority: 'FreezeAuth1111', rugged: true } } });
    const enricher = new RugCheckEnricher(http, newCache(), { ttlMs: 60_000, now: () => T0 });

    expect(await enricher.enrich(makeToken({ mintAddress: mint }))).toEqual({
      mintAddress: mint,
      source: TokenSource.RUGCHECK,
      observedAt: T0,
      fields: { flaggedRugged: true, mintAuthorityEnabled: false, freezeAuthorityEnabled: true },
    });
  });

  it('should fall back to the nested token block and metadata flag', () => {
    expect(reportToFields({ token: { mintAuthority: 'MintAuth1111', freezeAuthority: '' }, tokenMeta: { rugged: false } })).toEqual({
      flaggedRugged: false,
      mintAuthorityEnabled: true,
      freezeAuthorityEnabled: false,
    });
  });

  it('should return null when the report says nothing', async () => {
    const { http } = stubHttp({ [report]: { data: { score: 1 } } });
    const enricher = new RugCheckEnricher(http, newCache(), { ttlMs: 60_000 });

    expect(await enricher.enrich(makeToken({ mintAddress: mint }))).toBeNull();
  });

  it('should fetch once per cache lifetime', async () => {
    const { http, calls } = stubHttp({ [report]: { data: { rugged: false } } });
    const enricher = new RugCheckEnricher(http, newCache(), { ttlMs: 60_000 });
    const token = makeToken({ mintAddress: mint });

    await enricher.enrich(token);
    await enricher.enrich(token);

    expect(calls).toEqual([report]);
  });

  it('should reject a report that is not an object', async () => {
    const { http } = stubHttp({ [report]: { data: 'maintenance' } });
    const enricher = new RugCheckEnricher(http, newCache(), { ttlMs: 60_000 });

    await expect(enricher.enrich(makeToken({ mintAddress: mint }))).rejects.toBeInstanceOf(SourceUnavailable);
  });
});

describe('createEnrichers', () => {
  const fetcher: TradeFetcher = { fetchTrades: async () => [] };

  it('should build every enabled enricher', () => {
    expect(createEnrichers(testConfig(), newCache(), fetcher).map(e => e.name)).toEqual(['holders', 'rugcheck', 'trades']);
  });

  it('should leave out a disabled RugCheck lookup', () => {
    const config = testConfig({ RUGCHECK_ENABLED: 'false' });
    expect(createEnrichers(config, newCache(), fetcher).map(e => e.name)).toEqual(['holders', 'trades']);
  });
});
