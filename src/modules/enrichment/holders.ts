// ===========================================
// HOLDER DISTRIBUTION ENRICHER
// Top-10 concentration from the largest token accounts,
// leaving out curve and pool custody accounts
// ===========================================

import type { Connection } from '@solana/web3.js';
import { PublicKey } from '@solana/web3.js';
import { logger, shortMint } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import { isValidMintAddress } from '../../utils/mint-address.js';
import { TokenSource, TokenStatus } from '../../types/index.js';
import type { TtlCache } from '../../utils/ttl-cache.js';
import type { CanonicalToken, RawTokenObservation } from '../../types/index.js';
import type { Enricher, EnrichmentResult } from './types.js';

export type HolderRpc = Pick<Connection, 'getTokenLargestAccounts' | 'getTokenSupply'>;

export interface HolderEnricherOptions {
  ttlMs: number;
  timeoutMs: number;
  now?: () => number;
}

// ============ CUSTODY ACCOUNTS ============

export const PUMP_PROGRAM_ID = new PublicKey('6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P');
export const TOKEN_PROGRAM_ID = new PublicKey('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');
export const TOKEN_2022_PROGRAM_ID = new PublicKey('TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb');
export const ASSOCIATED_TOKEN_PROGRAM_ID = new PublicKey('ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL');

export function bondingCurveAddress(mint: PublicKey): PublicKey {
  const [curve] = PublicKey.findProgramAddressSync([Buffer.from('bonding-curve'), mint.toBuffer()], PUMP_PROGRAM_ID);
  return curve;
}

export function associatedTokenAddress(owner: PublicKey, mint: PublicKey, tokenProgram: PublicKey = TOKEN_PROGRAM_ID): PublicKey {
  const [ata] = PublicKey.findProgramAddressSync(
    [owner.toBuffer(), tokenProgram.toBuffer(), mint.toBuffer()],
    ASSOCIATED_TOKEN_PROGRAM_ID
  );
  return ata;
}

/**
 * Token accounts that hold supply on behalf of a curve or pool rather than a
 * holder: the bonding curve's and the migrated pool's associated accounts
 * under both token programs.
 */
export function custodyAccounts(mint: PublicKey, poolAddress: string | null): Set<string> {
  const owners = [bondingCurveAddress(mint)];
  if (poolAddress && isValidMintAddress(poolAddress)) owners.push(new PublicKey(poolAddress));

  const accounts = new Set<string>();
  for (const owner of owners) {
    for (const program of [TOKEN_PROGRAM_ID, TOKEN_2022_PROGRAM_ID]) {
      accounts.add(associatedTokenAddress(owner, mint, program).toBase58());
    }
  }
  return accounts;
}

// ============ ENRICHER ============

const SKIPPED_STATUSES: ReadonlySet<TokenStatus> = new Set([
  TokenStatus.ARCHIVED,
  TokenStatus.BLACKLISTED,
  TokenStatus.TERMINATED,
]);

export class HolderEnricher implements Enricher {
  readonly name = 'holders';
  private readonly now: () => number;

  constructor(
    private readonly rpc: HolderRpc,
    private readonly cache: TtlCache<EnrichmentResult>,
    private readonly options: HolderEnricherOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  appliesTo(token: CanonicalToken): boolean {
    return !SKIPPED_STATUSES.has(token.status);
  }

  async enrich(token: CanonicalToken): Promise<RawTokenObservation | null> {
    const { mintAddress } = token;
    const poolAddress = token.market.migratedPoolAddress;
    const result = await this.cache.getOrFetch(`holders:${mintAddress}`, this.options.ttlMs, () => this.fetch(mintAddress, poolAddress));

    if (result.fields.top10HolderPct === undefined) return null;
    return {
      mintAddress,
      source: TokenSource.SOLANA_RPC,
      observedAt: result.fetchedAt,
      fields: result.fields,
    };
  }

  private async fetch(mintAddress: string, poolAddress: string | null): Promise<EnrichmentResult> {
    const mint = new PublicKey(mintAddress);
    const { timeoutMs } = this.options;

    const [largest, supply] = await Promise.all([
      withTimeout(this.rpc.getTokenLargestAccounts(mint), timeoutMs, 'getTokenLargestAccounts'),
      withTimeout(this.rpc.getTokenSupply(mint), timeoutMs, 'getTokenSupply'),
    ]);

    const fetchedAt = this.now();
    const totalSupply = Number(supply.value.amount);
    if (largest.value.length === 0 || !(totalSupply > 0)) {
      return { fields: {}, fetchedAt };
    }

    const custody = custodyAccounts(mint, poolAddress);
    const holders = largest.value.filter(account => !custody.has(account.address.toBase58()));
    if (holders.length === 0) {
      return { fields: {}, fetchedAt };
    }

    const top10 = holders.slice(0, 10).reduce((sum, account) => sum + Number(account.amount), 0);
    const top10HolderPct = Math.min(100, (top10 / totalSupply) * 100);

    logger.debug({ mint: shortMint(mintAddress), top10HolderPct: top10HolderPct.toFixed(1) }, 'Holder distribution fetched');
    return { fields: { top10HolderPct }, fetchedAt };
  }
}
