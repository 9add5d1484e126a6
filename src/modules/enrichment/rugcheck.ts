// ===========================================
// RUGCHECK ENRICHER
// Contract-level flags from the RugCheck token report
// ===========================================

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger, shortMint } from '../../utils/logger.js';
import { SourceUnavailable } from '../../utils/errors.js';
import { TokenSource, TokenStatus } from '../../types/index.js';
import type { TtlCache } from '../../utils/ttl-cache.js';
import type { CanonicalToken, ObservationFields, RawTokenObservation } from '../../types/index.js';
import type { Enricher, EnrichmentResult } from './types.js';

export interface RugCheckEnricherOptions {
  ttlMs: number;
  now?: () => number;
}

const authority = z.string().nullable().optional();

const reportSchema = z.object({
  mintAuthority: authority,
  freezeAuthority: authority,
  token: z.object({ mintAuthority: authority, freezeAuthority: authority }).partial().nullable().optional(),
  rugged: z.boolean().nullable().optional(),
  tokenMeta: z.object({ rugged: z.boolean().nullable().optional() }).partial().nullable().optional(),
});

export type RugCheckReport = z.output<typeof reportSchema>;

// Absent means the report did not say; null or empty means revoked
function authorityEnabled(...values: Array<string | null | undefined>): boolean | null {
  for (const value of values) {
    if (value === undefined) continue;
    return value !== null && value !== '';
  }
  return null;
}

export function reportToFields(report: RugCheckReport): ObservationFields {
  return {
    flaggedRugged: report.rugged ?? report.tokenMeta?.rugged ?? null,
    mintAuthorityEnabled: authorityEnabled(report.mintAuthority, report.token?.mintAuthority),
    freezeAuthorityEnabled: authorityEnabled(report.freezeAuthority, report.token?.freezeAuthority),
  };
}

const SKIPPED_STATUSES: ReadonlySet<TokenStatus> = new Set([
  TokenStatus.ARCHIVED,
  TokenStatus.BLACKLISTED,
  TokenStatus.TERMINATED,
]);

export class RugCheckEnricher implements Enricher {
  readonly name = 'rugcheck';
  private readonly now: () => number;

  constructor(
    private readonly http: AxiosInstance,
    private readonly cache: TtlCache<EnrichmentResult>,
    private readonly options: RugCheckEnricherOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  appliesTo(token: CanonicalToken): boolean {
    return !SKIPPED_STATUSES.has(token.status);
  }

  async enrich(token: CanonicalToken): Promise<RawTokenObservation | null> {
    const { mintAddress } = token;
    const result = await this.cache.getOrFetch(`rugcheck:${mintAddress}`, this.options.ttlMs, () => this.fetch(mintAddress));

    const known = Object.values(result.fields).some(value => value !== null && value !== undefined);
    if (!known) return null;
    return {
      mintAddress,
      source: TokenSource.RUGCHECK,
      observedAt: result.fetchedAt,
      fields: result.fields,
    };
  }

  private async fetch(mintAddress: string): Promise<EnrichmentResult> {
    const response = await this.http.get<unknown>(`/tokens/${mintAddress}/report`);
    const parsed = reportSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SourceUnavailable(TokenSource.RUGCHECK, `report for ${shortMint(mintAddress)} has an unexpected shape`);
    }

    const fields = reportToFields(parsed.data);
    logger.debug({
      mint: shortMint(mintAddress),
      rugged: fields.flaggedRugged,
      mintAuthority: fields.mintAuthorityEnabled,
      freezeAuthority: fields.freezeAuthorityEnabled,
    }, 'RugCheck report fetched');

    return { fields, fetchedAt: this.now() };
  }
}
