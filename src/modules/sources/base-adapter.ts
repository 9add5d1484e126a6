// ===========================================
// SOURCE ADAPTER BASE
// Rate limiting, retry and item validation shared by every upstream
// ===========================================

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { RateLimiter } from '../../utils/rate-limiter.js';
import { RetryPolicy, parseRetryAfter } from '../../utils/retry.js';
import { MalformedObservation, RateLimited, SourceUnavailable, errorMessage } from '../../utils/errors.js';
import { isValidMintAddress } from '../../utils/mint-address.js';
import { TokenSource } from '../../types/index.js';
import type { RawTokenObservation, SourceConfig } from '../../types/index.js';

// ============ TYPES ============

export interface SourceBatch {
  observations: RawTokenObservation[];
  malformed: number;
}

export interface SourceAdapter {
  readonly source: TokenSource;
  fetchBatch(since: number, limit: number): Promise<SourceBatch>;
  fetchRecent(since: number, limit: number): Promise<RawTokenObservation[]>;
}

export interface AdapterDeps {
  http: AxiosInstance;
  limiter: RateLimiter;
  retry: RetryPolicy;
  now?: () => number;
}

// ============ COMMON OBSERVATION SCHEMA ============

const amount = z.number().finite().nonnegative().nullable().optional();
const count = z.number().int().nonnegative().nullable().optional();
const percentChange = z.number().finite().min(-100).nullable().optional();
const timestamp = z.number().int().positive().nullable().optional();

const tradeSampleSchema = z.object({
  timestamp: z.number().int().positive(),
  amount: z.number().finite().nonnegative(),
  side: z.enum(['buy', 'sell']),
});

export const observationSchema = z.object({
  mintAddress: z.string().refine(isValidMintAddress, 'invalid mint address'),
  source: z.nativeEnum(TokenSource),
  observedAt: z.number().int().positive(),
  identity: z.object({
    symbol: z.string().max(64).optional(),
    name: z.string().max(256).optional(),
  }).optional(),
  fields: z.object({
    priceUsd: amount,
    liquidityUsd: amount,
    marketCap: amount,
    volume1h: amount,
    volume6h: amount,
    volume24h: amount,
    buys1h: count,
    sells1h: count,
    buys6h: count,
    sells6h: count,
    buys24h: count,
    sells24h: count,
    priceChange1h: percentChange,
    priceChange24h: percentChange,
    holderCount: count,
    top10HolderPct: z.number().min(0).max(100).nullable().optional(),
    poolCount: count,
    largestPoolShare: z.number().min(0).max(1).nullable().optional(),
    bondingCurveProgress: z.number().min(0).max(100).nullable().optional(),
    bondingCurveComplete: z.boolean().nullable().optional(),
    migratedPoolAddress: z.string().min(1).nullable().optional(),
    pairCreatedAt: timestamp,
    hasDexData: z.boolean().nullable().optional(),
    flaggedRugged: z.boolean().nullable().optional(),
    mintAuthorityEnabled: z.boolean().nullable().optional(),
    freezeAuthorityEnabled: z.boolean().nullable().optional(),
    recentTrades: z.array(tradeSampleSchema).nullable().optional(),
  }),
});

// Upstreams send numbers as JSON numbers or numeric strings
export const numeric = z.union([z.number(), z.string()]).nullish();

export function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

// ============ BASE CLASS ============

export abstract class BaseSourceAdapter implements SourceAdapter {
  abstract readonly source: TokenSource;

  protected readonly http: AxiosInstance;
  protected readonly limiter: RateLimiter;
  protected readonly retry: RetryPolicy;
  protected readonly now: () => number;

  constructor(deps: AdapterDeps) {
    this.http = deps.http;
    this.limiter = deps.limiter;
    this.retry = deps.retry;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Pull raw upstream data and turn it into observations.
   * Per-item parse failures are counted in `malformed`, not thrown.
   */
  protected abstract collect(since: number, limit: number, observedAt: number): Promise<SourceBatch>;

  async fetchBatch(since: number, limit: number): Promise<SourceBatch> {
    const observedAt = this.now();
    const collected = await this.collect(since, limit, observedAt);

    let malformed = collected.malformed;
    const observations: RawTokenObservation[] = [];

    for (const observation of collected.observations) {
      const check = observationSchema.safeParse(observation);
      if (!check.success) {
        malformed++;
        this.logMalformed(new MalformedObservation(this.source, check.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')), observation.mintAddress);
        continue;
      }

      const createdAt = observation.fields.pairCreatedAt;
      if (typeof createdAt === 'number' && createdAt < since) continue;

      observations.push(observation);
      if (observations.length >= limit) break;
    }

    logger.debug({
      source: this.source,
      observations: observations.length,
      malformed,
    }, 'Source batch collected');

    return { observations, malformed };
  }

  async fetchRecent(since: number, limit: number): Promise<RawTokenObservation[]> {
    const batch = await this.fetchBatch(since, limit);
    return batch.observations;
  }

  /**
   * One upstream call through the rate limiter and retry policy.
   * Throws RateLimited on 429 and SourceUnavailable once retries are spent.
   */
  protected async request<T>(config: AxiosRequestConfig): Promise<T> {
    const outcome = await this.retry.run(() =>
      this.limiter.schedule(async () => {
        try {
          const response = await this.http.request<T>(config);
          return response.data;
        } catch (error) {
          if (axios.isAxiosError(error) && error.response?.status === 429) {
            throw new RateLimited(this.source, parseRetryAfter(error.response.headers['retry-after'], this.now()));
          }
          throw error;
        }
      })
    );

    switch (outcome.kind) {
      case 'ok':
        return outcome.value;
      case 'permanent_failure':
        if (outcome.error instanceof RateLimited) throw outcome.error;
        throw new SourceUnavailable(this.source, errorMessage(outcome.error), { cause: outcome.error });
      case 'transient_failure':
        throw new SourceUnavailable(
          this.source,
          `${errorMessage(outcome.error)} after ${outcome.attempts} attempts`,
          { cause: outcome.error }
        );
    }
  }

  /**
   * Validate each raw item against an upstream schema, dropping the bad ones.
   */
  protected parseItems<S extends z.ZodTypeAny>(schema: S, raw: unknown): { items: Array<z.output<S>>; malformed: number } {
    if (!Array.isArray(raw)) {
      throw new SourceUnavailable(this.source, 'unexpected response shape');
    }

    const items: Array<z.output<S>> = [];
    let malformed = 0;

    for (const item of raw) {
      const parsed = schema.safeParse(item);
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        malformed++;
        this.logMalformed(new MalformedObservation(this.source, parsed.error.issues[0]?.message ?? 'invalid item'));
      }
    }

    return { items, malformed };
  }

  private logMalformed(error: MalformedObservation, mintAddress?: string): void {
    logger.debug({
      source: this.source,
      mint: mintAddress?.slice(0, 8),
      code: error.code,
      reason: error.message,
    }, 'Dropping malformed item');
  }
}

export function createHttpClient(config: SourceConfig, headers: Record<string, string> = {}): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      Accept: 'application/json',
      ...headers,
    },
  });
}

export function createSourceLimiter(source: TokenSource, config: SourceConfig): RateLimiter {
  return new RateLimiter({
    serviceName: source,
    maxRequestsPerMinute: config.maxRequestsPerMinute,
    minDelayBetweenRequests: Math.floor(60_000 / config.maxRequestsPerMinute / 2),
    maxConcurrent: config.maxConcurrent,
  });
}
