// Test helpers: deterministic mints, stubbed HTTP, token builders.

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { PublicKey } from '@solana/web3.js';
import { parseConfig } from '../config/index.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { RetryPolicy } from '../utils/retry.js';
import { emptyMarket } from '../modules/merge/field-merge.js';
import { SnapshotReason, TokenSource, TokenStatus } from '../types/index.js';
import type {
  AppConfig,
  CanonicalToken,
  MarketFields,
  ObservationFields,
  RawTokenObservation,
  Snapshot,
} from '../types/index.js';
import type { AdapterDeps } from '../modules/sources/base-adapter.js';

export const HOUR = 60 * 60 * 1000;
export const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

// Valid 32-byte key with the Pump.fun vanity suffix
export const LAUNCHPAD_MINT = '29nq7pvtFL8EYfkuvbrx5S7AqfFAG2Q2yiN4rATqpump';

export function makeMint(seed: number): string {
  return new PublicKey(Uint8Array.from({ length: 32 }, (_, i) => (i * 7 + seed + 1) % 256)).toBase58();
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return parseConfig(env);
}

// ============ HTTP STUB ============

export interface StubResponse {
  status?: number;
  data: unknown;
  headers?: Record<string, string>;
}

export type StubRoute = StubResponse | ((config: InternalAxiosRequestConfig) => StubResponse);

/**
 * An axios instance answering from a route table keyed by request path.
 * Unknown paths answer 404. Status >= 400 rejects like a real server.
 */
export function stubHttp(routes: Record<string, StubRoute>): { http: AxiosInstance; calls: string[] } {
  const calls: string[] = [];

  const http = axios.create({
    adapter: async (config) => {
      const path = config.url ?? '';
      calls.push(path);
      const route = routes[path];
      const reply: StubResponse = route === undefined
        ? { status: 404, data: { error: 'not found' } }
        : typeof route === 'function' ? route(config) : route;

      const response = {
        data: reply.data,
        status: reply.status ?? 200,
        statusText: String(reply.status ?? 200),
        headers: reply.headers ?? {},
        config,
      };

      if (response.status >= 400) {
        throw new AxiosError(`Request failed with status code ${response.status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });

  return { http, calls };
}

export function adapterDeps(http: AxiosInstance, now: () => number = () => T0): AdapterDeps {
  return {
    http,
    limiter: new RateLimiter(
      { serviceName: 'test', maxRequestsPerMinute: 10_000, minDelayBetweenRequests: 0, maxConcurrent: 10 },
      async () => undefined
    ),
    retry: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, multiplier: 2, maxDelayMs: 0 }, async () => undefined),
    now,
  };
}

// ============ BUILDERS ============

export function observation(
  mintAddress: string,
  source: TokenSource,
  observedAt: number,
  fields: ObservationFields,
  identity?: RawTokenObservation['identity']
): RawTokenObservation {
  return { mintAddress, source, observedAt, fields, identity };
}

export function makeToken(overrides: Partial<Omit<CanonicalToken, 'market'>> & { market?: Partial<MarketFields> } = {}): CanonicalToken {
  const { market, ...rest } = overrides;
  return {
    mintAddress: makeMint(1),
    symbol: 'TEST',
    name: 'Test Token',
    identitySource: TokenSource.RAYDIUM,
    firstDiscoveredAt: T0,
    updatedAt: T0,
    lastSeenAt: T0,
    lastActivityAt: null,
    status: TokenStatus.CREATED,
    fieldObservedAt: {},
    sources: [TokenSource.RAYDIUM],
    riskScore: 0,
    investScore: 0,
    manualBlacklist: false,
    version: 1,
    ...rest,
    market: { ...emptyMarket(), ...market },
  };
}

export function makeSnapshot(
  mintAddress: string,
  snapshotTimestamp: number,
  market: Partial<MarketFields> = {},
  overrides: Partial<Omit<Snapshot, 'market'>> = {}
): Snapshot {
  return {
    id: `snap-${snapshotTimestamp}`,
    mintAddress,
    snapshotTimestamp,
    reason: SnapshotReason.PERIODIC,
    status: TokenStatus.ACTIVE,
    riskScore: 0,
    investScore: 0,
    ...overrides,
    market: { ...emptyMarket(), ...market },
  };
}
