// ===========================================
// TOKEN RADAR - TYPE DEFINITIONS
// ===========================================

// ============ ENUMS ============

export enum TokenSource {
  DEXSCREENER = 'dexscreener',
  RAYDIUM = 'raydium',
  JUPITER = 'jupiter',
  PUMPFUN = 'pumpfun',
  SOLANA_RPC = 'solana_rpc',
  RUGCHECK = 'rugcheck',
  MANUAL = 'manual',
}

export enum TokenStatus {
  CREATED = 'created',
  ACTIVE = 'active',
  COMPLETED = 'completed',
  MIGRATED = 'migrated',
  TERMINATED = 'terminated',
  ARCHIVED = 'archived',
  BLACKLISTED = 'blacklisted',
  NO_DEX_DATA = 'no_dex_data',
}

export enum SnapshotReason {
  PERIODIC = 'periodic',
  THRESHOLD_TRIGGERED = 'threshold-triggered',
  MANUAL = 'manual',
  STATUS_CHANGE = 'status-change',
}

export type MergeResult = 'created' | 'updated' | 'unchanged';

// ============ OBSERVATIONS ============

export interface TradeSample {
  timestamp: number;      // epoch ms
  amount: number;         // quote amount (SOL or USD, per source)
  side: 'buy' | 'sell';
}

// Every market attribute the pipeline knows about.
// null = unknown; a source that does not report a field leaves it null.
export interface MarketFields {
  priceUsd: number | null;
  liquidityUsd: number | null;
  marketCap: number | null;

  // Windowed aggregates - replaced wholesale on merge
  volume1h: number | null;
  volume6h: number | null;
  volume24h: number | null;
  buys1h: number | null;
  sells1h: number | null;
  buys6h: number | null;
  sells6h: number | null;
  buys24h: number | null;
  sells24h: number | null;
  priceChange1h: number | null;   // percent
  priceChange24h: number | null;  // percent

  // Distribution
  holderCount: number | null;
  top10HolderPct: number | null;  // 0-100
  poolCount: number | null;
  largestPoolShare: number | null; // 0-1

  // Lifecycle evidence
  bondingCurveProgress: number | null; // 0-100
  bondingCurveComplete: boolean | null;
  migratedPoolAddress: string | null;
  pairCreatedAt: number | null;        // epoch ms
  hasDexData: boolean | null;
  flaggedRugged: boolean | null;
  mintAuthorityEnabled: boolean | null;
  freezeAuthorityEnabled: boolean | null;

  recentTrades: TradeSample[] | null;
}

export type MarketFieldKey = keyof MarketFields;

export type ObservationFields = { [K in MarketFieldKey]?: MarketFields[K] | undefined };

export interface TokenIdentity {
  symbol?: string;
  name?: string;
}

export interface RawTokenObservation {
  mintAddress: string;
  source: TokenSource;
  observedAt: number;  // epoch ms
  identity?: TokenIdentity;
  fields: ObservationFields;
}

// ============ CANONICAL TOKEN ============

export interface CanonicalToken {
  mintAddress: string;
  symbol: string | null;
  name: string | null;
  identitySource: TokenSource | null;

  firstDiscoveredAt: number;
  updatedAt: number;
  lastSeenAt: number;
  lastActivityAt: number | null;

  status: TokenStatus;
  market: MarketFields;
  fieldObservedAt: Partial<Record<MarketFieldKey, number>>;
  sources: TokenSource[];

  riskScore: number;
  investScore: number;
  manualBlacklist: boolean;

  // Optimistic concurrency counter, owned by the store
  version: number;
}

export interface Snapshot {
  id: string;
  mintAddress: string;
  snapshotTimestamp: number;
  reason: SnapshotReason;
  status: TokenStatus;
  market: MarketFields;
  riskScore: number;
  investScore: number;
}

// ============ SCORING ============

export type AnalyzerKey = 'liquidity' | 'holders' | 'trading_pattern' | 'maturity';

export interface ContributingFactor {
  analyzer: AnalyzerKey;
  value: number;          // 0-1 suspicion
  weight: number;         // normalized weight (sums to 1)
  contribution: number;   // points of the final 0-100 risk score
  neutral: boolean;       // true when the analyzer fell back to its neutral value
  reasons: string[];
}

export interface ScoreResult {
  riskScore: number;
  investScore: number;
  contributingFactors: ContributingFactor[];
}

// ============ MERGE ============

export interface StatusTransition {
  from: TokenStatus;
  to: TokenStatus;
  reason: string;
}

export interface MergeOutcome {
  result: MergeResult;
  token: CanonicalToken;
  previousStatus: TokenStatus | null;
  transitions: StatusTransition[];
  score: ScoreResult;
}

// ============ QUERY ============

export type RangeField =
  | 'priceUsd'
  | 'liquidityUsd'
  | 'marketCap'
  | 'volume1h'
  | 'volume6h'
  | 'volume24h'
  | 'buys1h'
  | 'sells1h'
  | 'buys6h'
  | 'sells6h'
  | 'buys24h'
  | 'sells24h'
  | 'priceChange1h'
  | 'priceChange24h'
  | 'holderCount'
  | 'top10HolderPct'
  | 'poolCount'
  | 'largestPoolShare'
  | 'bondingCurveProgress'
  | 'riskScore'
  | 'investScore';

export interface NumericRange {
  min?: number;
  max?: number;
}

export type SortField = RangeField | 'ageHours' | 'firstDiscoveredAt' | 'updatedAt' | 'symbol';

export interface TokenFilters {
  statuses?: TokenStatus[];
  ranges?: Partial<Record<RangeField, NumericRange>>;
  ageHours?: NumericRange;
  symbol?: string;
}

export interface TokenQuery extends TokenFilters {
  sortBy?: SortField;
  sortDirection?: 'asc' | 'desc';
  limit?: number;
  offset?: number;
  now?: number;
}

// ============ PIPELINE ============

export interface ScanError {
  source: TokenSource;
  code: string;
  message: string;
}

export interface ScanSummary {
  newCount: number;
  updatedCount: number;
  unchangedCount: number;
  malformedCount: number;
  errors: ScanError[];
  rateLimited: TokenSource[];
  startedAt: number;
  finishedAt: number;
}

export type TokenLookup =
  | { state: 'found'; token: CanonicalToken; ageHours: number; failingSources: TokenSource[] }
  | { state: 'not_found'; mintAddress: string }
  | { state: 'cold_start' };

export type TokenQueryResult =
  | { state: 'ok'; tokens: CanonicalToken[] }
  | { state: 'degraded'; tokens: CanonicalToken[]; failingSources: TokenSource[] }
  | { state: 'cold_start' };

export interface SourceHealth {
  source: TokenSource;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  consecutiveFailures: number;
  backoffUntil: number | null;
  lastError: string | null;
}

export interface HealthReport {
  status: 'ok' | 'degraded' | 'unhealthy';
  sources: SourceHealth[];
  store: { consecutiveFailures: number; lastError: string | null };
  queue: { pending: number; active: number; closed: boolean };
  tokens: number;
}

// ============ CONFIG TYPES ============

export interface SourceConfig {
  enabled: boolean;
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  intervalMs: number;
  pageLimit: number;
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export interface ScoringWeights {
  liquidity: number;
  holders: number;
  tradingPattern: number;
  maturity: number;
}

export interface ScoringConfig {
  weights: ScoringWeights;
  blacklistThreshold: number;
  investableThreshold: number;
  veryLowLiquidityUsd: number;
  minLiquidityUsd: number;
  healthyLiquidityUsd: number;
  minSampleCount: number;
  youngAgeHours: number;
  historyWindowHours: number;
}

export interface AppConfig {
  databaseUrl: string | null;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

  sources: {
    dexscreener: SourceConfig;
    raydium: SourceConfig;
    jupiter: SourceConfig;
    pumpfun: SourceConfig;
  };

  enrichment: {
    solanaRpcUrl: string;
    rpcTimeoutMs: number;
    holdersEnabled: boolean;
    tradesEnabled: boolean;
    holderTtlMs: number;
    tradeTtlMs: number;
    rugcheckEnabled: boolean;
    rugcheckBaseUrl: string;
    rugcheckTimeoutMs: number;
    rugcheckTtlMs: number;
  };

  retry: RetryConfig;

  cache: {
    maxEntries: number;
    sweepIntervalMs: number;
  };

  queue: {
    capacity: number;
    workers: number;
  };

  // Adapters skip items created before now - scanLookbackHours
  scanLookbackHours: number;

  scoring: ScoringConfig;

  lifecycle: {
    staleAfterDays: number;
    terminationWindowHours: number;
    cronSchedule: string;
  };

  snapshots: {
    periodicIntervalMs: number;
    changeThreshold: number;
  };

  telegramBotToken: string;
  telegramChatId: string;
  healthPort: number;
  storeFailureThreshold: number;
}
