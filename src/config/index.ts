// ===========================================
// CONFIGURATION LOADER
// ===========================================

import { config } from 'dotenv';
import { z } from 'zod';
import type { AppConfig, SourceConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

// Load .env file
config();

// Env vars arrive as strings ("true"/"false"), so booleans are parsed explicitly
const flag = (defaultValue: boolean) =>
  z.string().optional().transform(val => (val === undefined || val === '' ? defaultValue : val.toLowerCase() === 'true'));

// Environment validation schema
const envSchema = z.object({
  // Database - optional, the in-memory store is used without it
  DATABASE_URL: z.string().optional().default(''),

  // System
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // DexScreener - DEX pair scanner
  DEXSCREENER_ENABLED: flag(true),
  DEXSCREENER_BASE_URL: z.string().url().default('https://api.dexscreener.com'),
  DEXSCREENER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  DEXSCREENER_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
  DEXSCREENER_PAGE_LIMIT: z.coerce.number().int().positive().default(60),
  DEXSCREENER_RPM: z.coerce.number().int().positive().default(60),

  // Raydium - liquidity pool listing
  RAYDIUM_ENABLED: flag(true),
  RAYDIUM_BASE_URL: z.string().url().default('https://api-v3.raydium.io'),
  RAYDIUM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RAYDIUM_INTERVAL_MS: z.coerce.number().int().positive().default(120000),
  RAYDIUM_PAGE_LIMIT: z.coerce.number().int().positive().default(100),
  RAYDIUM_RPM: z.coerce.number().int().positive().default(30),

  // Jupiter - token registry
  JUPITER_ENABLED: flag(true),
  JUPITER_BASE_URL: z.string().url().default('https://lite-api.jup.ag'),
  JUPITER_API_KEY: z.string().optional().default(''),
  JUPITER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  JUPITER_INTERVAL_MS: z.coerce.number().int().positive().default(120000),
  JUPITER_PAGE_LIMIT: z.coerce.number().int().positive().default(100),
  JUPITER_RPM: z.coerce.number().int().positive().default(30),

  // Pump.fun - bonding curve launches
  PUMPFUN_ENABLED: flag(true),
  PUMPFUN_BASE_URL: z.string().url().default('https://frontend-api-v3.pump.fun'),
  PUMPFUN_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PUMPFUN_INTERVAL_MS: z.coerce.number().int().positive().default(30000),
  PUMPFUN_PAGE_LIMIT: z.coerce.number().int().positive().default(50),
  PUMPFUN_RPM: z.coerce.number().int().positive().default(60),

  SOURCE_MAX_CONCURRENT: z.coerce.number().int().positive().default(2),

  // Enrichment
  SOLANA_RPC_URL: z.string().url().default('https://api.mainnet-beta.solana.com'),
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  HOLDER_ENRICHMENT_ENABLED: flag(true),
  TRADE_ENRICHMENT_ENABLED: flag(true),
  RUGCHECK_ENABLED: flag(true),
  RUGCHECK_BASE_URL: z.string().url().default('https://api.rugcheck.xyz/v1'),
  RUGCHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Retry policy (per adapter call)
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),

  // Cache
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(5000),
  CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(2 * 60 * 1000),
  CACHE_RISK_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),      // 1 hour
  CACHE_MARKET_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),     // 5 minutes

  // Work queue
  QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
  MERGE_WORKERS: z.coerce.number().int().positive().default(4),
  SCAN_LOOKBACK_HOURS: z.coerce.number().positive().default(72),

  // Scoring weights and thresholds
  WEIGHT_LIQUIDITY: z.coerce.number().min(0).default(0.3),
  WEIGHT_HOLDERS: z.coerce.number().min(0).default(0.25),
  WEIGHT_TRADING_PATTERN: z.coerce.number().min(0).default(0.25),
  WEIGHT_MATURITY: z.coerce.number().min(0).default(0.2),
  BLACKLIST_RISK_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  INVESTABLE_THRESHOLD: z.coerce.number().min(0).max(100).default(50),
  VERY_LOW_LIQUIDITY_USD: z.coerce.number().min(0).default(1000),
  MIN_LIQUIDITY_USD: z.coerce.number().min(0).default(5000),
  HEALTHY_LIQUIDITY_USD: z.coerce.number().min(0).default(50000),
  MIN_PATTERN_SAMPLES: z.coerce.number().int().min(1).default(10),
  YOUNG_TOKEN_HOURS: z.coerce.number().min(0).default(6),
  SCORING_HISTORY_HOURS: z.coerce.number().positive().default(24),

  // Lifecycle
  STALE_AFTER_DAYS: z.coerce.number().positive().default(30),
  TERMINATION_WINDOW_HOURS: z.coerce.number().positive().default(24),
  LIFECYCLE_CRON: z.string().default('*/15 * * * *'),

  // Snapshots
  SNAPSHOT_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  SNAPSHOT_CHANGE_THRESHOLD: z.coerce.number().positive().default(0.25),

  // Notifications (optional)
  TELEGRAM_BOT_TOKEN: z.string().optional().default(''),
  TELEGRAM_CHAT_ID: z.string().optional().default(''),

  HEALTH_PORT: z.coerce.number().int().min(0).default(3000),
  STORE_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
});

type Env = z.infer<typeof envSchema>;

function sourceConfig(
  env: Env,
  values: Omit<SourceConfig, 'maxConcurrent' | 'apiKey'> & { apiKey?: string }
): SourceConfig {
  return {
    ...values,
    apiKey: values.apiKey ?? '',
    maxConcurrent: env.SOURCE_MAX_CONCURRENT,
  };
}

/**
 * Parse an environment map into the typed application config.
 * Throws ConfigError on invalid input.
 */
export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', parsed.error.format());
  }

  const env = parsed.data;

  if (env.MIN_LIQUIDITY_USD >= env.HEALTHY_LIQUIDITY_USD) {
    throw new ConfigError('MIN_LIQUIDITY_USD must be below HEALTHY_LIQUIDITY_USD');
  }

  return {
    databaseUrl: env.DATABASE_URL || null,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    sources: {
      dexscreener: sourceConfig(env, {
        enabled: env.DEXSCREENER_ENABLED,
        baseUrl: env.DEXSCREENER_BASE_URL,
        timeoutMs: env.DEXSCREENER_TIMEOUT_MS,
        intervalMs: env.DEXSCREENER_INTERVAL_MS,
        pageLimit: env.DEXSCREENER_PAGE_LIMIT,
        maxRequestsPerMinute: env.DEXSCREENER_RPM,
      }),
      raydium: sourceConfig(env, {
        enabled: env.RAYDIUM_ENABLED,
        baseUrl: env.RAYDIUM_BASE_URL,
        timeoutMs: env.RAYDIUM_TIMEOUT_MS,
        intervalMs: env.RAYDIUM_INTERVAL_MS,
        pageLimit: env.RAYDIUM_PAGE_LIMIT,
        maxRequestsPerMinute: env.RAYDIUM_RPM,
      }),
      jupiter: sourceConfig(env, {
        enabled: env.JUPITER_ENABLED,
        baseUrl: env.JUPITER_BASE_URL,
        apiKey: env.JUPITER_API_KEY,
        timeoutMs: env.JUPITER_TIMEOUT_MS,
        intervalMs: env.JUPITER_INTERVAL_MS,
        pageLimit: env.JUPITER_PAGE_LIMIT,
        maxRequestsPerMinute: env.JUPITER_RPM,
      }),
      pumpfun: sourceConfig(env, {
        enabled: env.PUMPFUN_ENABLED,
        baseUrl: env.PUMPFUN_BASE_URL,
        timeoutMs: env.PUMPFUN_TIMEOUT_MS,
        intervalMs: env.PUMPFUN_INTERVAL_MS,
        pageLimit: env.PUMPFUN_PAGE_LIMIT,
        maxRequestsPerMinute: env.PUMPFUN_RPM,
      }),
    },

    enrichment: {
      solanaRpcUrl: env.SOLANA_RPC_URL,
      rpcTimeoutMs: env.RPC_TIMEOUT_MS,
      holdersEnabled: env.HOLDER_ENRICHMENT_ENABLED,
      tradesEnabled: env.TRADE_ENRICHMENT_ENABLED,
      holderTtlMs: env.CACHE_RISK_TTL_MS,
      tradeTtlMs: env.CACHE_MARKET_TTL_MS,
      rugcheckEnabled: env.RUGCHECK_ENABLED,
      rugcheckBaseUrl: env.RUGCHECK_BASE_URL,
      rugcheckTimeoutMs: env.RUGCHECK_TIMEOUT_MS,
      rugcheckTtlMs: env.CACHE_RISK_TTL_MS,
    },

    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      multiplier: env.RETRY_MULTIPLIER,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },

    cache: {
      maxEntries: env.CACHE_MAX_ENTRIES,
      sweepIntervalMs: env.CACHE_SWEEP_INTERVAL_MS,
    },

    queue: {
      capacity: env.QUEUE_CAPACITY,
      workers: env.MERGE_WORKERS,
    },

    scanLookbackHours: env.SCAN_LOOKBACK_HOURS,

    scoring: {
      weights: {
        liquidity: env.WEIGHT_LIQUIDITY,
        holders: env.WEIGHT_HOLDERS,
        tradingPattern: env.WEIGHT_TRADING_PATTERN,
        maturity: env.WEIGHT_MATURITY,
      },
      blacklistThreshold: env.BLACKLIST_RISK_THRESHOLD,
      investableThreshold: env.INVESTABLE_THRESHOLD,
      veryLowLiquidityUsd: env.VERY_LOW_LIQUIDITY_USD,
      minLiquidityUsd: env.MIN_LIQUIDITY_USD,
      healthyLiquidityUsd: env.HEALTHY_LIQUIDITY_USD,
      minSampleCount: env.MIN_PATTERN_SAMPLES,
      youngAgeHours: env.YOUNG_TOKEN_HOURS,
      historyWindowHours: env.SCORING_HISTORY_HOURS,
    },

    lifecycle: {
      staleAfterDays: env.STALE_AFTER_DAYS,
      terminationWindowHours: env.TERMINATION_WINDOW_HOURS,
      cronSchedule: env.LIFECYCLE_CRON,
    },

    snapshots: {
      periodicIntervalMs: env.SNAPSHOT_INTERVAL_MS,
      changeThreshold: env.SNAPSHOT_CHANGE_THRESHOLD,
    },

    telegramBotToken: env.TELEGRAM_BOT_TOKEN,
    telegramChatId: env.TELEGRAM_CHAT_ID,
    healthPort: env.HEALTH_PORT,
    storeFailureThreshold: env.STORE_FAILURE_THRESHOLD,
  };
}

function loadConfig(): AppConfig {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid environment configuration:');
      console.error(error.details ?? error.message);
      process.exit(1);
    }
    throw error;
  }
}

export const appConfig = loadConfig();
export default appConfig;
