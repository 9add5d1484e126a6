// ===========================================
// DISCOVERY PIPELINE
// Adapters -> bounded queue -> merge engine -> store, plus the read facade
// ===========================================

import { logger, shortMint } from '../../utils/logger.js';
import { ConfigError, PipelineError, QueueClosed, RateLimited, errorMessage } from '../../utils/errors.js';
import { WorkQueue } from './work-queue.js';
import { Scheduler, type ScheduledTask } from './scheduler.js';
import { buildPresets, type PresetName } from './presets.js';
import { ageHours, MAX_QUERY_LIMIT } from '../store/query.js';
import { SnapshotReason, TokenSource, TokenStatus } from '../../types/index.js';
import type { TtlCache } from '../../utils/ttl-cache.js';
import type { MonitoredTokenStore } from '../store/monitored-store.js';
import type { MergeEngine } from '../merge/merge-engine.js';
import type { RiskScoringEngine } from '../scoring/risk-engine.js';
import type { SourceAdapter } from '../sources/base-adapter.js';
import type { Enricher, EnrichmentResult } from '../enrichment/types.js';
import type {
  AppConfig,
  CanonicalToken,
  HealthReport,
  MergeOutcome,
  MergeResult,
  RawTokenObservation,
  ScanError,
  ScanSummary,
  ScoreResult,
  Snapshot,
  SourceConfig,
  SourceHealth,
  TokenLookup,
  TokenQuery,
  TokenQueryResult,
} from '../../types/index.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// ============ TYPES ============

interface WorkItem {
  observation: RawTokenObservation;
  settle: (result: MergeResult | 'failed') => void;
}

interface ScanTally {
  newCount: number;
  updatedCount: number;
  unchangedCount: number;
  malformedCount: number;
  errors: ScanError[];
  rateLimited: TokenSource[];
}

export interface SweepResult {
  archived: number;
  terminated: number;
}

export interface PipelineDeps {
  config: AppConfig;
  store: MonitoredTokenStore;
  adapters: SourceAdapter[];
  engine: MergeEngine;
  scorer: RiskScoringEngine;
  enrichers: Enricher[];
  cache: TtlCache<EnrichmentResult>;
  now?: () => number;
}

const emptyTally = (): ScanTally => ({
  newCount: 0,
  updatedCount: 0,
  unchangedCount: 0,
  malformedCount: 0,
  errors: [],
  rateLimited: [],
});

// Statuses the lifecycle jobs still look at
const LIVE_STATUSES: TokenStatus[] = [
  TokenStatus.CREATED,
  TokenStatus.NO_DEX_DATA,
  TokenStatus.ACTIVE,
  TokenStatus.COMPLETED,
  TokenStatus.MIGRATED,
];

const TERMINABLE: ReadonlySet<TokenStatus> = new Set([
  TokenStatus.CREATED,
  TokenStatus.ACTIVE,
  TokenStatus.NO_DEX_DATA,
]);

export function sourceConfigFor(config: AppConfig, source: TokenSource): SourceConfig {
  switch (source) {
    case TokenSource.DEXSCREENER:
      return config.sources.dexscreener;
    case TokenSource.RAYDIUM:
      return config.sources.raydium;
    case TokenSource.JUPITER:
      return config.sources.jupiter;
    case TokenSource.PUMPFUN:
      return config.sources.pumpfun;
    default:
      throw new ConfigError(`No polling configuration for source ${source}`);
  }
}

// ============ PIPELINE ============

export class DiscoveryPipeline {
  private readonly config: AppConfig;
  private readonly store: MonitoredTokenStore;
  private readonly adapters: SourceAdapter[];
  private readonly engine: MergeEngine;
  private readonly scorer: RiskScoringEngine;
  private readonly enrichers: Enricher[];
  private readonly cache: TtlCache<EnrichmentResult>;
  private readonly now: () => number;

  private readonly queue: WorkQueue<WorkItem>;
  private readonly scheduler = new Scheduler();
  private readonly sourceHealth: Map<TokenSource, SourceHealth> = new Map();
  private readonly presets: Record<PresetName, Omit<TokenQuery, 'limit' | 'offset' | 'now'>>;
  private completedScans = 0;

  constructor(deps: PipelineDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.adapters = deps.adapters;
    this.engine = deps.engine;
    this.scorer = deps.scorer;
    this.enrichers = deps.enrichers;
    this.cache = deps.cache;
    this.now = deps.now ?? Date.now;

    this.queue = new WorkQueue(item => this.process(item), deps.config.queue);
    this.presets = buildPresets(deps.config.scoring);

    for (const adapter of this.adapters) {
      this.sourceHealth.set(adapter.source, {
        source: adapter.source,
        lastSuccessAt: null,
        lastFailureAt: null,
        consecutiveFailures: 0,
        backoffUntil: null,
        lastError: null,
      });
    }
  }

  // ============ LIFECYCLE ============

  start(): void {
    this.cache.startSweeper();
    this.scheduler.start(this.adapters.map(adapter => this.scanTask(adapter)));
  }

  /**
   * Stop polling, refuse new work, finish accepted work, release the cache.
   * The store is closed by its owner.
   */
  async stop(): Promise<void> {
    this.scheduler.stop();
    this.queue.close();
    await this.scheduler.idle();
    await this.queue.drain();
    this.cache.dispose();
    logger.info('Discovery pipeline stopped');
  }

  private scanTask(adapter: SourceAdapter): ScheduledTask {
    const sourceConfig = sourceConfigFor(this.config, adapter.source);
    return {
      name: adapter.source,
      intervalMs: sourceConfig.intervalMs,
      run: async () => {
        const tally = emptyTally();
        await this.scanSource(adapter, tally);
        this.completedScans++;
        logger.info({ source: adapter.source, ...tally }, 'Source scan complete');
      },
      nextDelayMs: () => {
        const until = this.sourceHealth.get(adapter.source)?.backoffUntil ?? null;
        return until !== null ? until - this.now() : null;
      },
    };
  }

  // ============ SCANNING ============

  /**
   * Poll every adapter once and wait for the results to be merged.
   */
  async scanAllSources(): Promise<ScanSummary> {
    const startedAt = this.now();
    const tally = emptyTally();

    await Promise.all(this.adapters.map(adapter => this.scanSource(adapter, tally)));
    this.completedScans++;

    const summary: ScanSummary = { ...tally, startedAt, finishedAt: this.now() };
    logger.info({
      newCount: summary.newCount,
      updatedCount: summary.updatedCount,
      unchangedCount: summary.unchangedCount,
      malformedCount: summary.malformedCount,
      errors: summary.errors.length,
      rateLimited: summary.rateLimited,
    }, 'Scan complete');
    return summary;
  }

  private async scanSource(adapter: SourceAdapter, tally: ScanTally): Promise<void> {
    const { source } = adapter;
    const health = this.healthFor(source);
    const now = this.now();

    if (health.backoffUntil !== null && health.backoffUntil > now) {
      logger.debug({ source, backoffUntil: health.backoffUntil }, 'Source backing off, skipping');
      tally.rateLimited.push(source);
      return;
    }

    const sourceConfig = sourceConfigFor(this.config, source);
    const since = now - this.config.scanLookbackHours * HOUR_MS;

    let observations: RawTokenObservation[];
    try {
      const batch = await adapter.fetchBatch(since, sourceConfig.pageLimit);
      observations = batch.observations;
      tally.malformedCount += batch.malformed;
      health.lastSuccessAt = this.now();
      health.consecutiveFailures = 0;
      health.backoffUntil = null;
      health.lastError = null;
    } catch (error) {
      this.recordSourceFailure(health, error, sourceConfig.intervalMs, tally);
      return;
    }

    const completions: Array<Promise<MergeResult | 'failed'>> = [];
    for (const observation of observations) {
      let settle: WorkItem['settle'] = () => undefined;
      const completion = new Promise<MergeResult | 'failed'>(resolve => {
        settle = resolve;
      });

      try {
        await this.queue.submit({ observation, settle });
      } catch (error) {
        if (error instanceof QueueClosed) {
          logger.info({ source, dropped: observations.length - completions.length }, 'Queue closed, scan stopped');
          break;
        }
        throw error;
      }
      completions.push(completion);
    }

    for (const result of await Promise.all(completions)) {
      if (result === 'created') tally.newCount++;
      else if (result === 'updated') tally.updatedCount++;
      else if (result === 'unchanged') tally.unchangedCount++;
    }
  }

  private recordSourceFailure(health: SourceHealth, error: unknown, intervalMs: number, tally: ScanTally): void {
    const now = this.now();

    if (error instanceof RateLimited) {
      const backoffMs = error.retryAfterMs ?? intervalMs * 2;
      health.backoffUntil = now + backoffMs;
      tally.rateLimited.push(health.source);
      logger.warn({ source: health.source, backoffMs }, 'Source rate limited, backing off');
      return;
    }

    health.lastFailureAt = now;
    health.consecutiveFailures++;
    health.lastError = errorMessage(error);
    tally.errors.push({
      source: health.source,
      code: error instanceof PipelineError ? error.code : 'UNKNOWN',
      message: errorMessage(error),
    });
    logger.warn({ source: health.source, err: error, consecutiveFailures: health.consecutiveFailures }, 'Source scan failed');
  }

  private async process(item: WorkItem): Promise<void> {
    const { observation } = item;
    try {
      const outcome = await this.engine.merge(observation);
      item.settle(outcome.result);
      await this.enrich(outcome);
    } catch (error) {
      item.settle('failed');
      logger.warn({ err: error, mint: shortMint(observation.mintAddress), source: observation.source }, 'Merge failed');
    }
  }

  private async enrich(outcome: MergeOutcome): Promise<void> {
    for (const enricher of this.enrichers) {
      if (!enricher.appliesTo(outcome.token)) continue;
      try {
        const observation = await enricher.enrich(outcome.token);
        if (observation) await this.engine.merge(observation);
      } catch (error) {
        logger.warn({ err: error, enricher: enricher.name, mint: shortMint(outcome.token.mintAddress) }, 'Enrichment failed');
      }
    }
  }

  // ============ READS ============

  async getToken(mintAddress: string): Promise<TokenLookup> {
    const token = await this.store.getToken(mintAddress);
    if (!token) {
      return (await this.isColdStart()) ? { state: 'cold_start' } : { state: 'not_found', mintAddress };
    }

    const failing = new Set(this.failingSources());
    return {
      state: 'found',
      token,
      ageHours: ageHours(token, this.now()),
      failingSources: token.sources.filter(source => failing.has(source)),
    };
  }

  async queryTokens(query: TokenQuery = {}): Promise<TokenQueryResult> {
    if (await this.isColdStart()) return { state: 'cold_start' };

    const tokens = await this.store.query({ ...query, now: query.now ?? this.now() });
    const failingSources = this.failingSources();
    return failingSources.length > 0
      ? { state: 'degraded', tokens, failingSources }
      : { state: 'ok', tokens };
  }

  async queryPreset(name: PresetName, limit?: number, offset?: number): Promise<TokenQueryResult> {
    return this.queryTokens({ ...this.presets[name], limit, offset });
  }

  getHistory(mintAddress: string, since?: number): Promise<Snapshot[]> {
    return this.store.history(mintAddress, since);
  }

  async getRiskReport(mintAddress: string): Promise<ScoreResult | null> {
    const token = await this.store.getToken(mintAddress);
    if (!token) return null;
    const history = await this.store.history(mintAddress);
    return this.scorer.score(token, history, this.now());
  }

  // ============ WRITES ============

  async captureSnapshot(mintAddress: string): Promise<Snapshot | null> {
    const token = await this.store.getToken(mintAddress);
    if (!token) return null;
    return this.store.appendSnapshot(mintAddress, SnapshotReason.MANUAL, this.now());
  }

  confirmBlacklist(mintAddress: string, reason: string): Promise<MergeOutcome | null> {
    logger.info({ mint: shortMint(mintAddress), reason }, 'Manual blacklist confirmation');
    return this.engine.applyStatus(mintAddress, TokenStatus.BLACKLISTED, reason, { manualBlacklist: true });
  }

  /**
   * Archive tokens not seen for the stale window; terminate early-life
   * tokens without activity for the termination window.
   */
  async runLifecycleSweep(now: number = this.now()): Promise<SweepResult> {
    const { staleAfterDays, terminationWindowHours } = this.config.lifecycle;
    const tokens = await this.allTokens([...LIVE_STATUSES, TokenStatus.TERMINATED]);
    const result: SweepResult = { archived: 0, terminated: 0 };

    for (const token of tokens) {
      if (now - token.lastSeenAt >= staleAfterDays * DAY_MS) {
        const outcome = await this.engine.applyStatus(
          token.mintAddress,
          TokenStatus.ARCHIVED,
          `not seen for ${staleAfterDays} days`
        );
        if (outcome?.result === 'updated') result.archived++;
        continue;
      }

      const lastActivity = token.lastActivityAt ?? token.firstDiscoveredAt;
      if (TERMINABLE.has(token.status) && now - lastActivity >= terminationWindowHours * HOUR_MS) {
        const outcome = await this.engine.applyStatus(
          token.mintAddress,
          TokenStatus.TERMINATED,
          `no activity for ${terminationWindowHours}h`
        );
        if (outcome?.result === 'updated') result.terminated++;
      }
    }

    logger.info({ ...result, scanned: tokens.length }, 'Lifecycle sweep complete');
    return result;
  }

  /**
   * Periodic snapshot for every live token whose last snapshot is older
   * than the configured interval.
   */
  async capturePeriodicSnapshots(now: number = this.now()): Promise<number> {
    const tokens = await this.allTokens(LIVE_STATUSES);
    let captured = 0;

    for (const token of tokens) {
      const last = await this.store.lastSnapshot(token.mintAddress);
      if (last && now - last.snapshotTimestamp < this.config.snapshots.periodicIntervalMs) continue;
      await this.store.appendSnapshot(token.mintAddress, SnapshotReason.PERIODIC, now);
      captured++;
    }

    logger.debug({ captured }, 'Periodic snapshots captured');
    return captured;
  }

  // ============ HEALTH ============

  async health(): Promise<HealthReport> {
    let tokens = 0;
    try {
      tokens = await this.store.countTokens();
    } catch (error) {
      logger.warn({ err: error }, 'Token count unavailable for health report');
    }

    const store = this.store.health();
    const sources = [...this.sourceHealth.values()].map(h => ({ ...h }));
    const status: HealthReport['status'] =
      store.consecutiveFailures >= this.config.storeFailureThreshold
        ? 'unhealthy'
        : this.failingSources().length > 0 ? 'degraded' : 'ok';

    return { status, sources, store, queue: this.queue.stats(), tokens };
  }

  // ============ HELPERS ============

  private healthFor(source: TokenSource): SourceHealth {
    let health = this.sourceHealth.get(source);
    if (!health) {
      health = {
        source,
        lastSuccessAt: null,
        lastFailureAt: null,
        consecutiveFailures: 0,
        backoffUntil: null,
        lastError: null,
      };
      this.sourceHealth.set(source, health);
    }
    return health;
  }

  private failingSources(): TokenSource[] {
    const now = this.now();
    return [...this.sourceHealth.values()]
      .filter(h => h.consecutiveFailures > 0 || (h.backoffUntil !== null && h.backoffUntil > now))
      .map(h => h.source);
  }

  private async isColdStart(): Promise<boolean> {
    return this.completedScans === 0 && (await this.store.countTokens()) === 0;
  }

  private async allTokens(statuses: TokenStatus[]): Promise<CanonicalToken[]> {
    const tokens: CanonicalToken[] = [];
    for (let offset = 0; ; offset += MAX_QUERY_LIMIT) {
      const page = await this.store.query({
        statuses,
        sortBy: 'firstDiscoveredAt',
        sortDirection: 'asc',
        limit: MAX_QUERY_LIMIT,
        offset,
      });
      tokens.push(...page);
      if (page.length < MAX_QUERY_LIMIT) break;
    }
    return tokens;
  }
}
