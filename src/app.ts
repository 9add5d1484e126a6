// ===========================================
// TOKEN RADAR - COMPOSITION ROOT
// ===========================================

import { CronJob } from 'cron';
import { logger } from './utils/logger.js';
import { TtlCache } from './utils/ttl-cache.js';
import { createSourceAdapters } from './modules/sources/index.js';
import { createTokenStore, MonitoredTokenStore } from './modules/store/index.js';
import { createEnrichers, type EnrichmentResult } from './modules/enrichment/index.js';
import { createNotificationSink } from './modules/notifications/index.js';
import { RiskScoringEngine } from './modules/scoring/index.js';
import { MergeEngine } from './modules/merge/merge-engine.js';
import { DiscoveryPipeline } from './modules/pipeline/index.js';
import { HealthServer } from './modules/health/health-server.js';
import type { AppConfig } from './types/index.js';

export class TokenRadar {
  readonly pipeline: DiscoveryPipeline;
  private readonly store: MonitoredTokenStore;
  private readonly healthServer: HealthServer;
  private lifecycleJob: CronJob | null = null;
  private isRunning = false;

  constructor(private readonly config: AppConfig) {
    const { adapters, pumpfun } = createSourceAdapters(config);
    const cache = new TtlCache<EnrichmentResult>({
      maxSize: config.cache.maxEntries,
      sweepIntervalMs: config.cache.sweepIntervalMs,
    });
    const scorer = new RiskScoringEngine(config.scoring);

    this.store = new MonitoredTokenStore(createTokenStore(config.databaseUrl));

    const engine = new MergeEngine(this.store, scorer, createNotificationSink(config), {
      changeThreshold: config.snapshots.changeThreshold,
    });

    this.pipeline = new DiscoveryPipeline({
      config,
      store: this.store,
      adapters,
      engine,
      scorer,
      enrichers: createEnrichers(config, cache, pumpfun),
      cache,
    });

    this.healthServer = new HealthServer(this.pipeline);

    logger.info({
      sources: adapters.map(a => a.source),
      persistence: config.databaseUrl ? 'postgres' : 'memory',
    }, 'Token radar assembled');
  }

  async initialize(): Promise<void> {
    logger.info('Initializing token store...');
    await this.store.init();
  }

  start(): void {
    if (this.isRunning) {
      logger.warn('Token radar already running');
      return;
    }
    this.isRunning = true;

    this.pipeline.start();
    this.healthServer.start(this.config.healthPort);

    this.lifecycleJob = new CronJob(
      this.config.lifecycle.cronSchedule,
      async () => {
        await this.runLifecycleJobs();
      },
      null,
      true,
      'UTC'
    );

    logger.info({
      schedule: this.config.lifecycle.cronSchedule,
      nextRun: this.lifecycleJob.nextDate().toISO(),
    }, 'Lifecycle jobs scheduled');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.isRunning = false;

    this.lifecycleJob?.stop();
    this.lifecycleJob = null;

    await this.pipeline.stop();
    await this.healthServer.stop();
    await this.store.close();
  }

  private async runLifecycleJobs(): Promise<void> {
    try {
      await this.pipeline.runLifecycleSweep();
      await this.pipeline.capturePeriodicSnapshots();
    } catch (error) {
      logger.error({ err: error }, 'Lifecycle jobs failed');
    }
  }
}
