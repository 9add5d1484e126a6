// ===========================================
// OPERATOR HEALTH ENDPOINT
// ===========================================

import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { logger } from '../../utils/logger.js';
import type { HealthReport } from '../../types/index.js';

export interface HealthSource {
  health(): Promise<HealthReport>;
}

export function healthStatusCode(report: HealthReport): number {
  return report.status === 'unhealthy' ? 503 : 200;
}

export function createHealthApp(source: HealthSource, startedAt: number = Date.now()): Express {
  const app = express();

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const report = await source.health();
      res.status(healthStatusCode(report)).json({ ...report, uptime: Date.now() - startedAt });
    } catch (error) {
      logger.error({ err: error }, 'Health check failed');
      res.status(503).json({ status: 'unhealthy', error: String(error) });
    }
  });

  app.get('/', (_req: Request, res: Response) => {
    res.status(200).json({ name: 'token-radar', status: 'running' });
  });

  return app;
}

export class HealthServer {
  private server: Server | null = null;

  constructor(private readonly source: HealthSource) {}

  start(port: number): void {
    if (this.server) return;

    this.server = createHealthApp(this.source).listen(port, '0.0.0.0', () => {
      logger.info({ port }, 'Health server listening');
    });

    this.server.on('error', (error) => {
      logger.error({ err: error, port }, 'Health server error');
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('Health server stopped');
  }
}
