// ===========================================
// TOKEN RADAR - MAIN ENTRY POINT
// ===========================================

import { appConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { TokenRadar } from './app.js';

async function main(): Promise<void> {
  logger.info({ env: appConfig.nodeEnv }, 'Starting token radar...');

  const radar = new TokenRadar(appConfig);
  await radar.initialize();
  radar.start();

  logger.info('Token radar is running! Press Ctrl+C to stop.');

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    try {
      await radar.stop();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// ============ RUN ============

main().catch((error) => {
  logger.error({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
