import { getSchedulerConfig } from './config/scheduler';
import { createSchedulerStore } from './db/store';
import { startDeploymentScheduler } from './deploymentScheduler';
import { logger } from './observability/logger';

async function main() {
  const config = getSchedulerConfig();
  const store = await createSchedulerStore(config);
  const scheduler = startDeploymentScheduler({
    store,
    intervalMs: config.service.intervalMs,
    batchSize: config.service.batchSize,
    maxRuns: config.defaults.maxRuns,
    lookaheadMs: config.defaults.lookaheadMs
  });

  logger.info('Scheduler worker ready', {
    dialect: store.executor.dialect.name,
    linkStrategy: store.linkStrategy.name
  });

  const shutdown = async () => {
    logger.info('Shutdown signal received');
    await scheduler.stop();
    try {
      await store.close();
    } catch (err) {
      logger.error('Failed to close scheduler store', { error: err });
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[scheduler-worker] Worker crashed', err);
    process.exit(1);
  });
}
