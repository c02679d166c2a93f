import { getSchedulerConfig } from './config/scheduler';
import { readDeployments } from './db/deployments';
import type { SchedulerStore } from './db/store';
import { logger } from './observability/logger';
import { normalizeMeta } from './observability/meta';
import { recordSchedulerEvent } from './observability/metrics';
import { scheduleRuns } from './scheduling/scheduleRuns';

export type DeploymentSchedulerOptions = {
  store: SchedulerStore;
  intervalMs?: number;
  batchSize?: number;
  maxRuns?: number;
  lookaheadMs?: number;
};

export type DeploymentSchedulerPassResult = {
  deployments: number;
  runsCreated: number;
  failures: number;
};

export type DeploymentSchedulerHandle = {
  stop(): Promise<void>;
};

function log(message: string, meta?: Record<string, unknown>) {
  logger.info(message, normalizeMeta(meta));
}

function logError(message: string, meta?: Record<string, unknown>) {
  logger.error(message, normalizeMeta(meta));
}

/**
 * One pass over every deployment, a page at a time. A deployment that fails is counted and
 * skipped; the pass carries on with the next one.
 */
export async function processDeploymentSchedules(
  store: SchedulerStore,
  {
    batchSize,
    maxRuns,
    lookaheadMs,
    now = new Date()
  }: { batchSize: number; maxRuns: number; lookaheadMs: number; now?: Date }
): Promise<DeploymentSchedulerPassResult> {
  const result: DeploymentSchedulerPassResult = { deployments: 0, runsCreated: 0, failures: 0 };
  const endTime = new Date(now.getTime() + lookaheadMs);

  for (let offset = 0; ; offset += batchSize) {
    const page = await readDeployments(store, { offset, limit: batchSize });
    for (const deployment of page) {
      if (!deployment.schedules.some((schedule) => schedule.isActive)) {
        continue;
      }
      result.deployments += 1;
      try {
        const created = await scheduleRuns(store, deployment.id, { startTime: now, endTime, maxRuns });
        result.runsCreated += created.length;
      } catch {
        // scheduleRuns has already logged and counted the failure
        result.failures += 1;
      }
    }
    if (page.length < batchSize) {
      break;
    }
  }

  return result;
}

export function startDeploymentScheduler(options: DeploymentSchedulerOptions): DeploymentSchedulerHandle {
  const defaults = getSchedulerConfig();
  const { store } = options;
  const interval = Math.max(options.intervalMs ?? defaults.service.intervalMs, 500);
  const boundedBatch = Math.min(Math.max(options.batchSize ?? defaults.service.batchSize, 1), 1_000);
  const maxRuns = Math.max(options.maxRuns ?? defaults.defaults.maxRuns, 0);
  const lookaheadMs = Math.max(options.lookaheadMs ?? defaults.defaults.lookaheadMs, 0);

  let stopped = false;
  let inFlight: Promise<void> | null = null;
  let timer: NodeJS.Timeout | null = null;

  const runTick = async () => {
    recordSchedulerEvent('tick_started');
    try {
      const pass = await processDeploymentSchedules(store, { batchSize: boundedBatch, maxRuns, lookaheadMs });
      recordSchedulerEvent('tick_completed', { ...pass });
      if (pass.runsCreated > 0 || pass.failures > 0) {
        log('Deployment scheduler pass finished', { ...pass });
      }
    } catch (err) {
      recordSchedulerEvent('tick_failed', { error: err });
      logError('Deployment scheduler iteration failed', { error: err });
    }
  };

  const tick = () => {
    if (stopped || inFlight) {
      return;
    }
    inFlight = runTick().finally(() => {
      inFlight = null;
    });
  };

  timer = setInterval(tick, interval);
  tick();

  log('Deployment scheduler started', { intervalMs: interval, batchSize: boundedBatch, maxRuns, lookaheadMs });

  return {
    async stop() {
      stopped = true;
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      if (inFlight) {
        await inFlight;
      }
    }
  };
}
