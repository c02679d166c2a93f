import type { SchedulerStore } from '../db/store';
import type { FlowRunSpec } from '../db/types';
import { logger } from '../observability/logger';
import { recordSchedulerEvent } from '../observability/metrics';
import { generateScheduledFlowRuns, type ScheduleWindowOptions } from './generator';
import { insertScheduledFlowRuns } from './materializer';

/**
 * Generates the deployment's upcoming runs for the window and materializes them. Returns only
 * the runs this call created; repeating a call with the same arguments returns nothing.
 */
export async function scheduleRuns(
  store: SchedulerStore,
  deploymentId: string,
  options: ScheduleWindowOptions = {}
): Promise<FlowRunSpec[]> {
  try {
    const candidates = await generateScheduledFlowRuns(store, deploymentId, options);
    const created = await insertScheduledFlowRuns(store, candidates);

    logger.info('Scheduled flow runs for deployment', {
      deploymentId,
      candidates: candidates.length,
      created: created.length,
      linkStrategy: store.linkStrategy.name
    });
    recordSchedulerEvent('deployment_scheduled', {
      deploymentId,
      candidates: candidates.length,
      runs: created.length
    });
    return created;
  } catch (err) {
    logger.error('Failed to schedule flow runs for deployment', { deploymentId, error: err });
    recordSchedulerEvent('deployment_failed', { deploymentId, error: err });
    throw err;
  }
}
