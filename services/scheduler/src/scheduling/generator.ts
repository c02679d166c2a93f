import { createClock } from '../clocks';
import { getSchedulerConfig, type SchedulerRuntimeConfig } from '../config/scheduler';
import { readDeployment } from '../db/deployments';
import type { SchedulerStore } from '../db/store';
import type { DeploymentRecord, DeploymentScheduleRecord, FlowRunSpec } from '../db/types';
import { DeploymentNotFoundError, ScheduleWindowError } from '../errors';
import {
  AUTO_SCHEDULED_TAG,
  buildScheduledIdempotencyKey,
  deriveFlowRunId,
  deriveInitialStateId
} from './identity';

export const SCHEDULED_STATE_MESSAGE = 'Flow run scheduled';

export type ScheduleWindowOptions = {
  startTime?: Date;
  endTime?: Date;
  maxRuns?: number;
};

export type ScheduleWindow = {
  startTime: Date;
  endTime: Date;
  maxRuns: number;
};

/**
 * Fills in whichever of start, end and maxRuns the caller left out. Each default is applied on
 * its own, so an explicit end with no start still starts now.
 */
export function resolveScheduleWindow(
  options: ScheduleWindowOptions = {},
  defaults: SchedulerRuntimeConfig['defaults'] = getSchedulerConfig().defaults
): ScheduleWindow {
  const startTime = options.startTime ?? new Date();
  if (Number.isNaN(startTime.getTime())) {
    throw new ScheduleWindowError('startTime must be a valid date');
  }
  const endTime = options.endTime ?? new Date(startTime.getTime() + defaults.lookaheadMs);
  if (Number.isNaN(endTime.getTime())) {
    throw new ScheduleWindowError('endTime must be a valid date');
  }
  if (endTime.getTime() < startTime.getTime()) {
    throw new ScheduleWindowError(
      `endTime ${endTime.toISOString()} is before startTime ${startTime.toISOString()}`
    );
  }
  const maxRuns = options.maxRuns ?? defaults.maxRuns;
  if (!Number.isInteger(maxRuns) || maxRuns < 0) {
    throw new ScheduleWindowError(`maxRuns must be a non-negative integer, received ${maxRuns}`);
  }
  return { startTime, endTime, maxRuns };
}

export function buildScheduledFlowRunSpec(
  deployment: Pick<DeploymentRecord, 'id' | 'flowId'>,
  schedule: Pick<DeploymentScheduleRecord, 'id' | 'parameters'>,
  occurrence: Date
): FlowRunSpec {
  const idempotencyKey = buildScheduledIdempotencyKey(schedule.id, occurrence);
  const id = deriveFlowRunId(deployment.flowId, idempotencyKey);
  return {
    id,
    flowId: deployment.flowId,
    deploymentId: deployment.id,
    parameters: { ...schedule.parameters },
    idempotencyKey,
    tags: [AUTO_SCHEDULED_TAG],
    flowRunDetails: {
      scheduleId: schedule.id,
      autoScheduled: true
    },
    state: {
      id: deriveInitialStateId(id, 'SCHEDULED'),
      type: 'SCHEDULED',
      message: SCHEDULED_STATE_MESSAGE,
      stateDetails: {
        scheduledTime: occurrence.toISOString(),
        autoScheduled: true,
        scheduleId: schedule.id
      }
    }
  };
}

/**
 * Expands every active schedule of a deployment into candidate runs for the window. `maxRuns`
 * caps each schedule separately, and two schedules landing on the same instant both produce a
 * candidate. Nothing is written.
 */
export async function generateScheduledFlowRuns(
  store: SchedulerStore,
  deploymentId: string,
  options: ScheduleWindowOptions = {}
): Promise<FlowRunSpec[]> {
  const deployment = await readDeployment(store, deploymentId);
  if (!deployment) {
    throw new DeploymentNotFoundError(deploymentId);
  }

  const window = resolveScheduleWindow(options);
  const candidates: FlowRunSpec[] = [];
  for (const schedule of deployment.schedules) {
    if (!schedule.isActive) {
      continue;
    }
    const dates = await createClock(schedule.clock).getDates(window.maxRuns, window.startTime, window.endTime);
    for (const occurrence of dates) {
      candidates.push(buildScheduledFlowRunSpec(deployment, schedule, occurrence));
    }
  }
  return candidates;
}
