import { v5 as uuidv5 } from 'uuid';

import type { FlowRunStateType } from '../db/types';

// Fixed namespace for name-based run and state ids. Changing it would re-key every stored run.
export const FLOW_RUN_ID_NAMESPACE = '6f1c2b9e-4a37-5d8e-9c41-2e7b3a5d0f18';

export const AUTO_SCHEDULED_TAG = 'auto-scheduled';

export function buildScheduledIdempotencyKey(scheduleId: string, occurrence: Date): string {
  return `scheduled ${scheduleId} ${occurrence.toISOString()}`;
}

/** Same flow and idempotency key always map to the same run id, across processes and retries. */
export function deriveFlowRunId(flowId: string, idempotencyKey: string): string {
  return uuidv5(`flow-run:${flowId}:${idempotencyKey}`, FLOW_RUN_ID_NAMESPACE);
}

export function deriveInitialStateId(flowRunId: string, type: FlowRunStateType): string {
  return uuidv5(`flow-run-state:${flowRunId}:${type}`, FLOW_RUN_ID_NAMESPACE);
}
