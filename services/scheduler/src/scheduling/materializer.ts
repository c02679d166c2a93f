import {
  insertFlowRunsIgnoringConflicts,
  insertInitialFlowRunStates,
  linkFlowRunStates,
  selectStatelessFlowRunIds,
  selectUnlinkedFlowRunIds
} from '../db/flowRuns';
import type { SchedulerStore } from '../db/store';
import type { FlowRunSpec } from '../db/types';

function dedupeById(candidates: readonly FlowRunSpec[]): FlowRunSpec[] {
  const seen = new Set<string>();
  const unique: FlowRunSpec[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.id)) {
      continue;
    }
    seen.add(candidate.id);
    unique.push(candidate);
  }
  return unique;
}

/**
 * Persists candidate runs exactly once and returns the ones this call created.
 *
 * Rows are inserted with conflicts on `(flow_id, idempotency_key)` ignored. Which rows are new is
 * then read back rather than taken from the insert: a submitted run with no state row at all was
 * inserted by this call, or left behind by an attempt that failed before writing states. Each of
 * those gets its `SCHEDULED` state, and every submitted run whose `state_id` is still null is
 * pointed at its own state through the store's link strategy. A concurrent caller that writes the
 * same state first takes the run; it is not returned here.
 *
 * There is no transaction around the batch. If any step fails, calling again with the same
 * candidates finishes the job.
 */
export async function insertScheduledFlowRuns(
  store: SchedulerStore,
  candidates: readonly FlowRunSpec[]
): Promise<FlowRunSpec[]> {
  if (candidates.length === 0) {
    return [];
  }

  const { executor, linkStrategy, insertBatchSize } = store;
  const unique = dedupeById(candidates);
  const submittedIds = unique.map((candidate) => candidate.id);

  await insertFlowRunsIgnoringConflicts(executor, unique, insertBatchSize);

  const stateless = await selectStatelessFlowRunIds(executor, submittedIds, insertBatchSize);
  const pending = unique.filter((candidate) => stateless.has(candidate.id));
  const written =
    pending.length > 0 ? await insertInitialFlowRunStates(executor, pending, insertBatchSize) : new Set<string>();
  const created = pending.filter((candidate) => written.has(candidate.id));

  const unlinked = await selectUnlinkedFlowRunIds(executor, submittedIds, insertBatchSize);
  const stateIds = unique.filter((candidate) => unlinked.has(candidate.id)).map((candidate) => candidate.state.id);
  if (stateIds.length > 0) {
    await linkFlowRunStates(executor, linkStrategy, stateIds, insertBatchSize);
  }

  return created;
}
