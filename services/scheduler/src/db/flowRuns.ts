import { chunk, rowsPerStatement, SqlParamList, type SqlExecutor } from './executor';
import type { LinkStrategy } from './linkStrategies';
import { mapFlowRunRow, mapFlowRunStateRow } from './rowMappers';
import type { FlowRunIdRow, FlowRunRow, FlowRunStateRow, IdRow } from './rowTypes';
import type { SchedulerStore } from './store';
import type { FlowRunRecord, FlowRunSpec, FlowRunStateRecord, ListOptions } from './types';

const FLOW_RUN_COLUMNS = `id,
       flow_id,
       deployment_id,
       parameters,
       idempotency_key,
       tags,
       flow_run_details,
       state_id,
       created_at,
       updated_at`;

const FLOW_RUN_STATE_COLUMNS = `id,
       flow_run_id,
       type,
       message,
       state_details,
       created_at`;

const FLOW_RUN_INSERT_BINDS = 9;
const FLOW_RUN_STATE_INSERT_BINDS = 6;

/**
 * Inserts runs, silently skipping any whose `(flow_id, idempotency_key)` already exists.
 * Returns the engine's affected-row total, which callers must not rely on to tell which rows
 * were new.
 */
export async function insertFlowRunsIgnoringConflicts(
  executor: SqlExecutor,
  specs: readonly FlowRunSpec[],
  batchSize: number
): Promise<number> {
  let inserted = 0;
  for (const batch of chunk(specs, rowsPerStatement(executor.dialect, FLOW_RUN_INSERT_BINDS, batchSize))) {
    const now = new Date().toISOString();
    const params = new SqlParamList(executor.dialect);
    const rows = batch.map(
      (spec) =>
        `(${[
          params.add(spec.id),
          params.add(spec.flowId),
          params.add(spec.deploymentId),
          params.addJson(spec.parameters),
          params.add(spec.idempotencyKey),
          params.addJson(spec.tags),
          params.addJson(spec.flowRunDetails),
          params.add(now),
          params.add(now)
        ].join(', ')})`
    );
    inserted += await executor.execute(
      `INSERT INTO flow_runs (id, flow_id, deployment_id, parameters, idempotency_key, tags, flow_run_details, created_at, updated_at)
       VALUES ${rows.join(',\n              ')}
       ON CONFLICT (flow_id, idempotency_key) DO NOTHING`,
      params.values
    );
  }
  return inserted;
}

/** Of the given run ids, those with no state row at all. */
export async function selectStatelessFlowRunIds(
  executor: SqlExecutor,
  flowRunIds: readonly string[],
  batchSize: number
): Promise<Set<string>> {
  const stateless = new Set<string>();
  for (const batch of chunk(flowRunIds, rowsPerStatement(executor.dialect, 1, batchSize))) {
    const params = new SqlParamList(executor.dialect);
    const rows = await executor.query<IdRow>(
      `SELECT flow_runs.id AS id
         FROM flow_runs
         LEFT JOIN flow_run_states ON flow_run_states.flow_run_id = flow_runs.id
        WHERE flow_runs.id IN (${params.addList(batch)})
          AND flow_run_states.id IS NULL`,
      params.values
    );
    for (const row of rows) {
      stateless.add(row.id);
    }
  }
  return stateless;
}

/** Of the given run ids, those whose `state_id` is still unset. */
export async function selectUnlinkedFlowRunIds(
  executor: SqlExecutor,
  flowRunIds: readonly string[],
  batchSize: number
): Promise<Set<string>> {
  const unlinked = new Set<string>();
  for (const batch of chunk(flowRunIds, rowsPerStatement(executor.dialect, 1, batchSize))) {
    const params = new SqlParamList(executor.dialect);
    const rows = await executor.query<IdRow>(
      `SELECT id
         FROM flow_runs
        WHERE id IN (${params.addList(batch)})
          AND state_id IS NULL`,
      params.values
    );
    for (const row of rows) {
      unlinked.add(row.id);
    }
  }
  return unlinked;
}

/**
 * Inserts each spec's initial state and returns the ids of the runs whose state this call wrote.
 * State ids derive from run ids, so a state another caller already wrote is skipped rather than
 * duplicated.
 */
export async function insertInitialFlowRunStates(
  executor: SqlExecutor,
  specs: readonly FlowRunSpec[],
  batchSize: number
): Promise<Set<string>> {
  const written = new Set<string>();
  for (const batch of chunk(specs, rowsPerStatement(executor.dialect, FLOW_RUN_STATE_INSERT_BINDS, batchSize))) {
    const now = new Date().toISOString();
    const params = new SqlParamList(executor.dialect);
    const rows = batch.map(
      (spec) =>
        `(${[
          params.add(spec.state.id),
          params.add(spec.id),
          params.add(spec.state.type),
          params.add(spec.state.message),
          params.addJson(spec.state.stateDetails),
          params.add(now)
        ].join(', ')})`
    );
    const inserted = await executor.query<FlowRunIdRow>(
      `INSERT INTO flow_run_states (id, flow_run_id, type, message, state_details, created_at)
       VALUES ${rows.join(',\n              ')}
       ON CONFLICT (id) DO NOTHING
       RETURNING flow_run_id`,
      params.values
    );
    for (const row of inserted) {
      written.add(row.flow_run_id);
    }
  }
  return written;
}

export async function linkFlowRunStates(
  executor: SqlExecutor,
  strategy: LinkStrategy,
  stateIds: readonly string[],
  batchSize: number
): Promise<number> {
  let linked = 0;
  for (const batch of chunk(stateIds, rowsPerStatement(executor.dialect, strategy.bindsPerStateId, batchSize))) {
    const { sql, params } = strategy.buildLinkStatement(executor.dialect, batch);
    linked += await executor.execute(sql, params);
  }
  return linked;
}

export async function readFlowRun(store: SchedulerStore, flowRunId: string): Promise<FlowRunRecord | null> {
  const { executor } = store;
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<FlowRunRow>(
    `SELECT ${FLOW_RUN_COLUMNS}
       FROM flow_runs
      WHERE id = ${params.add(flowRunId)}`,
    params.values
  );
  const row = rows[0];
  return row ? mapFlowRunRow(row) : null;
}

/** Runs of one deployment, grouped by schedule with the earliest occurrence first. */
export async function readFlowRunsForDeployment(
  store: SchedulerStore,
  deploymentId: string,
  { offset = 0, limit = 200 }: ListOptions = {}
): Promise<FlowRunRecord[]> {
  const { executor } = store;
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<FlowRunRow>(
    `SELECT ${FLOW_RUN_COLUMNS}
       FROM flow_runs
      WHERE deployment_id = ${params.add(deploymentId)}
      ORDER BY idempotency_key ASC, id ASC
      LIMIT ${params.add(Math.max(0, Math.trunc(limit)))}
     OFFSET ${params.add(Math.max(0, Math.trunc(offset)))}`,
    params.values
  );
  return rows.map(mapFlowRunRow);
}

export async function readFlowRunStates(store: SchedulerStore, flowRunId: string): Promise<FlowRunStateRecord[]> {
  const { executor } = store;
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<FlowRunStateRow>(
    `SELECT ${FLOW_RUN_STATE_COLUMNS}
       FROM flow_run_states
      WHERE flow_run_id = ${params.add(flowRunId)}
      ORDER BY created_at ASC, id ASC`,
    params.values
  );
  return rows.map(mapFlowRunStateRow);
}
