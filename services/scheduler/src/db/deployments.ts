import { randomUUID } from 'node:crypto';
import type { z } from 'zod';

import { DeploymentConflictError, DeploymentNotFoundError, ScheduleValidationError } from '../errors';
import { deploymentCreateSchema, deploymentScheduleCreateSchema } from '../zodSchemas';
import { isUniqueViolation, SqlParamList, type SqlExecutor } from './executor';
import { mapDeploymentRow, mapDeploymentScheduleRow } from './rowMappers';
import type { DeploymentRow, DeploymentScheduleRow, IdRow } from './rowTypes';
import type { SchedulerStore } from './store';
import type {
  DeploymentCreateInput,
  DeploymentRecord,
  DeploymentScheduleCreateInput,
  DeploymentScheduleRecord,
  ListOptions
} from './types';

type ParsedSchedule = z.infer<typeof deploymentScheduleCreateSchema>;

const DEPLOYMENT_COLUMNS = 'id, name, flow_id, created_at, updated_at';
const SCHEDULE_COLUMNS = 'id, deployment_id, clock, parameters, is_active, created_at';

async function insertScheduleRow(
  executor: SqlExecutor,
  deploymentId: string,
  schedule: ParsedSchedule,
  createdAt: string
): Promise<string> {
  const id = schedule.id ?? randomUUID();
  const params = new SqlParamList(executor.dialect);
  await executor.execute(
    `INSERT INTO deployment_schedules (id, deployment_id, clock, parameters, is_active, created_at)
     VALUES (${[
       params.add(id),
       params.add(deploymentId),
       params.addJson(schedule.clock),
       params.addJson(schedule.parameters ?? {}),
       params.add(schedule.isActive ?? true),
       params.add(createdAt)
     ].join(', ')})`,
    params.values
  );
  return id;
}

async function touchDeployment(executor: SqlExecutor, deploymentId: string, updatedAt: string): Promise<void> {
  const params = new SqlParamList(executor.dialect);
  await executor.execute(
    `UPDATE deployments SET updated_at = ${params.add(updatedAt)} WHERE id = ${params.add(deploymentId)}`,
    params.values
  );
}

async function fetchSchedules(
  executor: SqlExecutor,
  deploymentIds: readonly string[]
): Promise<Map<string, DeploymentScheduleRow[]>> {
  const grouped = new Map<string, DeploymentScheduleRow[]>();
  if (deploymentIds.length === 0) {
    return grouped;
  }
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<DeploymentScheduleRow>(
    `SELECT ${SCHEDULE_COLUMNS}
       FROM deployment_schedules
      WHERE deployment_id IN (${params.addList(deploymentIds)})
      ORDER BY created_at ASC, id ASC`,
    params.values
  );
  for (const row of rows) {
    const existing = grouped.get(row.deployment_id);
    if (existing) {
      existing.push(row);
    } else {
      grouped.set(row.deployment_id, [row]);
    }
  }
  return grouped;
}

async function deploymentExists(executor: SqlExecutor, deploymentId: string): Promise<boolean> {
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<IdRow>(
    `SELECT id FROM deployments WHERE id = ${params.add(deploymentId)}`,
    params.values
  );
  return rows.length > 0;
}

export async function createDeployment(store: SchedulerStore, input: DeploymentCreateInput): Promise<DeploymentRecord> {
  const parsed = deploymentCreateSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScheduleValidationError('Invalid deployment definition', parsed.error.issues);
  }
  const { name, flowId, schedules = [] } = parsed.data;
  const id = parsed.data.id ?? randomUUID();
  const now = new Date().toISOString();

  try {
    await store.executor.transaction(async (executor) => {
      const lookup = new SqlParamList(executor.dialect);
      const existing = await executor.query<IdRow>(
        `SELECT id FROM deployments WHERE name = ${lookup.add(name)}`,
        lookup.values
      );
      if (existing.length > 0) {
        throw new DeploymentConflictError(`Deployment "${name}" already exists`);
      }

      const params = new SqlParamList(executor.dialect);
      await executor.execute(
        `INSERT INTO deployments (id, name, flow_id, created_at, updated_at)
         VALUES (${[params.add(id), params.add(name), params.add(flowId), params.add(now), params.add(now)].join(', ')})`,
        params.values
      );
      for (const schedule of schedules) {
        await insertScheduleRow(executor, id, schedule, now);
      }
    });
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new DeploymentConflictError(`Deployment "${name}" already exists`);
    }
    throw err;
  }

  const created = await readDeployment(store, id);
  if (!created) {
    throw new Error('failed to create deployment');
  }
  return created;
}

export async function readDeployment(store: SchedulerStore, deploymentId: string): Promise<DeploymentRecord | null> {
  const { executor } = store;
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<DeploymentRow>(
    `SELECT ${DEPLOYMENT_COLUMNS} FROM deployments WHERE id = ${params.add(deploymentId)}`,
    params.values
  );
  const row = rows[0];
  if (!row) {
    return null;
  }
  const schedules = await fetchSchedules(executor, [row.id]);
  return mapDeploymentRow(row, schedules.get(row.id) ?? []);
}

/** A page of deployments ordered by id, for stable iteration by the periodic scheduler. */
export async function readDeployments(
  store: SchedulerStore,
  { offset = 0, limit = 100 }: ListOptions = {}
): Promise<DeploymentRecord[]> {
  const { executor } = store;
  const params = new SqlParamList(executor.dialect);
  const rows = await executor.query<DeploymentRow>(
    `SELECT ${DEPLOYMENT_COLUMNS}
       FROM deployments
      ORDER BY id ASC
      LIMIT ${params.add(Math.max(0, Math.trunc(limit)))}
     OFFSET ${params.add(Math.max(0, Math.trunc(offset)))}`,
    params.values
  );
  const schedules = await fetchSchedules(executor, rows.map((row) => row.id));
  return rows.map((row) => mapDeploymentRow(row, schedules.get(row.id) ?? []));
}

/** Removes the deployment and its schedules. Existing runs keep their rows with a null deployment. */
export async function deleteDeployment(store: SchedulerStore, deploymentId: string): Promise<boolean> {
  const params = new SqlParamList(store.executor.dialect);
  const deleted = await store.executor.execute(
    `DELETE FROM deployments WHERE id = ${params.add(deploymentId)}`,
    params.values
  );
  return deleted > 0;
}

export async function addDeploymentSchedule(
  store: SchedulerStore,
  deploymentId: string,
  input: DeploymentScheduleCreateInput
): Promise<DeploymentScheduleRecord> {
  const parsed = deploymentScheduleCreateSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScheduleValidationError('Invalid deployment schedule', parsed.error.issues);
  }

  const scheduleId = await store.executor.transaction(async (executor) => {
    if (!(await deploymentExists(executor, deploymentId))) {
      throw new DeploymentNotFoundError(deploymentId);
    }
    const now = new Date().toISOString();
    const id = await insertScheduleRow(executor, deploymentId, parsed.data, now);
    await touchDeployment(executor, deploymentId, now);
    return id;
  });

  const params = new SqlParamList(store.executor.dialect);
  const rows = await store.executor.query<DeploymentScheduleRow>(
    `SELECT ${SCHEDULE_COLUMNS} FROM deployment_schedules WHERE id = ${params.add(scheduleId)}`,
    params.values
  );
  const row = rows[0];
  if (!row) {
    throw new Error('failed to create deployment schedule');
  }
  return mapDeploymentScheduleRow(row);
}

export async function setDeploymentScheduleActive(
  store: SchedulerStore,
  deploymentId: string,
  scheduleId: string,
  isActive: boolean
): Promise<boolean> {
  return store.executor.transaction(async (executor) => {
    const params = new SqlParamList(executor.dialect);
    const updated = await executor.execute(
      `UPDATE deployment_schedules
          SET is_active = ${params.add(isActive)}
        WHERE id = ${params.add(scheduleId)}
          AND deployment_id = ${params.add(deploymentId)}`,
      params.values
    );
    if (updated > 0) {
      await touchDeployment(executor, deploymentId, new Date().toISOString());
    }
    return updated > 0;
  });
}

export async function removeDeploymentSchedule(
  store: SchedulerStore,
  deploymentId: string,
  scheduleId: string
): Promise<boolean> {
  return store.executor.transaction(async (executor) => {
    const params = new SqlParamList(executor.dialect);
    const deleted = await executor.execute(
      `DELETE FROM deployment_schedules
        WHERE id = ${params.add(scheduleId)}
          AND deployment_id = ${params.add(deploymentId)}`,
      params.values
    );
    if (deleted > 0) {
      await touchDeployment(executor, deploymentId, new Date().toISOString());
    }
    return deleted > 0;
  });
}
