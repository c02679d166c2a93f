import {
  clockDefinitionSchema,
  flowRunDetailsSchema,
  flowRunStateDetailsSchema,
  flowRunStateTypeSchema,
  jsonObjectSchema,
  tagListSchema
} from '../zodSchemas';
import type { DeploymentRow, DeploymentScheduleRow, FlowRunRow, FlowRunStateRow, TimestampColumn } from './rowTypes';
import type {
  DeploymentRecord,
  DeploymentScheduleRecord,
  FlowRunRecord,
  FlowRunStateRecord
} from './types';

function toIso(value: TimestampColumn): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

function parseJsonColumn(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export function mapDeploymentScheduleRow(row: DeploymentScheduleRow): DeploymentScheduleRecord {
  return {
    id: row.id,
    deploymentId: row.deployment_id,
    clock: clockDefinitionSchema.parse(parseJsonColumn(row.clock)),
    parameters: jsonObjectSchema.catch({}).parse(parseJsonColumn(row.parameters) ?? {}),
    isActive: Boolean(row.is_active),
    createdAt: toIso(row.created_at)
  } satisfies DeploymentScheduleRecord;
}

export function mapDeploymentRow(row: DeploymentRow, schedules: DeploymentScheduleRow[]): DeploymentRecord {
  return {
    id: row.id,
    name: row.name,
    flowId: row.flow_id,
    schedules: schedules.map(mapDeploymentScheduleRow),
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  } satisfies DeploymentRecord;
}

export function mapFlowRunRow(row: FlowRunRow): FlowRunRecord {
  return {
    id: row.id,
    flowId: row.flow_id,
    deploymentId: row.deployment_id,
    parameters: jsonObjectSchema.catch({}).parse(parseJsonColumn(row.parameters) ?? {}),
    idempotencyKey: row.idempotency_key,
    tags: tagListSchema.catch([]).parse(parseJsonColumn(row.tags) ?? []),
    flowRunDetails: flowRunDetailsSchema.parse(parseJsonColumn(row.flow_run_details) ?? {}),
    stateId: row.state_id,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at)
  } satisfies FlowRunRecord;
}

export function mapFlowRunStateRow(row: FlowRunStateRow): FlowRunStateRecord {
  return {
    id: row.id,
    flowRunId: row.flow_run_id,
    type: flowRunStateTypeSchema.parse(row.type),
    message: row.message,
    stateDetails: flowRunStateDetailsSchema.parse(parseJsonColumn(row.state_details) ?? {}),
    createdAt: toIso(row.created_at)
  } satisfies FlowRunStateRecord;
}
