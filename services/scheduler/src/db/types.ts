export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type IntervalClockDefinition = {
  kind: 'interval';
  intervalSeconds: number;
  anchorDate?: string | null;
};

export type CronClockDefinition = {
  kind: 'cron';
  cron: string;
  timezone?: string | null;
};

export type ClockDefinition = IntervalClockDefinition | CronClockDefinition;

export type DeploymentScheduleRecord = {
  id: string;
  deploymentId: string;
  clock: ClockDefinition;
  parameters: JsonObject;
  isActive: boolean;
  createdAt: string;
};

export type DeploymentRecord = {
  id: string;
  name: string;
  flowId: string;
  schedules: DeploymentScheduleRecord[];
  createdAt: string;
  updatedAt: string;
};

export type DeploymentScheduleCreateInput = {
  id?: string;
  clock: ClockDefinition;
  parameters?: JsonObject;
  isActive?: boolean;
};

export type DeploymentCreateInput = {
  id?: string;
  name: string;
  flowId: string;
  schedules?: DeploymentScheduleCreateInput[];
};

export type ListOptions = {
  offset?: number;
  limit?: number;
};

export const FLOW_RUN_STATE_TYPES = ['SCHEDULED', 'PENDING', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;

export type FlowRunStateType = (typeof FLOW_RUN_STATE_TYPES)[number];

export type FlowRunStateDetails = {
  scheduledTime: string | null;
  autoScheduled: boolean;
  scheduleId: string | null;
};

export type FlowRunDetails = {
  scheduleId: string | null;
  autoScheduled: boolean;
};

export type FlowRunStateSpec = {
  id: string;
  type: FlowRunStateType;
  message: string;
  stateDetails: FlowRunStateDetails;
};

/**
 * A run that has been generated but not necessarily persisted. `id` and `state.id` are
 * derived from the occurrence, so regenerating the same occurrence yields the same identity.
 */
export type FlowRunSpec = {
  id: string;
  flowId: string;
  deploymentId: string;
  parameters: JsonObject;
  idempotencyKey: string;
  tags: string[];
  flowRunDetails: FlowRunDetails;
  state: FlowRunStateSpec;
};

export type FlowRunRecord = {
  id: string;
  flowId: string;
  deploymentId: string | null;
  parameters: JsonObject;
  idempotencyKey: string | null;
  tags: string[];
  flowRunDetails: FlowRunDetails;
  stateId: string | null;
  createdAt: string;
  updatedAt: string;
};

export type FlowRunStateRecord = {
  id: string;
  flowRunId: string;
  type: FlowRunStateType;
  message: string | null;
  stateDetails: FlowRunStateDetails;
  createdAt: string;
};
