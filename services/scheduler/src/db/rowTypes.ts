// pg returns parsed jsonb and Date timestamps; SQLite hands back TEXT for both.
export type TimestampColumn = string | Date;
export type JsonColumn = unknown;

export type DeploymentRow = {
  id: string;
  name: string;
  flow_id: string;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
};

export type DeploymentScheduleRow = {
  id: string;
  deployment_id: string;
  clock: JsonColumn;
  parameters: JsonColumn;
  is_active: boolean | number;
  created_at: TimestampColumn;
};

export type FlowRunRow = {
  id: string;
  flow_id: string;
  deployment_id: string | null;
  parameters: JsonColumn;
  idempotency_key: string | null;
  tags: JsonColumn;
  flow_run_details: JsonColumn;
  state_id: string | null;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
};

export type FlowRunStateRow = {
  id: string;
  flow_run_id: string;
  type: string;
  message: string | null;
  state_details: JsonColumn;
  created_at: TimestampColumn;
};

export type IdRow = {
  id: string;
};

export type FlowRunIdRow = {
  flow_run_id: string;
};
