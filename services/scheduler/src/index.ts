export { createClock, CronClock, IntervalClock, DEFAULT_INTERVAL_ANCHOR, type Clock } from './clocks';
export {
  clearSchedulerConfigCache,
  getSchedulerConfig,
  loadSchedulerConfig,
  LINK_STRATEGIES,
  type LinkStrategyName,
  type SchedulerRuntimeConfig
} from './config/scheduler';
export {
  addDeploymentSchedule,
  createDeployment,
  deleteDeployment,
  readDeployment,
  readDeployments,
  removeDeploymentSchedule,
  setDeploymentScheduleActive
} from './db/deployments';
export {
  postgresDialect,
  sqliteDialect,
  resolveSqlDialect,
  type SqlDialect,
  type SqlDialectName,
  type SqlExecutor,
  type SqlParam
} from './db/executor';
export { readFlowRun, readFlowRunsForDeployment, readFlowRunStates } from './db/flowRuns';
export { resolveLinkStrategy, type LinkStrategy } from './db/linkStrategies';
export { runMigrations } from './db/migrations';
export {
  createPostgresExecutor,
  fromPostgresPool,
  type PostgresConnectionSource,
  type PostgresQueryable
} from './db/postgresExecutor';
export { createSqliteExecutor } from './db/sqliteExecutor';
export {
  createSchedulerStore,
  createStoreFromExecutor,
  type SchedulerStore,
  type SchedulerStoreOptions
} from './db/store';
export {
  FLOW_RUN_STATE_TYPES,
  type ClockDefinition,
  type CronClockDefinition,
  type DeploymentCreateInput,
  type DeploymentRecord,
  type DeploymentScheduleCreateInput,
  type DeploymentScheduleRecord,
  type FlowRunRecord,
  type FlowRunSpec,
  type FlowRunStateRecord,
  type FlowRunStateType,
  type IntervalClockDefinition,
  type JsonObject,
  type JsonValue
} from './db/types';
export {
  processDeploymentSchedules,
  startDeploymentScheduler,
  type DeploymentSchedulerHandle,
  type DeploymentSchedulerOptions
} from './deploymentScheduler';
export {
  DeploymentConflictError,
  DeploymentNotFoundError,
  ScheduleValidationError,
  ScheduleWindowError,
  SchedulerError,
  StorageCapabilityError
} from './errors';
export { logger } from './observability/logger';
export {
  getSchedulerMetricsSnapshot,
  recordSchedulerEvent,
  resetSchedulerMetrics,
  type SchedulerMetricsSnapshot
} from './observability/metrics';
export {
  generateScheduledFlowRuns,
  resolveScheduleWindow,
  type ScheduleWindow,
  type ScheduleWindowOptions
} from './scheduling/generator';
export { insertScheduledFlowRuns } from './scheduling/materializer';
export { scheduleRuns } from './scheduling/scheduleRuns';
