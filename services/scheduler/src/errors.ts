export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulerError';
  }
}

export class DeploymentNotFoundError extends SchedulerError {
  readonly code = 'DEPLOYMENT_NOT_FOUND';
  readonly deploymentId: string;

  constructor(deploymentId: string) {
    super(`Deployment ${deploymentId} was not found`);
    this.name = 'DeploymentNotFoundError';
    this.deploymentId = deploymentId;
  }
}

export class DeploymentConflictError extends SchedulerError {
  readonly code = 'DEPLOYMENT_CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'DeploymentConflictError';
  }
}

export class ScheduleValidationError extends SchedulerError {
  readonly code = 'SCHEDULE_VALIDATION_FAILED';
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message);
    this.name = 'ScheduleValidationError';
    this.issues = issues;
  }
}

export class ScheduleWindowError extends SchedulerError {
  readonly code = 'INVALID_SCHEDULE_WINDOW';

  constructor(message: string) {
    super(message);
    this.name = 'ScheduleWindowError';
  }
}

/** The configured storage engine has no adapter for a required capability. */
export class StorageCapabilityError extends SchedulerError {
  readonly code = 'UNSUPPORTED_STORAGE_BACKEND';

  constructor(message: string) {
    super(message);
    this.name = 'StorageCapabilityError';
  }
}
