/**
 * Error taxonomy for the batch driver.
 *
 * Validation errors are raised before any remote call. Remote, consistency and
 * invariant errors mean the remote service answered in a way the driver cannot
 * reconcile and always propagate to the caller of the batch operation.
 */

export class BatchDriverError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'BatchDriverError';
    this.details = details;
  }
}

/** Malformed URI, job name or other argument. */
export class InvalidArgumentError extends BatchDriverError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'InvalidArgumentError';
  }
}

/** A task is missing something the driver needs before talking to AWS. */
export class InvalidTaskError extends BatchDriverError {
  readonly taskUid: string;

  constructor(taskUid: string, message: string, details?: unknown) {
    super(`task ${taskUid}: ${message}`, details);
    this.name = 'InvalidTaskError';
    this.taskUid = taskUid;
  }
}

/** Non-success status code, a non-empty failure list, or a response missing a required field. */
export class RemoteApiError extends BatchDriverError {
  readonly operation: string;
  readonly statusCode?: number;

  constructor(operation: string, message: string, statusCode?: number, details?: unknown) {
    super(`${operation}: ${message}`, details);
    this.name = 'RemoteApiError';
    this.operation = operation;
    this.statusCode = statusCode;
  }
}

/** Remote state and local bookkeeping have diverged. */
export class ConsistencyError extends BatchDriverError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'ConsistencyError';
  }
}

export class UnknownRemoteStatusError extends ConsistencyError {
  readonly rawStatus: string;

  constructor(jobId: string, rawStatus: string) {
    super(`job ${jobId} reported unrecognised status '${rawStatus}'`);
    this.name = 'UnknownRemoteStatusError';
    this.rawStatus = rawStatus;
  }
}

/** The remote service returned data that contradicts the driver's assumptions. */
export class InvariantViolationError extends BatchDriverError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigurationError extends BatchDriverError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.name = 'ConfigurationError';
  }
}

export function isBatchDriverError(err: unknown): err is BatchDriverError {
  return err instanceof BatchDriverError;
}
