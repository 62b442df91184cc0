/**
 * Bulk Operations Error Classes
 *
 * Typed errors shared by the operation registry, the job lifecycle and the
 * remote ticket client.
 */

/**
 * Base error class for bulk-operation errors
 */
export class BulkOpsError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = 'BulkOpsError';
  }
}

/**
 * Bad or missing operation input, reported before any remote call
 */
export class ValidationError extends BulkOpsError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
  }
}

/**
 * Remote client is unusable (missing or rejected credentials)
 */
export class ConfigurationError extends BulkOpsError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message, 503);
    this.name = 'ConfigurationError';
  }
}

/**
 * Invalid process configuration (CLI flags or environment)
 */
export class ConfigValidationError extends BulkOpsError {
  constructor(public issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration:\n  - ${issues.join('\n  - ')}`, 500);
    this.name = 'ConfigValidationError';
  }
}

/**
 * A request to the remote record store failed
 */
export class RemoteApiError extends BulkOpsError {
  constructor(
    message: string,
    public httpStatus?: number
  ) {
    super('REMOTE_API_ERROR', message, 502);
    this.name = 'RemoteApiError';
  }

  /** The remote service is throttling us */
  get isRateLimited(): boolean {
    return this.httpStatus === 429;
  }
}

/**
 * Two operations registered under the same slug
 */
export class DuplicateSlugError extends BulkOpsError {
  constructor(slug: string) {
    super('DUPLICATE_SLUG', `Operation with slug '${slug}' is already registered`, 500);
    this.name = 'DuplicateSlugError';
  }
}

export class OperationNotFoundError extends BulkOpsError {
  constructor(slug: string) {
    super('OPERATION_NOT_FOUND', `Operation "${slug}" not found`, 404);
    this.name = 'OperationNotFoundError';
  }
}

export class PermissionDeniedError extends BulkOpsError {
  constructor(message: string) {
    super('PERMISSION_DENIED', message, 403);
    this.name = 'PermissionDeniedError';
  }
}

export class UnsupportedExportFormatError extends BulkOpsError {
  constructor(slug: string, format: string) {
    super('UNSUPPORTED_EXPORT_FORMAT', `Export format "${format}" not supported for ${slug}`, 400);
    this.name = 'UnsupportedExportFormatError';
  }
}

export class JobNotFoundError extends BulkOpsError {
  constructor(jobId: number | string) {
    super('JOB_NOT_FOUND', `Job not found: ${jobId}`, 404);
    this.name = 'JobNotFoundError';
  }
}

/**
 * A lifecycle request that the job's current status does not allow
 */
export class JobStateError extends BulkOpsError {
  constructor(code: string, message: string) {
    super(code, message, 409);
    this.name = 'JobStateError';
  }
}

export class JobNotCancellableError extends JobStateError {
  constructor(jobId: number, currentStatus: string) {
    super('JOB_NOT_CANCELLABLE', `Job ${jobId} is already ${currentStatus} and cannot be cancelled`);
    this.name = 'JobNotCancellableError';
  }
}

export class JobNotDeletableError extends JobStateError {
  constructor(jobId: number, currentStatus: string) {
    super('JOB_NOT_DELETABLE', `Job ${jobId} is ${currentStatus}; cancel it before deleting`);
    this.name = 'JobNotDeletableError';
  }
}

export class JobResultUnavailableError extends JobStateError {
  constructor(jobId: number, currentStatus: string) {
    super('JOB_RESULT_UNAVAILABLE', `Job ${jobId} has no result to export (status: ${currentStatus})`);
    this.name = 'JobResultUnavailableError';
  }
}

/**
 * Reason a running task's signal is aborted with
 */
export class TaskRevokedError extends BulkOpsError {
  constructor(taskId: string) {
    super('TASK_REVOKED', `Task ${taskId} was revoked`, 409);
    this.name = 'TaskRevokedError';
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
