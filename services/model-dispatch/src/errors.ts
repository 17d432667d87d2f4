export class DispatchError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class UnknownServiceError extends DispatchError {
  readonly services: string[];

  constructor(services: string | string[]) {
    const names = Array.isArray(services) ? services : [services];
    super(`Unknown service: ${names.join(', ')}`, 'UnknownService', 404, { services: names });
    this.name = 'UnknownServiceError';
    this.services = names;
  }
}

export class JobNotFoundError extends DispatchError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, 'JobNotFound', 404, { job_id: jobId });
    this.name = 'JobNotFoundError';
  }
}

export class ResultNotFoundError extends DispatchError {
  constructor(ref: string) {
    super(`Result ${ref} not found`, 'ResultNotFound', 404, { result_ref: ref });
    this.name = 'ResultNotFoundError';
  }
}

export class TimeoutError extends DispatchError {
  constructor(message: string, timeoutMs: number) {
    super(message, 'Timeout', 504, { timeout_ms: timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class BackendFailureError extends DispatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BackendFailure', 502, details);
    this.name = 'BackendFailureError';
  }
}

export class EnqueueFailureError extends DispatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EnqueueFailure', 503, details);
    this.name = 'EnqueueFailureError';
  }
}

export class ValidationError extends DispatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ValidationError', 400, details);
    this.name = 'ValidationError';
  }
}

export class JobConflictError extends DispatchError {
  constructor(message: string, jobId: string) {
    super(message, 'JobConflict', 409, { job_id: jobId });
    this.name = 'JobConflictError';
  }
}

export class UnauthorizedError extends DispatchError {
  constructor(message: string = 'Invalid or missing API key') {
    super(message, 'Unauthorized', 401);
    this.name = 'UnauthorizedError';
  }
}

export class ServiceUnavailableError extends DispatchError {
  constructor(message: string) {
    super(message, 'ServiceUnavailable', 503);
    this.name = 'ServiceUnavailableError';
  }
}

/** Raised by a backend when the payload it was given cannot be processed. */
export class InvalidPayloadError extends DispatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'InvalidPayload', 400, details);
    this.name = 'InvalidPayloadError';
  }
}

export class JobCancelledError extends DispatchError {
  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`, 'Cancelled', 409, { job_id: jobId });
    this.name = 'JobCancelledError';
  }
}

/** The worker no longer holds the lease on a job, so its acknowledgement is void. */
export class LeaseLostError extends DispatchError {
  constructor(jobId: string, workerId: string) {
    super(`Worker ${workerId} does not hold the lease on job ${jobId}`, 'LeaseLost', 409, {
      job_id: jobId,
      worker_id: workerId
    });
    this.name = 'LeaseLostError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
