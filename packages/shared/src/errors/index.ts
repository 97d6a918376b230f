export class AppError extends Error {
  public readonly name: string;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, status = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 422, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 401, details);
  }
}

export class DuplicateResourceError extends ConflictError {}

/**
 * The service could not evaluate the request at all. Distinct from a policy
 * rejection, which is a normal result.
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 503, details);
  }
}

export class LockTimeoutError extends ServiceUnavailableError {}

export class StorageUnavailableError extends ServiceUnavailableError {
  constructor(message: string, public readonly reason?: unknown) {
    super(message);
  }
}

/** The caller gave up (its AbortSignal fired) before the operation started. */
export class OperationAbortedError extends AppError {
  constructor(message = 'Operation aborted by caller', details?: Record<string, unknown>) {
    super(message, 499, details);
  }
}
