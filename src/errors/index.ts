/**
 * Gateway error taxonomy.
 *
 * Every failure that crosses a component boundary is one of these. The
 * `retryable` flag is what the dispatcher and the batch engine consult when
 * deciding whether another attempt is worth making.
 */

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly errorCode: string;
  public readonly retryable: boolean;
  public readonly details?: ErrorDetails;

  constructor(
    message: string,
    statusCode: number = 500,
    errorCode: string = 'INTERNAL_ERROR',
    options: { retryable?: boolean; isOperational?: boolean; details?: ErrorDetails } = {}
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.retryable = options.retryable ?? false;
    this.isOperational = options.isOperational ?? true;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 400, 'VALIDATION_ERROR', { details: field ? { field } : undefined });
    this.name = 'ValidationError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Access denied') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class AlreadyTerminalError extends AppError {
  constructor(jobId: string, status: string) {
    super(`Job ${jobId} is already ${status}`, 409, 'ALREADY_TERMINAL', { details: { jobId, status } });
    this.name = 'AlreadyTerminalError';
  }
}

/**
 * No healthy backend can serve the model/pattern right now.
 */
export class UnavailableError extends AppError {
  constructor(model: string, pattern?: string) {
    super(
      pattern
        ? `No healthy backend available for model ${model} (${pattern})`
        : `No healthy backend available for model ${model}`,
      503,
      'UNAVAILABLE',
      { retryable: true, details: { model, pattern } }
    );
    this.name = 'UnavailableError';
  }
}

/**
 * The provider (or the vector store) answered with a failure.
 */
export class BackendError extends AppError {
  public readonly backend?: string;
  public readonly status?: number;

  constructor(message: string, options: { backend?: string; status?: number; cause?: unknown } = {}) {
    super(message, 502, 'BACKEND_ERROR', {
      retryable: true,
      details: { backend: options.backend, status: options.status },
    });
    this.name = 'BackendError';
    this.backend = options.backend;
    this.status = options.status;
    this.cause = options.cause;
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, public readonly timeoutMs: number, backend?: string) {
    super(message, 504, 'TIMEOUT', { retryable: true, details: { timeoutMs, backend } });
    this.name = 'TimeoutError';
  }
}

/**
 * Invalid static configuration. Fatal: the gateway refuses to start.
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 500, 'CONFIG_ERROR', { isOperational: false, details });
    this.name = 'ConfigError';
  }
}

export const isRetryable = (error: unknown): boolean =>
  error instanceof AppError && error.retryable;

const toMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Normalizes anything a backend adapter threw into the taxonomy.
 */
export const toAppError = (error: unknown, backend?: string): AppError => {
  if (error instanceof AppError) return error;
  return new BackendError(toMessage(error), { backend, cause: error });
};
