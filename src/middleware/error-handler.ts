import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '../errors';

export interface ErrorBody {
  success: false;
  error: string;
  message: string;
  retryable: boolean;
  details?: unknown;
}

const HTTP_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
  429: 'RATE_LIMIT_EXCEEDED',
};

const hasStatusCode = (error: unknown): error is { statusCode: number; message?: unknown } =>
  typeof error === 'object' &&
  error !== null &&
  typeof Reflect.get(error, 'statusCode') === 'number';

/**
 * Status and body for any error reaching a surface
 */
export function describeError(error: unknown): { statusCode: number; body: ErrorBody } {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        success: false,
        error: 'VALIDATION_ERROR',
        message: 'Validation failed',
        retryable: false,
        details: error.errors.map(err => ({
          field: err.path.join('.'),
          message: err.message,
          code: err.code,
        })),
      },
    };
  }

  if (error instanceof AppError) {
    const internal = error.statusCode >= 500 && !error.isOperational;
    return {
      statusCode: error.statusCode,
      body: {
        success: false,
        error: error.errorCode,
        message: internal ? 'Internal server error' : error.message,
        retryable: error.retryable,
        ...(error.details && !internal && { details: error.details }),
      },
    };
  }

  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      body: {
        success: false,
        error: HTTP_ERROR_CODES[error.statusCode] ?? 'HTTP_ERROR',
        message: typeof error.message === 'string' ? error.message : 'Request failed',
        retryable: error.statusCode === 429,
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      success: false,
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
      retryable: false,
    },
  };
}

export interface ErrorSummary {
  code: string;
  message: string;
  retryable: boolean;
}

/**
 * Compact form carried inside query envelopes and stream error frames
 */
export function summarizeError(error: unknown): { statusCode: number; summary: ErrorSummary } {
  const { statusCode, body } = describeError(error);
  return {
    statusCode,
    summary: { code: body.error, message: body.message, retryable: body.retryable },
  };
}

export const errorHandler = (
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
) => {
  const { statusCode, body } = describeError(error);

  if (statusCode >= 500) {
    request.log.error({
      err: error,
      request: { method: request.method, url: request.url },
    }, 'Request error occurred');
  } else {
    request.log.info({ errorCode: body.error, statusCode }, body.message);
  }

  return reply.status(statusCode).send(body);
};
