import axios from 'axios';
import { AppError, BackendError, TimeoutError } from '../errors';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Map an outbound HTTP failure into the gateway error taxonomy
 */
export function mapHttpError(error: unknown, target: string, timeoutMs: number): AppError {
  if (error instanceof AppError) return error;

  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(`${target} did not respond within ${timeoutMs}ms`, timeoutMs, target);
    }
    if (error.response) {
      return new BackendError(`${target} responded with status ${error.response.status}`, {
        backend: target,
        status: error.response.status,
        cause: error,
      });
    }
    return new BackendError(`${target} is unreachable: ${error.message}`, {
      backend: target,
      cause: error,
    });
  }

  return new BackendError(error instanceof Error ? error.message : String(error), {
    backend: target,
    cause: error,
  });
}
