import pTimeout from 'p-timeout';
import { TimeoutError } from '../errors';

/**
 * Reject with TimeoutError when `promise` has not settled within `timeoutMs`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  backend?: string
): Promise<T> {
  return pTimeout(
    promise,
    timeoutMs,
    new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs, backend)
  );
}
