import pRetry from 'p-retry';

export interface RetryContext {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  retries: number; // attempts after the initial try
  minDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  randomize?: boolean;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (ctx: RetryContext) => void;
  onGiveUp?: (ctx: Omit<RetryContext, 'delayMs'>) => void;
}

/**
 * Exponential backoff delay before retry number `attempt` (0-based).
 */
export const backoffDelay = (
  attempt: number,
  minDelayMs: number,
  maxDelayMs: number,
  factor: number = 2
): number => Math.min(maxDelayMs, minDelayMs * Math.pow(factor, attempt));

const asError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * p-retry with the gateway's retry predicate: errors `shouldRetry` rejects
 * abort the loop and surface unchanged.
 */
export const retry = <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, minDelayMs, factor = 2, randomize = false, shouldRetry, onRetry, onGiveUp } = opts;
  const maxDelayMs = Math.max(minDelayMs, opts.maxDelayMs);
  const maxAttempts = retries + 1;

  return pRetry(
    async (attemptNumber: number) => {
      try {
        return await fn(attemptNumber - 1);
      } catch (error) {
        if (!shouldRetry(error)) {
          onGiveUp?.({ attempt: attemptNumber, maxAttempts, error });
          throw new pRetry.AbortError(asError(error));
        }
        throw asError(error);
      }
    },
    {
      retries,
      factor,
      minTimeout: minDelayMs,
      maxTimeout: maxDelayMs,
      randomize,
      onFailedAttempt: error => {
        if (error.retriesLeft === 0) {
          onGiveUp?.({ attempt: error.attemptNumber, maxAttempts, error });
          return;
        }
        onRetry?.({
          attempt: error.attemptNumber,
          maxAttempts,
          delayMs: backoffDelay(error.attemptNumber - 1, minDelayMs, maxDelayMs, factor),
          error,
        });
      },
    }
  );
};
