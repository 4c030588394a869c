import { ConcurrencyConflictError, VersionConflictError } from './errors';
import { logger } from './logger';

export interface OptimisticRetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a read-decide-write cycle until its compare-and-swap succeeds.
 *
 * The operation must re-read its inputs on every call. A VersionConflictError
 * triggers another attempt after `baseDelayMs * attempt`; once `maxAttempts`
 * is spent the caller gets a ConcurrencyConflictError. Any other error is
 * rethrown immediately.
 */
export async function withOptimisticRetry<T>(
  resource: string,
  operation: (attempt: number) => Promise<T>,
  options: OptimisticRetryOptions
): Promise<T> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof VersionConflictError)) {
        throw error;
      }

      logger.warn('Optimistic lock conflict, retrying', {
        resource,
        attempt,
        maxAttempts: options.maxAttempts,
      });

      if (attempt < options.maxAttempts && options.baseDelayMs > 0) {
        await sleep(options.baseDelayMs * attempt);
      }
    }
  }

  throw new ConcurrencyConflictError(resource, options.maxAttempts);
}
