import { ConcurrencyConflictError } from './errorHandler';
import { logger } from './logger';

/**
 * Runs `attempt` until it commits without a version conflict. Each attempt
 * must re-read what it writes; the last conflict is rethrown once
 * `maxAttempts` is exhausted.
 */
export async function withOptimisticRetry<T>(
  label: string,
  maxAttempts: number,
  attempt: (attemptNo: number) => Promise<T>
): Promise<T> {
  let lastConflict: ConcurrencyConflictError | null = null;
  for (let attemptNo = 1; attemptNo <= Math.max(1, maxAttempts); attemptNo++) {
    try {
      return await attempt(attemptNo);
    } catch (err) {
      if (!(err instanceof ConcurrencyConflictError)) throw err;
      lastConflict = err;
      logger.debug({ label, attemptNo }, '[STORE] Write conflict, re-reading');
    }
  }
  logger.warn({ label, maxAttempts }, '[STORE] Write conflict retries exhausted');
  throw lastConflict ?? new ConcurrencyConflictError(label, 'unknown');
}
