import { SchedulerMarkerSchema } from '../schemas/documentSchemas';
import { ConcurrencyConflictError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { withOptimisticRetry } from '../utils/optimisticRetry';
import { COLLECTIONS, DocumentStore } from './documentStore';

export type FinishedRunStatus = 'succeeded' | 'failed';

export function createSchedulerMarkerRepository(store: DocumentStore) {
  return {
    /**
     * Claims `jobName` for `runDate`. Resolves false when the job already ran
     * that day or another runner claimed it first. A run that failed earlier
     * the same day can be claimed again.
     */
    async claim(jobName: string, runDate: string, now: Date): Promise<boolean> {
      const doc = await store.get(COLLECTIONS.schedulerMarkers, jobName);
      if (doc) {
        const parsed = SchedulerMarkerSchema.safeParse(doc.data);
        if (parsed.success && parsed.data.lastRunDate === runDate && parsed.data.lastRunStatus !== 'failed') return false;
      }
      try {
        await store.put(
          COLLECTIONS.schedulerMarkers,
          jobName,
          { jobName, lastRunDate: runDate, lastRunAt: now.toISOString(), lastRunStatus: 'running', lastError: null },
          doc ? doc.version : null
        );
        return true;
      } catch (err) {
        if (err instanceof ConcurrencyConflictError) {
          logger.info({ jobName, runDate }, '[SWEEP] Marker claimed by another runner');
          return false;
        }
        throw err;
      }
    },

    /** Records how the run claimed for `runDate` ended. */
    async finish(jobName: string, runDate: string, status: FinishedRunStatus, error: string | null = null): Promise<void> {
      await withOptimisticRetry(`marker:${jobName}`, 3, async () => {
        const doc = await store.get(COLLECTIONS.schedulerMarkers, jobName);
        if (!doc) return;
        const parsed = SchedulerMarkerSchema.safeParse(doc.data);
        if (!parsed.success || parsed.data.lastRunDate !== runDate) return;
        await store.put(
          COLLECTIONS.schedulerMarkers,
          jobName,
          { ...parsed.data, lastRunStatus: status, lastError: error },
          doc.version
        );
      });
    },
  };
}

export type SchedulerMarkerRepository = ReturnType<typeof createSchedulerMarkerRepository>;
