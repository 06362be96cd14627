import { SchedulerMarkerRepository } from '../../repository/schedulerMarkerRepository';
import { dayKey } from '../../utils/calendar';
import { logger as rootLogger, Logger } from '../../utils/logger';

export type DailyJobName = 'low-credit' | 'debt-reminders' | 'trial-reset';

export type DailyRunResult<T> =
  | { ran: true; runDate: string; result: T }
  | { ran: false; runDate: string; reason: 'already_ran' | 'disabled' };

/**
 * Runs a job at most once per UTC calendar day, however often its trigger
 * fires. The day is claimed before the job starts; a run that throws marks
 * the day failed so the next trigger retries it.
 */
export function createDailyJobRunner(markers: SchedulerMarkerRepository, log: Logger = rootLogger) {
  return {
    async runOncePerDay<T>(jobName: DailyJobName, now: Date, job: (now: Date) => Promise<T>): Promise<DailyRunResult<T>> {
      const runDate = dayKey(now);
      const claimed = await markers.claim(jobName, runDate, now);
      if (!claimed) {
        log.info({ jobName, runDate }, '[SWEEP] Already ran today, skipping');
        return { ran: false, runDate, reason: 'already_ran' };
      }
      log.info({ jobName, runDate }, '[SWEEP] Starting');
      let result: T;
      try {
        result = await job(now);
      } catch (err) {
        log.error({ err, jobName, runDate }, '[SWEEP] Failed');
        await markers.finish(jobName, runDate, 'failed', err instanceof Error ? err.message : String(err));
        throw err;
      }
      await markers.finish(jobName, runDate, 'succeeded');
      log.info({ jobName, runDate, result }, '[SWEEP] Finished');
      return { ran: true, runDate, result };
    },
  };
}

export type DailyJobRunner = ReturnType<typeof createDailyJobRunner>;
