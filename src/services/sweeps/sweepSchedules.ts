import { Cron } from 'croner';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { SweepService } from './sweepService';

export interface SweepScheduleConfig {
  timezone: string;
  lowCredit: string;
  debtReminders: string;
  trialReset: string;
  paymentReconcile: string;
}

export interface SweepScheduleHandle {
  stop(): void;
}

/** Wall-clock triggers for the sweeps. `protect` keeps a slow run from overlapping the next tick. */
export function startSweepSchedules(sweeps: SweepService, schedules: SweepScheduleConfig, log: Logger = rootLogger): SweepScheduleHandle {
  const jobs: Array<[string, string, () => Promise<unknown>]> = [
    ['low-credit', schedules.lowCredit, () => sweeps.runLowCredit()],
    ['debt-reminders', schedules.debtReminders, () => sweeps.runDebtReminders()],
    ['trial-reset', schedules.trialReset, () => sweeps.runTrialReset()],
    ['payment-reconcile', schedules.paymentReconcile, () => sweeps.reconcilePayments()],
  ];

  const crons = jobs.map(
    ([name, pattern, run]) =>
      new Cron(pattern, { name, timezone: schedules.timezone, protect: true }, async () => {
        try {
          await run();
        } catch (err) {
          log.error({ err, job: name }, '[SWEEP] Scheduled run failed');
        }
      })
  );

  log.info({ timezone: schedules.timezone, jobs: jobs.map(([name, pattern]) => ({ name, pattern })) }, '[SWEEP] Schedules started');

  return {
    stop() {
      crons.forEach((cron) => cron.stop());
    },
  };
}
