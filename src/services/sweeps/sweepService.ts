import { DocumentStore } from '../../repository/documentStore';
import { createSchedulerMarkerRepository } from '../../repository/schedulerMarkerRepository';
import { createUserAccountRepository } from '../../repository/userAccountRepository';
import { createUserDebtsRepository } from '../../repository/userDebtsRepository';
import { BillingConfig } from '../../types/credits';
import { ReconcileSummary } from '../../types/payments';
import { Clock, dayKey, systemClock } from '../../utils/calendar';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { CreditsService } from '../creditsService';
import { NotificationDispatcher } from '../notificationService';
import { PaymentReconciler } from '../payments/paymentReconciler';
import { createDailyJobRunner, DailyRunResult } from './dailyJobRunner';
import { createDebtReminderSweep, DebtReminderSweepReport } from './debtReminderSweep';
import { createLowCreditSweep, LowCreditSweepReport } from './lowCreditSweep';
import { createTrialResetSweep, TrialResetSweepReport } from './trialResetSweep';

export interface SweepServiceDeps {
  store: DocumentStore;
  credits: CreditsService;
  reconciler: PaymentReconciler;
  dispatcher: NotificationDispatcher;
  config: BillingConfig;
  clock?: Clock;
  log?: Logger;
}

export function createSweepService(deps: SweepServiceDeps) {
  const clock = deps.clock ?? systemClock;
  const log = deps.log ?? rootLogger;
  const accounts = createUserAccountRepository(deps.store);
  const runner = createDailyJobRunner(createSchedulerMarkerRepository(deps.store), log);

  const lowCredit = createLowCreditSweep({
    accounts,
    dispatcher: deps.dispatcher,
    policy: deps.credits.policy,
    thresholdDays: deps.config.lowCreditThresholdDays,
    log,
  });
  const debtReminders = createDebtReminderSweep({
    debts: createUserDebtsRepository(deps.store),
    dispatcher: deps.dispatcher,
    currency: deps.config.currency,
    log,
  });
  const trialReset = createTrialResetSweep({ accounts, credits: deps.credits, log });

  return {
    runLowCredit(): Promise<DailyRunResult<LowCreditSweepReport>> {
      return runner.runOncePerDay('low-credit', clock(), lowCredit);
    },

    runDebtReminders(): Promise<DailyRunResult<DebtReminderSweepReport>> {
      return runner.runOncePerDay('debt-reminders', clock(), debtReminders);
    },

    async runTrialReset(): Promise<DailyRunResult<TrialResetSweepReport>> {
      const now = clock();
      if (!deps.config.resetOnLogin) return { ran: false, runDate: dayKey(now), reason: 'disabled' };
      return runner.runOncePerDay('trial-reset', now, trialReset);
    },

    /** Not marker-guarded: reconciliation is idempotent and runs many times a day. */
    reconcilePayments(): Promise<ReconcileSummary> {
      return deps.reconciler.reconcilePendingPayments(clock());
    },
  };
}

export type SweepService = ReturnType<typeof createSweepService>;
