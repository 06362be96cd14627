import { UserAccountRepository } from '../../repository/userAccountRepository';
import { EntitlementPolicy } from '../../types/credits';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { evaluate } from '../entitlementService';
import { NotificationDispatcher } from '../notificationService';

export interface LowCreditSweepDeps {
  accounts: UserAccountRepository;
  dispatcher: NotificationDispatcher;
  policy: EntitlementPolicy;
  thresholdDays: number;
  log?: Logger;
}

export interface LowCreditSweepReport {
  examined: number;
  eligible: number;
  notified: number;
}

export function lowCreditMessage(daysLeft: number): { title: string; body: string } {
  if (daysLeft <= 0) {
    return { title: 'No Credits Remaining', body: 'Your account has no credits. Add credits to continue using the app.' };
  }
  if (daysLeft === 1) {
    return { title: 'Low Credits: 1 Day Remaining', body: 'You have only 1 credit remaining. Add credits now to avoid service interruption.' };
  }
  return {
    title: `Low Credits: ${daysLeft} Days Remaining`,
    body: `You have only ${daysLeft} credits remaining. Add credits now to keep using the app.`,
  };
}

/** Read-only: notifies post-trial users whose balance is at or below the threshold. */
export function createLowCreditSweep(deps: LowCreditSweepDeps) {
  const log = deps.log ?? rootLogger;

  return async function runLowCreditSweep(now: Date): Promise<LowCreditSweepReport> {
    const report: LowCreditSweepReport = { examined: 0, eligible: 0, notified: 0 };
    const accounts = await deps.accounts.listAll();

    for (const { account } of accounts) {
      report.examined += 1;
      const entitlement = evaluate(account, now, deps.policy);
      if (entitlement.status === 'TRIAL') continue;

      const daysLeft = Math.floor(account.creditBalanceDays);
      if (daysLeft > deps.thresholdDays) continue;

      report.eligible += 1;
      const { title, body } = lowCreditMessage(daysLeft);
      const sent = await deps.dispatcher.send(account.userKey, title, body, {
        type: 'low_credit',
        userKey: account.userKey,
        creditBalance: String(account.creditBalanceDays),
        daysRemaining: String(daysLeft),
        timestamp: String(Math.floor(now.getTime() / 1000)),
      });
      if (sent) report.notified += 1;
    }

    log.info(report, '[SWEEP] Low-credit notifications done');
    return report;
  };
}
