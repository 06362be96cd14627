import { OpenDebt, UserDebtsRepository } from '../../repository/userDebtsRepository';
import { calendarDaysBetween } from '../../utils/calendar';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { NotificationDispatcher } from '../notificationService';

export const REMINDER_HORIZONS = [3, 1] as const;

export interface DebtReminderSweepDeps {
  debts: UserDebtsRepository;
  dispatcher: NotificationDispatcher;
  currency: string;
  log?: Logger;
}

export interface DebtReminderSweepReport {
  dueDebts: number;
  reminders: number;
  notified: number;
}

function dueIn(days: number): string {
  return days === 1 ? 'tomorrow' : `in ${days} days`;
}

export function debtReminderMessage(debts: OpenDebt[], days: number, currency: string): { title: string; body: string } {
  if (debts.length === 1) {
    const [debt] = debts;
    return {
      title: days === 1 ? 'Debt Due Tomorrow' : `Debt Reminder: ${days} Days Left`,
      body: `Debt from ${debt.accountName} is due ${dueIn(days)}. Amount: ${currency} ${debt.amount}`,
    };
  }
  const total = debts.reduce((sum, debt) => sum + (Number(debt.amount) || 0), 0);
  return {
    title: days === 1 ? `${debts.length} Debts Due Tomorrow` : `${debts.length} Debts Due in ${days} Days`,
    body: `You have ${debts.length} debts due ${dueIn(days)}. Total: ${currency} ${total.toFixed(2)}`,
  };
}

/** One reminder per user and horizon for open debts due in 3 or 1 days. */
export function createDebtReminderSweep(deps: DebtReminderSweepDeps) {
  const log = deps.log ?? rootLogger;

  return async function runDebtReminderSweep(now: Date): Promise<DebtReminderSweepReport> {
    const report: DebtReminderSweepReport = { dueDebts: 0, reminders: 0, notified: 0 };
    const groups = new Map<string, { userKey: string; days: number; debts: OpenDebt[] }>();

    for (const debt of await deps.debts.listOpenDebts()) {
      if (!/^\d{4}-\d{2}-\d{2}$/.test(debt.dueDate)) {
        log.warn({ userKey: debt.userKey, debtId: debt.debtId, dueDate: debt.dueDate }, '[SWEEP] Invalid debt due date');
        continue;
      }
      const days = calendarDaysBetween(now, new Date(`${debt.dueDate}T00:00:00.000Z`));
      if (!REMINDER_HORIZONS.some((horizon) => horizon === days)) continue;

      report.dueDebts += 1;
      const key = `${debt.userKey}:${days}`;
      const group = groups.get(key) ?? { userKey: debt.userKey, days, debts: [] };
      group.debts.push(debt);
      groups.set(key, group);
    }

    for (const group of groups.values()) {
      report.reminders += 1;
      const { title, body } = debtReminderMessage(group.debts, group.days, deps.currency);
      const sent = await deps.dispatcher.send(group.userKey, title, body, {
        type: 'debt_reminder',
        daysUntilDue: String(group.days),
        debtCount: String(group.debts.length),
        debtIds: group.debts.map((debt) => debt.debtId).join(','),
      });
      if (sent) report.notified += 1;
    }

    log.info(report, '[SWEEP] Debt reminders done');
    return report;
  };
}
