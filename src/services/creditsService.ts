import { v4 as uuidv4 } from 'uuid';
import { DocumentStore } from '../repository/documentStore';
import { createPaymentsRepository } from '../repository/paymentsRepository';
import { createUsageLogRepository } from '../repository/usageLogRepository';
import { createUserAccountRepository } from '../repository/userAccountRepository';
import {
  AccountProfile,
  BillingConfig,
  CreditResult,
  EntitlementPolicy,
  EntitlementReport,
  UsageLogEntry,
  UsageResult,
  UserAccount,
} from '../types/credits';
import { PaymentRecord } from '../types/payments';
import { Clock, isSameCalendarDay, monthKey, parseInstant, systemClock } from '../utils/calendar';
import { ApiError, InsufficientCreditError, LedgerInvariantError } from '../utils/errorHandler';
import { logger as rootLogger, Logger } from '../utils/logger';
import { withOptimisticRetry } from '../utils/optimisticRetry';
import { evaluate, trialEndsAt } from './entitlementService';

export interface CreditsServiceDeps {
  store: DocumentStore;
  config: BillingConfig;
  clock?: Clock;
  log?: Logger;
}

function newAccount(userKey: string, now: Date, profile: AccountProfile): UserAccount {
  const at = now.toISOString();
  return {
    userKey,
    creditBalanceDays: 0,
    registrationTimestamp: at,
    lastUsageTimestamp: null,
    totalPaymentsAmount: 0,
    trialResetAt: at,
    lastPaymentTimestamp: null,
    monthlyPaidKey: null,
    monthlyPaidAmount: 0,
    email: profile.email ?? null,
    createdAt: at,
    updatedAt: at,
  };
}

function withTrialReset(account: UserAccount, now: Date): UserAccount {
  const at = now.toISOString();
  return {
    ...account,
    registrationTimestamp: at,
    creditBalanceDays: 0,
    lastUsageTimestamp: null,
    trialResetAt: at,
    updatedAt: at,
  };
}

export function createCreditsService(deps: CreditsServiceDeps) {
  const { store, config } = deps;
  const clock = deps.clock ?? systemClock;
  const log = deps.log ?? rootLogger;
  const accounts = createUserAccountRepository(store);
  const payments = createPaymentsRepository(store);
  const usageLogs = createUsageLogRepository(store);
  const policy: EntitlementPolicy = {
    trialWindowDays: config.trialWindowDays,
    forceTrialEnd: config.forceTrialEnd,
  };

  function paidThisMonth(account: UserAccount, now: Date): number {
    return account.monthlyPaidKey === monthKey(now) ? account.monthlyPaidAmount : 0;
  }

  /** What the user may still prepay this month. */
  function remainingTopUp(account: UserAccount, now: Date): number {
    return Math.max(0, config.monthlyCap * config.maxPrepayMonths - paidThisMonth(account, now));
  }

  // One reset per user per epoch; without an epoch, once per user.
  function dueForEpochReset(account: UserAccount): boolean {
    if (!config.resetOnLogin) return false;
    const resetAt = parseInstant(account.trialResetAt);
    if (!resetAt) return true;
    const epoch = parseInstant(config.trialResetEpoch);
    return epoch !== null && resetAt.getTime() < epoch.getTime();
  }

  async function resetForNewTrial(userKey: string, now: Date): Promise<UserAccount> {
    return withOptimisticRetry(`reset:${userKey}`, config.maxWriteAttempts, async () => {
      const current = await accounts.read(userKey);
      const next = current ? withTrialReset(current.account, now) : newAccount(userKey, now, {});
      await store.commit([accounts.write(next, current ? current.version : null)]);
      log.info({ userKey, registrationTimestamp: next.registrationTimestamp }, '[LEDGER] Trial reset');
      return next;
    });
  }

  /** First contact creates the account; a missing trial start or a due epoch reset resets it. */
  async function ensureAccount(userKey: string, now: Date, profile: AccountProfile = {}): Promise<UserAccount> {
    return withOptimisticRetry(`ensure:${userKey}`, config.maxWriteAttempts, async () => {
      const current = await accounts.read(userKey);
      if (!current) {
        const created = newAccount(userKey, now, profile);
        await store.commit([accounts.write(created, null)]);
        log.info({ userKey }, '[LEDGER] Account created with a fresh trial');
        return created;
      }

      const { account, version } = current;
      if (!account.registrationTimestamp || dueForEpochReset(account)) {
        const reset = withTrialReset(account, now);
        await store.commit([accounts.write(reset, version)]);
        log.info({ userKey, reason: account.registrationTimestamp ? 'reset_on_login' : 'missing_registration' }, '[LEDGER] Trial reset');
        return reset;
      }

      if (profile.email && profile.email !== account.email) {
        const updated = { ...account, email: profile.email, updatedAt: now.toISOString() };
        await store.commit([accounts.write(updated, version)]);
        return updated;
      }

      return account;
    });
  }

  /** Applies the one-time reset only when it is due. Resolves true when a reset happened. */
  async function resetIfDue(userKey: string, now: Date): Promise<boolean> {
    return withOptimisticRetry(`reset-if-due:${userKey}`, config.maxWriteAttempts, async () => {
      const current = await accounts.read(userKey);
      if (!current || !dueForEpochReset(current.account)) return false;
      await store.commit([accounts.write(withTrialReset(current.account, now), current.version)]);
      log.info({ userKey }, '[LEDGER] Trial reset by sweep');
      return true;
    });
  }

  async function debitForUsage(userKey: string, actionType: string, now: Date): Promise<UsageResult> {
    return withOptimisticRetry(`debit:${userKey}`, config.maxWriteAttempts, async () => {
      const current = await accounts.read(userKey);
      if (!current) throw new ApiError('Account not found', 404, { userKey }, 'NOT_FOUND');

      let account = current.account;
      let entitlement = evaluate(account, now, policy);
      if (entitlement.requiresTrialReset) {
        account = withTrialReset(account, now);
        entitlement = evaluate(account, now, policy);
      }

      if (entitlement.status === 'BLOCKED') {
        throw new InsufficientCreditError(userKey, account.creditBalanceDays);
      }

      const lastUsage = parseInstant(account.lastUsageTimestamp);
      const sameDay = lastUsage !== null && isSameCalendarDay(lastUsage, now);
      const creditDeducted = !sameDay && entitlement.status === 'ACTIVE' ? Math.min(1, account.creditBalanceDays) : 0;
      const newBalance = account.creditBalanceDays - creditDeducted;
      const at = now.toISOString();

      const next: UserAccount = {
        ...account,
        creditBalanceDays: newBalance,
        lastUsageTimestamp: sameDay ? account.lastUsageTimestamp : at,
        updatedAt: at,
      };
      const usageId = uuidv4();

      await store.commit([
        accounts.write(next, current.version),
        usageLogs.append({
          usageId,
          userKey,
          actionType,
          creditDelta: creditDeducted > 0 ? -creditDeducted : 0,
          resultingBalance: newBalance,
          timestamp: at,
        }),
      ]);

      if (creditDeducted > 0) {
        log.info({ userKey, actionType, creditDeducted, newBalance }, '[LEDGER] Daily usage debited');
      } else {
        log.debug({ userKey, actionType, status: entitlement.status, sameDay }, '[LEDGER] Usage logged without debit');
      }

      const after = evaluate(next, now, policy);
      return { newBalance, creditDeducted, status: after.status, usageId };
    });
  }

  /**
   * Adds `amount / dailyRate` credit-days for a completed payment and marks the
   * payment credited in the same commit. A second call is a no-op.
   */
  async function creditFromPayment(payment: PaymentRecord, now: Date): Promise<CreditResult> {
    if (payment.status !== 'completed') {
      throw new LedgerInvariantError('Credit requested for a payment that is not completed', {
        paymentId: payment.paymentId,
        status: payment.status,
      });
    }

    return withOptimisticRetry(`credit:${payment.paymentId}`, config.maxWriteAttempts, async () => {
      const storedPayment = await payments.read(payment.paymentId);
      if (!storedPayment || storedPayment.payment.status !== 'completed') {
        throw new LedgerInvariantError('Stored payment is not completed', { paymentId: payment.paymentId });
      }

      const record = storedPayment.payment;
      const current = await accounts.read(record.userKey);
      const account = current ? current.account : newAccount(record.userKey, now, {});

      if (record.creditAppliedAt) {
        log.info({ paymentId: record.paymentId, userKey: record.userKey }, '[LEDGER] Payment already credited');
        return { applied: false, creditDays: record.creditDaysApplied ?? 0, newBalance: account.creditBalanceDays };
      }

      const creditDays = record.amount / config.dailyRate;
      const at = now.toISOString();
      const month = monthKey(now);
      const next: UserAccount = {
        ...account,
        creditBalanceDays: account.creditBalanceDays + creditDays,
        totalPaymentsAmount: account.totalPaymentsAmount + record.amount,
        lastPaymentTimestamp: at,
        monthlyPaidKey: month,
        monthlyPaidAmount: paidThisMonth(account, now) + record.amount,
        updatedAt: at,
      };

      await store.commit([
        accounts.write(next, current ? current.version : null),
        payments.write({ ...record, creditAppliedAt: at, creditDaysApplied: creditDays, updatedAt: at }, storedPayment.version),
      ]);

      log.info(
        { paymentId: record.paymentId, userKey: record.userKey, amount: record.amount, creditDays, newBalance: next.creditBalanceDays },
        '[LEDGER] Payment credited'
      );
      return { applied: true, creditDays, newBalance: next.creditBalanceDays };
    });
  }

  function report(account: UserAccount, now: Date): EntitlementReport {
    const entitlement = evaluate(account, now, policy);
    const trialEnd = trialEndsAt(account, policy);
    return {
      userKey: account.userKey,
      status: entitlement.status,
      daysRemaining: entitlement.daysRemaining,
      creditBalanceDays: account.creditBalanceDays,
      totalPayments: account.totalPaymentsAmount,
      lastUsageTimestamp: account.lastUsageTimestamp,
      trialEndsAt: trialEnd ? trialEnd.toISOString() : null,
      billing: {
        dailyRate: config.dailyRate,
        currency: config.currency,
        monthlyCap: config.monthlyCap,
        maxPrepayMonths: config.maxPrepayMonths,
        maxTopUp: remainingTopUp(account, now),
      },
    };
  }

  async function checkEntitlement(userKey: string, profile: AccountProfile = {}): Promise<EntitlementReport> {
    const now = clock();
    const account = await ensureAccount(userKey, now, profile);
    return report(account, now);
  }

  async function recordUsage(userKey: string, actionType: string): Promise<UsageResult> {
    const now = clock();
    await ensureAccount(userKey, now);
    return debitForUsage(userKey, actionType, now);
  }

  async function listUsage(userKey: string): Promise<UsageLogEntry[]> {
    return usageLogs.listForUser(userKey);
  }

  return {
    policy,
    remainingTopUp,
    ensureAccount,
    resetForNewTrial,
    resetIfDue,
    debitForUsage,
    creditFromPayment,
    checkEntitlement,
    recordUsage,
    listUsage,
  };
}

export type CreditsService = ReturnType<typeof createCreditsService>;
