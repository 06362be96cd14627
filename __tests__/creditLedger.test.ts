import { MemoryDocumentStore } from './helpers/memoryDocumentStore';
import { billingConfig, createTestClock, readAccount, seedAccount, seedPayment, TestClock } from './helpers/fixtures';
import { COLLECTIONS } from '../src/repository/documentStore';
import { createCreditsService, CreditsService } from '../src/services/creditsService';
import { BillingConfig } from '../src/types/credits';
import { ApiError, InsufficientCreditError, LedgerInvariantError } from '../src/utils/errorHandler';

describe('credit ledger', () => {
  let store: MemoryDocumentStore;
  let time: TestClock;
  let credits: CreditsService;

  const build = (overrides: Partial<BillingConfig> = {}) => {
    credits = createCreditsService({ store, config: billingConfig(overrides), clock: time.clock });
  };

  beforeEach(() => {
    store = new MemoryDocumentStore();
    time = createTestClock('2026-03-10T09:00:00.000Z');
    build();
  });

  describe('accounts', () => {
    it('starts a new user on a fresh trial', async () => {
      const report = await credits.checkEntitlement('user-1', { email: 'user1@example.com' });

      expect(report).toEqual({
        userKey: 'user-1',
        status: 'TRIAL',
        daysRemaining: 14,
        creditBalanceDays: 0,
        totalPayments: 0,
        lastUsageTimestamp: null,
        trialEndsAt: '2026-03-24T09:00:00.000Z',
        billing: { dailyRate: 5, currency: 'KES', monthlyCap: 150, maxPrepayMonths: 12, maxTopUp: 1800 },
      });
      const account = await readAccount(store, 'user-1');
      expect(account?.email).toBe('user1@example.com');
      expect(account?.registrationTimestamp).toBe('2026-03-10T09:00:00.000Z');
    });

    it('resets an account that has no trial start', async () => {
      seedAccount(store, 'user-1', { registrationTimestamp: null, creditBalanceDays: 7 });

      const result = await credits.recordUsage('user-1', 'sale.create');

      expect(result.creditDeducted).toBe(0);
      expect(result.newBalance).toBe(0);
      expect(result.status).toBe('TRIAL');
      const account = await readAccount(store, 'user-1');
      expect(account?.registrationTimestamp).toBe('2026-03-10T09:00:00.000Z');
    });

    it('resets each account once per reset epoch when reset on login is on', async () => {
      build({ resetOnLogin: true, trialResetEpoch: '2026-03-01T00:00:00.000Z' });
      seedAccount(store, 'user-1', { trialResetAt: '2026-02-01T00:00:00.000Z', creditBalanceDays: 4 });

      const first = await credits.checkEntitlement('user-1');
      expect(first.status).toBe('TRIAL');
      expect(first.daysRemaining).toBe(14);
      expect(first.creditBalanceDays).toBe(0);

      time.advanceDays(1);
      const second = await credits.checkEntitlement('user-1');
      expect(second.daysRemaining).toBe(13);
      expect((await readAccount(store, 'user-1'))?.trialResetAt).toBe('2026-03-10T09:00:00.000Z');
    });

    it('leaves accounts alone when reset on login is off', async () => {
      seedAccount(store, 'user-1', { trialResetAt: null, creditBalanceDays: 4 });

      const report = await credits.checkEntitlement('user-1');

      expect(report.status).toBe('ACTIVE');
      expect(report.creditBalanceDays).toBe(4);
      expect(await credits.resetIfDue('user-1', time.clock())).toBe(false);
    });
  });

  describe('usage', () => {
    it('debits one credit per calendar day of use', async () => {
      seedAccount(store, 'user-1', { creditBalanceDays: 3 });

      const first = await credits.recordUsage('user-1', 'sale.create');
      time.advance(2 * 60 * 60 * 1000);
      const sameDay = await credits.recordUsage('user-1', 'sale.create');
      time.advanceDays(1);
      const nextDay = await credits.recordUsage('user-1', 'report.view');

      expect([first.creditDeducted, sameDay.creditDeducted, nextDay.creditDeducted]).toEqual([1, 0, 1]);
      expect([first.newBalance, sameDay.newBalance, nextDay.newBalance]).toEqual([2, 2, 1]);
      expect(nextDay.status).toBe('ACTIVE');

      const usage = await credits.listUsage('user-1');
      expect(usage.map((entry) => [entry.actionType, entry.creditDelta, entry.resultingBalance])).toEqual([
        ['sale.create', -1, 2],
        ['sale.create', 0, 2],
        ['report.view', -1, 1],
      ]);
      expect((await readAccount(store, 'user-1'))?.lastUsageTimestamp).toBe('2026-03-11T11:00:00.000Z');
    });

    it('does not debit during the trial', async () => {
      seedAccount(store, 'user-1', { registrationTimestamp: '2026-03-08T00:00:00.000Z', creditBalanceDays: 5 });

      const result = await credits.recordUsage('user-1', 'sale.create');

      expect(result).toMatchObject({ creditDeducted: 0, newBalance: 5, status: 'TRIAL' });
      expect((await readAccount(store, 'user-1'))?.lastUsageTimestamp).toBe('2026-03-10T09:00:00.000Z');
    });

    it('never takes the balance below zero', async () => {
      seedAccount(store, 'user-1', { creditBalanceDays: 2.5 });
      const balances: number[] = [];

      for (let day = 0; day < 3; day++) {
        balances.push((await credits.recordUsage('user-1', 'sale.create')).newBalance);
        time.advanceDays(1);
      }

      expect(balances).toEqual([1.5, 0.5, 0]);
      await expect(credits.recordUsage('user-1', 'sale.create')).rejects.toBeInstanceOf(InsufficientCreditError);
      expect((await readAccount(store, 'user-1'))?.creditBalanceDays).toBe(0);
    });

    it('blocks a user with no trial and no credit without touching the account', async () => {
      seedAccount(store, 'user-1', { creditBalanceDays: 0 });

      const attempt = credits.recordUsage('user-1', 'sale.create');

      await expect(attempt).rejects.toBeInstanceOf(InsufficientCreditError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 402, data: { requiredPayment: true, creditBalanceDays: 0 } });
      expect((await readAccount(store, 'user-1'))?.lastUsageTimestamp).toBeNull();
      expect(await credits.listUsage('user-1')).toEqual([]);
    });

    it('debits once when two usages race on the same day', async () => {
      seedAccount(store, 'user-1', { creditBalanceDays: 3 });

      const results = await Promise.all([
        credits.recordUsage('user-1', 'sale.create'),
        credits.recordUsage('user-1', 'sale.create'),
      ]);

      expect(results.map((r) => r.creditDeducted).sort()).toEqual([0, 1]);
      expect((await readAccount(store, 'user-1'))?.creditBalanceDays).toBe(2);
      expect(store.count(COLLECTIONS.usageLogs)).toBe(2);
    });

    it('lists usage for one user through a per-user query', async () => {
      seedAccount(store, 'user-1', { creditBalanceDays: 3 });
      seedAccount(store, 'user-2', { creditBalanceDays: 3 });
      await credits.recordUsage('user-1', 'sale.create');
      await credits.recordUsage('user-2', 'report.view');
      const scan = jest.spyOn(store, 'queryAll');
      const query = jest.spyOn(store, 'queryWhere');

      const usage = await credits.listUsage('user-1');

      expect(usage.map((entry) => [entry.userKey, entry.actionType])).toEqual([['user-1', 'sale.create']]);
      expect(query).toHaveBeenCalledWith(COLLECTIONS.usageLogs, { userKey: 'user-1' });
      expect(scan).not.toHaveBeenCalledWith(COLLECTIONS.usageLogs);
    });

    it('rejects usage for an unknown account', async () => {
      await expect(credits.debitForUsage('ghost', 'sale.create', time.clock())).rejects.toMatchObject({
        statusCode: 404,
        code: 'NOT_FOUND',
      });
    });
  });

  describe('payments', () => {
    it('credits a completed payment exactly once', async () => {
      seedAccount(store, 'user-1');
      const payment = seedPayment(store, { paymentId: 'pay-1', userKey: 'user-1', amount: 1000, status: 'completed' });

      const first = await credits.creditFromPayment(payment, time.clock());
      const second = await credits.creditFromPayment(payment, time.clock());

      expect(first).toEqual({ applied: true, creditDays: 200, newBalance: 200 });
      expect(second).toEqual({ applied: false, creditDays: 200, newBalance: 200 });

      const account = await readAccount(store, 'user-1');
      expect(account).toMatchObject({
        creditBalanceDays: 200,
        totalPaymentsAmount: 1000,
        lastPaymentTimestamp: '2026-03-10T09:00:00.000Z',
        monthlyPaidKey: '2026-03',
        monthlyPaidAmount: 1000,
      });
      expect(store.peek(COLLECTIONS.payments, 'pay-1')).toMatchObject({
        creditAppliedAt: '2026-03-10T09:00:00.000Z',
        creditDaysApplied: 200,
      });
      expect(account && credits.remainingTopUp(account, time.clock())).toBe(800);
    });

    it('restores the monthly allowance in a new month', async () => {
      const account = seedAccount(store, 'user-1', { monthlyPaidKey: '2026-02', monthlyPaidAmount: 1800 });
      expect(credits.remainingTopUp(account, time.clock())).toBe(1800);
    });

    it('creates the account when crediting a payment for an unknown user', async () => {
      const payment = seedPayment(store, { paymentId: 'pay-2', userKey: 'user-2', amount: 25, status: 'completed' });

      const result = await credits.creditFromPayment(payment, time.clock());

      expect(result).toEqual({ applied: true, creditDays: 5, newBalance: 5 });
      expect((await readAccount(store, 'user-2'))?.creditBalanceDays).toBe(5);
    });

    it('credits two different payments that race for the same account', async () => {
      seedAccount(store, 'user-1');
      const a = seedPayment(store, { paymentId: 'pay-a', userKey: 'user-1', amount: 50, status: 'completed' });
      const b = seedPayment(store, { paymentId: 'pay-b', userKey: 'user-1', amount: 100, status: 'completed' });

      await Promise.all([credits.creditFromPayment(a, time.clock()), credits.creditFromPayment(b, time.clock())]);

      expect((await readAccount(store, 'user-1'))?.creditBalanceDays).toBe(30);
    });

    it('applies both a usage debit and a payment credit that race for the same account', async () => {
      seedAccount(store, 'user-1', { creditBalanceDays: 3 });
      const payment = seedPayment(store, { paymentId: 'pay-r', userKey: 'user-1', amount: 1000, status: 'completed' });

      const [usage, credit] = await Promise.all([
        credits.recordUsage('user-1', 'sale.create'),
        credits.creditFromPayment(payment, time.clock()),
      ]);

      expect(usage.creditDeducted).toBe(1);
      expect(credit.applied).toBe(true);
      expect((await readAccount(store, 'user-1'))?.creditBalanceDays).toBe(202);
      expect(store.count(COLLECTIONS.usageLogs)).toBe(1);
      expect(store.peek(COLLECTIONS.payments, 'pay-r')).toMatchObject({
        creditAppliedAt: '2026-03-10T09:00:00.000Z',
        creditDaysApplied: 200,
      });
    });

    it('refuses to credit a payment that has not completed', async () => {
      const payment = seedPayment(store, { paymentId: 'pay-3', userKey: 'user-1', status: 'pending' });

      await expect(credits.creditFromPayment(payment, time.clock())).rejects.toBeInstanceOf(LedgerInvariantError);
      await expect(credits.creditFromPayment(payment, time.clock())).rejects.toBeInstanceOf(ApiError);
    });
  });
});
