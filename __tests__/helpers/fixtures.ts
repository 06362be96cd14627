import { MemoryDocumentStore } from './memoryDocumentStore';
import { COLLECTIONS } from '../../src/repository/documentStore';
import { createUserAccountRepository } from '../../src/repository/userAccountRepository';
import { NotificationDispatcher } from '../../src/services/notificationService';
import { BillingConfig, UserAccount } from '../../src/types/credits';
import { NormalizedNotification, PaymentRecord } from '../../src/types/payments';
import { Clock, MS_PER_DAY } from '../../src/utils/calendar';

export const billingConfig = (overrides: Partial<BillingConfig> = {}): BillingConfig => ({
  dailyRate: 5,
  trialWindowDays: 14,
  currency: 'KES',
  minPaymentAmount: 10,
  monthlyCap: 150,
  maxPrepayMonths: 12,
  lowCreditThresholdDays: 2,
  webhookToleranceMinutes: 60,
  forceTrialEnd: false,
  resetOnLogin: false,
  trialResetEpoch: null,
  maxWriteAttempts: 5,
  ...overrides,
});

export interface TestClock {
  clock: Clock;
  set(iso: string): void;
  advance(ms: number): void;
  advanceDays(days: number): void;
}

export function createTestClock(startIso: string): TestClock {
  let current = new Date(startIso).getTime();
  return {
    clock: () => new Date(current),
    set(iso) {
      current = new Date(iso).getTime();
    },
    advance(ms) {
      current += ms;
    },
    advanceDays(days) {
      current += days * MS_PER_DAY;
    },
  };
}

export function seedAccount(store: MemoryDocumentStore, userKey: string, overrides: Partial<UserAccount> = {}): UserAccount {
  const account: UserAccount = {
    userKey,
    creditBalanceDays: 0,
    registrationTimestamp: '2026-01-01T00:00:00.000Z',
    lastUsageTimestamp: null,
    totalPaymentsAmount: 0,
    trialResetAt: '2026-01-01T00:00:00.000Z',
    lastPaymentTimestamp: null,
    monthlyPaidKey: null,
    monthlyPaidAmount: 0,
    email: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
  store.seed(COLLECTIONS.userAccounts, userKey, { ...account });
  return account;
}

export async function readAccount(store: MemoryDocumentStore, userKey: string): Promise<UserAccount | null> {
  const current = await createUserAccountRepository(store).read(userKey);
  return current ? current.account : null;
}

export function buildPayment(overrides: Partial<PaymentRecord> & Pick<PaymentRecord, 'paymentId' | 'userKey'>): PaymentRecord {
  const amount = overrides.amount ?? 100;
  return {
    provider: 'push-payment',
    amount,
    currency: 'KES',
    status: 'pending',
    providerReference: null,
    creditDays: amount / 5,
    creditAppliedAt: null,
    creditDaysApplied: null,
    failureReason: null,
    providerData: {},
    payerPhone: null,
    payerEmail: null,
    createdAt: '2026-03-10T08:00:00.000Z',
    updatedAt: '2026-03-10T08:00:00.000Z',
    finalizedAt: null,
    ...overrides,
  };
}

export function seedPayment(store: MemoryDocumentStore, overrides: Partial<PaymentRecord> & Pick<PaymentRecord, 'paymentId' | 'userKey'>): PaymentRecord {
  const payment = buildPayment(overrides);
  store.seed(COLLECTIONS.payments, payment.paymentId, { ...payment });
  if (payment.providerReference) {
    store.seed(COLLECTIONS.paymentReferences, `${payment.provider}_${payment.providerReference}`, {
      provider: payment.provider,
      providerReference: payment.providerReference,
      paymentId: payment.paymentId,
    });
  }
  return payment;
}

export function notification(overrides: Partial<NormalizedNotification> = {}): NormalizedNotification {
  return {
    paymentId: null,
    providerReference: null,
    status: 'completed',
    amount: null,
    currency: null,
    failureReason: null,
    providerData: {},
    ...overrides,
  };
}

export interface SentNotification {
  userKey: string;
  title: string;
  body: string;
  data: Record<string, string>;
}

/** Dispatcher that records every message; users in `unreachable` are not delivered to. */
export function createRecordingDispatcher(unreachable: string[] = []): NotificationDispatcher & { sent: SentNotification[] } {
  const sent: SentNotification[] = [];
  return {
    sent,
    async send(userKey, title, body, data) {
      sent.push({ userKey, title, body, data });
      return !unreachable.includes(userKey);
    },
  };
}
