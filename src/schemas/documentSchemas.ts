import { z } from 'zod';

// Stored documents are flat key/value records; instants are ISO-8601 strings.
// Fields added after the first release are nullish on read so older
// documents still parse.

const nullableString = z.string().nullish().transform((v) => v ?? null);
const numberOrZero = z.number().nullish().transform((v) => v ?? 0);

export const PAYMENT_PROVIDERS = ['push-payment', 'hosted-checkout', 'direct-card'] as const;
export const PAYMENT_STATUSES = ['initiated', 'pending', 'completed', 'failed'] as const;

export const PaymentProviderSchema = z.enum(PAYMENT_PROVIDERS);
export const PaymentStatusSchema = z.enum(PAYMENT_STATUSES);

export const UserAccountSchema = z.object({
  userKey: z.string().min(1),
  creditBalanceDays: z.number().min(0),
  registrationTimestamp: nullableString,
  lastUsageTimestamp: nullableString,
  totalPaymentsAmount: numberOrZero,
  trialResetAt: nullableString,
  lastPaymentTimestamp: nullableString,
  monthlyPaidKey: nullableString,
  monthlyPaidAmount: numberOrZero,
  email: nullableString,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const PaymentRecordSchema = z.object({
  paymentId: z.string().min(1),
  userKey: z.string().min(1),
  provider: PaymentProviderSchema,
  amount: z.number().positive(),
  currency: z.string().min(1),
  status: PaymentStatusSchema,
  providerReference: nullableString,
  creditDays: z.number().min(0),
  creditAppliedAt: nullableString,
  creditDaysApplied: z.number().nullish().transform((v) => v ?? null),
  failureReason: nullableString,
  providerData: z.record(z.string()).nullish().transform((v) => v ?? {}),
  payerPhone: nullableString,
  payerEmail: nullableString,
  createdAt: z.string(),
  updatedAt: z.string(),
  finalizedAt: nullableString,
});

export const PaymentReferenceSchema = z.object({
  provider: PaymentProviderSchema,
  providerReference: z.string().min(1),
  paymentId: z.string().min(1),
});

export const UsageLogEntrySchema = z.object({
  usageId: z.string().min(1),
  userKey: z.string().min(1),
  actionType: z.string().min(1),
  creditDelta: z.number(),
  resultingBalance: z.number().min(0),
  timestamp: z.string(),
});

export const ProviderNotificationRecordSchema = z.object({
  id: z.string().min(1),
  provider: PaymentProviderSchema,
  receivedAt: z.string(),
  rawPayload: z.string(),
  query: z.record(z.string()).nullish().transform((v) => v ?? {}),
  outcome: nullableString,
});

export const SchedulerMarkerSchema = z.object({
  jobName: z.string().min(1),
  lastRunDate: z.string(),
  lastRunAt: z.string(),
  // Markers written before run status was tracked count as finished runs.
  lastRunStatus: z.enum(['running', 'succeeded', 'failed']).default('succeeded'),
  lastError: z.string().nullish(),
});

export const FcmTokenSchema = z.object({
  token: z.string().min(1),
});

export const DebtEntrySchema = z.object({
  date: z.string().nullish(),
  debtAmount: z.union([z.string(), z.number()]).nullish(),
  description: z.string().nullish(),
  isComplete: z.boolean().nullish(),
});

export const DebtorSchema = z.object({
  accountName: z.string().nullish(),
  debts: z.record(DebtEntrySchema).nullish(),
});

export const UserDebtsSchema = z.object({
  debtors: z.record(DebtorSchema).nullish(),
});
