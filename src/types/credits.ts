import { z } from 'zod';
import {
  UsageLogEntrySchema,
  UserAccountSchema,
} from '../schemas/documentSchemas';

export type UserAccount = z.infer<typeof UserAccountSchema>;
export type UsageLogEntry = z.infer<typeof UsageLogEntrySchema>;

export type EntitlementStatus = 'TRIAL' | 'ACTIVE' | 'BLOCKED';

export interface Entitlement {
  status: EntitlementStatus;
  daysRemaining: number;
  /** Account has no trial start; the ledger must reset it before granting a trial. */
  requiresTrialReset: boolean;
}

export interface EntitlementPolicy {
  trialWindowDays: number;
  forceTrialEnd?: boolean;
}

export interface BillingConfig {
  dailyRate: number;
  trialWindowDays: number;
  currency: string;
  minPaymentAmount: number;
  monthlyCap: number;
  maxPrepayMonths: number;
  lowCreditThresholdDays: number;
  webhookToleranceMinutes: number;
  forceTrialEnd: boolean;
  resetOnLogin: boolean;
  /** Accounts reset before this instant are reset once more while resetOnLogin is on. */
  trialResetEpoch: string | null;
  maxWriteAttempts: number;
}

export interface AccountProfile {
  email?: string | null;
}

export interface EntitlementReport {
  userKey: string;
  status: EntitlementStatus;
  daysRemaining: number;
  creditBalanceDays: number;
  totalPayments: number;
  lastUsageTimestamp: string | null;
  trialEndsAt: string | null;
  billing: {
    dailyRate: number;
    currency: string;
    monthlyCap: number;
    maxPrepayMonths: number;
    maxTopUp: number;
  };
}

export interface UsageResult {
  newBalance: number;
  creditDeducted: number;
  status: EntitlementStatus;
  usageId: string;
}

export interface CreditResult {
  /** False when the payment had already been credited. */
  applied: boolean;
  creditDays: number;
  newBalance: number;
}
