// Centralized environment configuration
// Loads .env via index.ts (dotenv.config) at process start

export type ProviderEnvironment = 'sandbox' | 'production';

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  publicBaseUrl: string;
  corsOrigins: string[];
  // Logging
  logLevel: string;
  requestLogFile?: string;
  // Cron endpoints
  cronSecretKey?: string;
  sweepTimezone: string;
  lowCreditSchedule: string;
  debtReminderSchedule: string;
  trialResetSchedule: string;
  paymentReconcileSchedule: string;
  paymentReconcileGraceMinutes: number;
  // Billing
  dailyRate: number;
  trialWindowDays: number;
  billingCurrency: string;
  minPaymentAmount: number;
  monthlyCap: number;
  maxPrepayMonths: number;
  lowCreditThresholdDays: number;
  webhookToleranceMinutes: number;
  forceTrialEnd: boolean;
  resetUsersOnLogin: boolean;
  trialResetEpoch?: string;
  ledgerMaxWriteAttempts: number;
  // M-Pesa Daraja (push-payment)
  mpesaEnv: ProviderEnvironment;
  mpesaConsumerKey?: string;
  mpesaConsumerSecret?: string;
  mpesaShortCode: string;
  mpesaTillNumber?: string;
  mpesaPasskey?: string;
  mpesaCallbackSecret?: string;
  mpesaTimeoutMs: number;
  // PesaPal (hosted-checkout)
  pesapalEnv: ProviderEnvironment;
  pesapalConsumerKey?: string;
  pesapalConsumerSecret?: string;
  pesapalIpnId?: string;
  pesapalReturnUrl?: string;
  pesapalTimeoutMs: number;
  // CyberSource (direct-card)
  cybersourceEnv: ProviderEnvironment;
  cybersourceMerchantId?: string;
  cybersourceApiKeyId?: string;
  cybersourceSecretKey?: string;
  cybersourceWebhookSecret?: string;
  cybersourceTimeoutMs: number;
  /** Origins allowed to host the card form; defaults to the public base URL's origin. */
  cybersourceTargetOrigins: string[];
}

function normalizeBoolean(value: string | undefined, defaultTrue: boolean): boolean {
  if (value == null) return defaultTrue;
  const v = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return defaultTrue;
}

function normalizeNumber(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function normalizeProviderEnv(value: string | undefined): ProviderEnvironment {
  return value === 'production' ? 'production' : 'sandbox';
}

function optional(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

export const env: EnvConfig = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: normalizeNumber(process.env.PORT, 5001),
  publicBaseUrl: (process.env.PUBLIC_BASE_URL || 'http://localhost:5001').replace(/\/$/, ''),
  corsOrigins: (process.env.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
  logLevel: process.env.LOG_LEVEL || 'info',
  requestLogFile: optional(process.env.REQUEST_LOG_FILE),
  // Falls back to no auth on cron routes when unset (local development)
  cronSecretKey: optional(process.env.CRON_SECRET_KEY),
  sweepTimezone: process.env.SWEEP_TIMEZONE || 'Africa/Nairobi',
  lowCreditSchedule: process.env.LOW_CREDIT_SCHEDULE || '0 8 * * *',
  debtReminderSchedule: process.env.DEBT_REMINDER_SCHEDULE || '0 9 * * *',
  trialResetSchedule: process.env.TRIAL_RESET_SCHEDULE || '30 0 * * *',
  paymentReconcileSchedule: process.env.PAYMENT_RECONCILE_SCHEDULE || '*/5 * * * *',
  paymentReconcileGraceMinutes: normalizeNumber(process.env.PAYMENT_RECONCILE_GRACE_MINUTES, 3),
  dailyRate: normalizeNumber(process.env.DAILY_RATE, 5),
  trialWindowDays: normalizeNumber(process.env.FREE_TRIAL_DAYS, 14),
  billingCurrency: process.env.BILLING_CURRENCY || 'KES',
  minPaymentAmount: normalizeNumber(process.env.MIN_PAYMENT_AMOUNT, 10),
  monthlyCap: normalizeNumber(process.env.MONTHLY_CAP, 150),
  maxPrepayMonths: normalizeNumber(process.env.MAX_PREPAY_MONTHS, 12),
  lowCreditThresholdDays: normalizeNumber(process.env.LOW_CREDIT_THRESHOLD_DAYS, 2),
  webhookToleranceMinutes: normalizeNumber(process.env.WEBHOOK_TOLERANCE_MINUTES, 60),
  forceTrialEnd: normalizeBoolean(process.env.FORCE_TRIAL_END, false),
  resetUsersOnLogin: normalizeBoolean(process.env.RESET_USERS_ON_LOGIN, false),
  trialResetEpoch: optional(process.env.TRIAL_RESET_EPOCH),
  ledgerMaxWriteAttempts: normalizeNumber(process.env.LEDGER_MAX_WRITE_ATTEMPTS, 5),
  mpesaEnv: normalizeProviderEnv(process.env.MPESA_ENV),
  mpesaConsumerKey: optional(process.env.MPESA_CONSUMER_KEY),
  mpesaConsumerSecret: optional(process.env.MPESA_CONSUMER_SECRET),
  mpesaShortCode: process.env.MPESA_SHORT_CODE || '174379',
  mpesaTillNumber: optional(process.env.MPESA_TILL_NUMBER),
  mpesaPasskey: optional(process.env.MPESA_PASSKEY),
  mpesaCallbackSecret: optional(process.env.MPESA_CALLBACK_SECRET),
  mpesaTimeoutMs: normalizeNumber(process.env.MPESA_TIMEOUT_MS, 30000),
  pesapalEnv: normalizeProviderEnv(process.env.PESAPAL_ENV),
  pesapalConsumerKey: optional(process.env.PESAPAL_CONSUMER_KEY),
  pesapalConsumerSecret: optional(process.env.PESAPAL_CONSUMER_SECRET),
  pesapalIpnId: optional(process.env.PESAPAL_IPN_ID),
  pesapalReturnUrl: optional(process.env.PESAPAL_RETURN_URL),
  pesapalTimeoutMs: normalizeNumber(process.env.PESAPAL_TIMEOUT_MS, 20000),
  cybersourceEnv: normalizeProviderEnv(process.env.CYBERSOURCE_ENV),
  cybersourceMerchantId: optional(process.env.CYBERSOURCE_MERCHANT_ID),
  cybersourceApiKeyId: optional(process.env.CYBERSOURCE_API_KEY_ID),
  cybersourceSecretKey: optional(process.env.CYBERSOURCE_SECRET_KEY),
  cybersourceWebhookSecret: optional(process.env.CYBERSOURCE_WEBHOOK_SECRET),
  cybersourceTimeoutMs: normalizeNumber(process.env.CYBERSOURCE_TIMEOUT_MS, 30000),
  cybersourceTargetOrigins: (process.env.CYBERSOURCE_TARGET_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
};
