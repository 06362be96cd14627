import { z } from 'zod';
import {
  PAYMENT_PROVIDERS,
  PaymentRecordSchema,
  PaymentStatusSchema,
  ProviderNotificationRecordSchema,
} from '../schemas/documentSchemas';

export type PaymentProvider = typeof PAYMENT_PROVIDERS[number];
export type PaymentStatus = z.infer<typeof PaymentStatusSchema>;
export type PaymentRecord = z.infer<typeof PaymentRecordSchema>;
export type ProviderNotificationRecord = z.infer<typeof ProviderNotificationRecordSchema>;

export function isPaymentProvider(value: string): value is PaymentProvider {
  return PAYMENT_PROVIDERS.some((provider) => provider === value);
}

export interface PayerInfo {
  phone?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  /** Tokenized card from the provider's hosted fields; raw card data never reaches this service. */
  transientToken?: string;
}

/**
 * Provider payloads are resolved into this shape at the adapter boundary, so
 * the reconciler never sees provider-specific fields.
 */
export interface NormalizedNotification {
  paymentId: string | null;
  providerReference: string | null;
  status: 'pending' | 'completed' | 'failed';
  amount: number | null;
  currency: string | null;
  failureReason: string | null;
  providerData: Record<string, string>;
}

export interface InboundNotification {
  rawPayload: string;
  headers: Record<string, string | undefined>;
  query: Record<string, string>;
}

export type ProviderInstructions =
  | { kind: 'push-prompt'; customerMessage: string }
  | { kind: 'redirect'; redirectUrl: string }
  | { kind: 'card-result'; decision: string };

export interface ProviderInitiateRequest {
  paymentId: string;
  userKey: string;
  amount: number;
  currency: string;
  payer: PayerInfo;
  now: Date;
}

export interface ProviderInitiateResult {
  providerReference: string | null;
  instructions: ProviderInstructions;
  /** Set when the provider answered with an authoritative result synchronously. */
  immediate: NormalizedNotification | null;
}

export type NotificationOutcome = 'applied' | 'duplicate' | 'unresolved' | 'ignored' | 'rejected';

export interface PaymentProviderAdapter {
  readonly provider: PaymentProvider;
  readonly wholeAmountsOnly: boolean;
  initiate(request: ProviderInitiateRequest): Promise<ProviderInitiateResult>;
  /** Authenticates and normalizes an inbound notification; throws SignatureInvalidError. */
  parseNotification(inbound: InboundNotification, now: Date): Promise<NormalizedNotification[]>;
  /** Resolves null when the provider holds no record of the payment. */
  pollStatus?(payment: PaymentRecord, now: Date): Promise<NormalizedNotification | null>;
  /** Set when pollStatus can find a payment by its paymentId alone. */
  readonly pollsWithoutReference?: boolean;
  createCaptureContext?(request: CaptureContextRequest): Promise<CaptureContext>;
  acknowledgement(inbound: InboundNotification, outcomes: NotificationOutcome[]): Record<string, unknown>;
}

export interface CaptureContextRequest {
  /** Origins allowed to host the card form; the provider's default when empty. */
  targetOrigins: string[];
  amount: number;
  currency: string;
  now: Date;
}

/** Short-lived JWT the client uses to render card fields and mint a transient token. */
export interface CaptureContext {
  captureContext: string;
  targetOrigins: string[];
}

export interface InitiatePaymentInput {
  userKey: string;
  amount: number;
  provider: PaymentProvider;
  payer: PayerInfo;
}

export interface InitiatePaymentResult {
  paymentId: string;
  status: PaymentStatus;
  creditDays: number;
  providerReference: string | null;
  providerInstructions: ProviderInstructions;
}

export interface NotificationAcknowledgement {
  notificationId: string;
  outcomes: NotificationOutcome[];
  body: Record<string, unknown>;
}

export interface ReconcileSummary {
  polled: number;
  updated: number;
  repaired: number;
  failures: number;
}
