import { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  InboundNotification,
  NormalizedNotification,
  PaymentProviderAdapter,
  PaymentRecord,
  ProviderInitiateRequest,
  ProviderInitiateResult,
} from '../../types/payments';
import { ApiError, ProviderRejectedError, SignatureInvalidError } from '../../utils/errorHandler';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { toProviderError } from './providerErrors';

const PROVIDER = 'hosted-checkout' as const;
const TOKEN_TTL_MS = 4 * 60 * 1000;

export interface HostedCheckoutConfig {
  consumerKey: string;
  consumerSecret: string;
  /** Pre-registered IPN id; registered on first use when absent. */
  ipnId?: string;
  publicBaseUrl: string;
  returnUrl: string;
}

const ProviderErrorSchema = z
  .object({ message: z.string().nullish(), code: z.string().nullish() })
  .nullish();

const TokenResponseSchema = z.object({
  token: z.string().nullish(),
  error: ProviderErrorSchema,
});

const RegisterIpnResponseSchema = z.object({
  ipn_id: z.string().nullish(),
  error: ProviderErrorSchema,
});

const SubmitOrderResponseSchema = z.object({
  order_tracking_id: z.string().nullish(),
  merchant_reference: z.string().nullish(),
  redirect_url: z.string().nullish(),
  error: ProviderErrorSchema,
});

const TransactionStatusSchema = z.object({
  status_code: z.number().nullish(),
  payment_status_description: z.string().nullish(),
  amount: z.number().nullish(),
  currency: z.string().nullish(),
  merchant_reference: z.string().nullish(),
  confirmation_code: z.string().nullish(),
  payment_method: z.string().nullish(),
  payment_account: z.string().nullish(),
  description: z.string().nullish(),
});

const IpnSchema = z.object({
  OrderTrackingId: z.string().min(1),
  OrderNotificationType: z.string().nullish(),
  OrderMerchantReference: z.string().nullish(),
});

type TransactionStatus = z.infer<typeof TransactionStatusSchema>;

function readIpnFields(inbound: InboundNotification): Record<string, unknown> {
  if (inbound.query.OrderTrackingId) return { ...inbound.query };
  if (!inbound.rawPayload) return {};
  try {
    const body: unknown = JSON.parse(inbound.rawPayload);
    const parsed = z.record(z.unknown()).safeParse(body);
    if (parsed.success) return parsed.data;
  } catch {
    return Object.fromEntries(new URLSearchParams(inbound.rawPayload));
  }
  return {};
}

// 1 COMPLETED, 2 FAILED, 3 REVERSED; 0 (INVALID) means nothing has been paid yet.
function toNotification(trackingId: string, status: TransactionStatus): NormalizedNotification {
  const description = status.payment_status_description ?? '';
  const providerData: Record<string, string> = { statusDescription: description };
  if (status.confirmation_code) providerData.confirmationCode = status.confirmation_code;
  if (status.payment_method) providerData.paymentMethod = status.payment_method;
  if (status.payment_account) providerData.paymentAccount = status.payment_account;

  const base: NormalizedNotification = {
    paymentId: status.merchant_reference ?? null,
    providerReference: trackingId,
    status: 'pending',
    amount: status.amount ?? null,
    currency: status.currency ?? null,
    failureReason: null,
    providerData,
  };

  switch (status.status_code) {
    case 1:
      return { ...base, status: 'completed' };
    case 2:
      return { ...base, status: 'failed', failureReason: description ? description.toLowerCase() : 'failed' };
    case 3:
      return { ...base, status: 'failed', failureReason: 'reversed' };
    default:
      return { ...base, amount: null };
  }
}

/**
 * PesaPal v3 hosted checkout. IPNs are unsigned, so every notification is
 * answered from the provider's own transaction status.
 */
export function createHostedCheckoutAdapter(config: HostedCheckoutConfig, http: AxiosInstance, log: Logger = rootLogger): PaymentProviderAdapter {
  let cachedToken: { value: string; expiresAt: number } | null = null;
  let ipnId: string | null = config.ipnId ?? null;

  async function accessToken(now: Date): Promise<string> {
    if (cachedToken && cachedToken.expiresAt > now.getTime()) return cachedToken.value;
    let body: z.infer<typeof TokenResponseSchema>;
    try {
      const res = await http.post('/api/Auth/RequestToken', {
        consumer_key: config.consumerKey,
        consumer_secret: config.consumerSecret,
      });
      body = TokenResponseSchema.parse(res.data);
    } catch (err) {
      throw toProviderError(PROVIDER, 'token', err);
    }
    if (!body.token) throw new ProviderRejectedError(PROVIDER, body.error?.message ?? 'token_unavailable');
    cachedToken = { value: body.token, expiresAt: now.getTime() + TOKEN_TTL_MS };
    return body.token;
  }

  async function notificationId(token: string): Promise<string> {
    if (ipnId) return ipnId;
    let body: z.infer<typeof RegisterIpnResponseSchema>;
    try {
      const res = await http.post(
        '/api/URLSetup/RegisterIPN',
        { url: `${config.publicBaseUrl}/api/webhooks/${PROVIDER}`, ipn_notification_type: 'POST' },
        { headers: { Authorization: `Bearer ${token}` } }
      );
      body = RegisterIpnResponseSchema.parse(res.data);
    } catch (err) {
      throw toProviderError(PROVIDER, 'register_ipn', err);
    }
    if (!body.ipn_id) throw new ProviderRejectedError(PROVIDER, body.error?.message ?? 'ipn_registration_failed');
    ipnId = body.ipn_id;
    log.info({ ipnId }, '[HOSTED] IPN URL registered');
    return body.ipn_id;
  }

  async function transactionStatus(trackingId: string, now: Date): Promise<TransactionStatus> {
    const token = await accessToken(now);
    try {
      const res = await http.get('/api/Transactions/GetTransactionStatus', {
        params: { orderTrackingId: trackingId },
        headers: { Authorization: `Bearer ${token}` },
      });
      return TransactionStatusSchema.parse(res.data);
    } catch (err) {
      throw toProviderError(PROVIDER, 'transaction_status', err);
    }
  }

  return {
    provider: PROVIDER,
    wholeAmountsOnly: false,

    async initiate(request: ProviderInitiateRequest): Promise<ProviderInitiateResult> {
      const token = await accessToken(request.now);
      const notification = await notificationId(token);

      let body: z.infer<typeof SubmitOrderResponseSchema>;
      try {
        const res = await http.post(
          '/api/Transactions/SubmitOrderRequest',
          {
            id: request.paymentId,
            currency: request.currency,
            amount: request.amount,
            description: 'Credit top-up',
            callback_url: config.returnUrl,
            redirect_mode: 'TOP_WINDOW',
            notification_id: notification,
            billing_address: {
              email_address: request.payer.email ?? '',
              phone_number: request.payer.phone ?? '',
              country_code: 'KE',
              first_name: request.payer.firstName ?? '',
              last_name: request.payer.lastName ?? '',
            },
          },
          { headers: { Authorization: `Bearer ${token}` } }
        );
        body = SubmitOrderResponseSchema.parse(res.data);
      } catch (err) {
        throw toProviderError(PROVIDER, 'submit_order', err);
      }

      if (!body.order_tracking_id || !body.redirect_url) {
        throw new ProviderRejectedError(PROVIDER, body.error?.message ?? 'order_not_created', body.error);
      }

      log.info({ paymentId: request.paymentId, orderTrackingId: body.order_tracking_id }, '[HOSTED] Checkout order created');
      return {
        providerReference: body.order_tracking_id,
        instructions: { kind: 'redirect', redirectUrl: body.redirect_url },
        immediate: null,
      };
    },

    async parseNotification(inbound: InboundNotification, now: Date): Promise<NormalizedNotification[]> {
      const ipn = IpnSchema.safeParse(readIpnFields(inbound));
      if (!ipn.success) {
        throw new ApiError('Malformed notification payload', 400, { provider: PROVIDER }, 'BAD_REQUEST');
      }

      const { OrderTrackingId, OrderMerchantReference } = ipn.data;
      const status = await transactionStatus(OrderTrackingId, now);
      if (OrderMerchantReference && status.merchant_reference && status.merchant_reference !== OrderMerchantReference) {
        throw new SignatureInvalidError(PROVIDER, 'merchant_reference_mismatch');
      }

      const normalized = toNotification(OrderTrackingId, status);
      log.info({ orderTrackingId: OrderTrackingId, status: normalized.status }, '[HOSTED] IPN resolved against transaction status');
      return [normalized];
    },

    async pollStatus(payment: PaymentRecord, now: Date): Promise<NormalizedNotification> {
      if (!payment.providerReference) {
        return {
          paymentId: payment.paymentId,
          providerReference: null,
          status: 'pending',
          amount: null,
          currency: null,
          failureReason: null,
          providerData: {},
        };
      }
      const status = await transactionStatus(payment.providerReference, now);
      return toNotification(payment.providerReference, status);
    },

    acknowledgement(inbound: InboundNotification) {
      const fields = readIpnFields(inbound);
      return {
        orderNotificationType: typeof fields.OrderNotificationType === 'string' ? fields.OrderNotificationType : 'IPNCHANGE',
        orderTrackingId: typeof fields.OrderTrackingId === 'string' ? fields.OrderTrackingId : '',
        orderMerchantReference: typeof fields.OrderMerchantReference === 'string' ? fields.OrderMerchantReference : '',
        status: 200,
      };
    },
  };
}
