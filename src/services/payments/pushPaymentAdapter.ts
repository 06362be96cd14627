import axios, { AxiosInstance } from 'axios';
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
import { hmacSha256, verifyTimestampedSignature } from '../../utils/webhookSignature';
import { toProviderError } from './providerErrors';

const PROVIDER = 'push-payment' as const;
const EAT_OFFSET_MS = 3 * 60 * 60 * 1000;
const STILL_PROCESSING = '500.001.1001';

export interface PushPaymentConfig {
  consumerKey: string;
  consumerSecret: string;
  shortCode: string;
  tillNumber?: string;
  passkey: string;
  callbackSecret: string;
  publicBaseUrl: string;
  toleranceMs: number;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([z.string(), z.number()]).optional(),
});

const StkPushResponseSchema = z.object({
  ResponseCode: z.union([z.string(), z.number()]).transform(String),
  ResponseDescription: z.string().optional(),
  CheckoutRequestID: z.string().optional(),
  MerchantRequestID: z.string().optional(),
  CustomerMessage: z.string().optional(),
});

const StkQueryResponseSchema = z.object({
  ResponseCode: z.union([z.string(), z.number()]).transform(String).optional(),
  ResultCode: z.union([z.string(), z.number()]).transform(String).optional(),
  ResultDesc: z.string().optional(),
});

const MetadataItemSchema = z.object({
  Name: z.string(),
  Value: z.union([z.string(), z.number()]).optional(),
});

const StkCallbackSchema = z.object({
  Body: z.object({
    stkCallback: z.object({
      MerchantRequestID: z.string().optional(),
      CheckoutRequestID: z.string(),
      ResultCode: z.union([z.string(), z.number()]).transform(String),
      ResultDesc: z.string().optional(),
      CallbackMetadata: z.object({ Item: z.array(MetadataItemSchema) }).optional(),
    }),
  }),
});

const FAILURE_REASONS: Record<string, string> = {
  '1': 'insufficient_funds',
  '1032': 'cancelled_by_user',
  '1037': 'user_unreachable',
  '2001': 'invalid_pin',
};

/** `YYYYMMDDHHmmss` in East Africa Time. */
export function darajaTimestamp(now: Date): string {
  return new Date(now.getTime() + EAT_OFFSET_MS).toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

function resultStatus(resultCode: string): { status: 'completed' | 'failed'; failureReason: string | null } {
  if (resultCode === '0') return { status: 'completed', failureReason: null };
  return { status: 'failed', failureReason: FAILURE_REASONS[resultCode] ?? `result_code_${resultCode}` };
}

function processingErrorCode(err: unknown): string | null {
  if (!axios.isAxiosError(err) || !err.response) return null;
  const parsed = z.object({ errorCode: z.string() }).safeParse(err.response.data);
  return parsed.success ? parsed.data.errorCode : null;
}

/**
 * Daraja STK push. The callback URL carries a signed `ref` so the callback
 * can be authenticated and tied to its payment without trusting the body.
 */
export function createPushPaymentAdapter(config: PushPaymentConfig, http: AxiosInstance, log: Logger = rootLogger): PaymentProviderAdapter {
  let cachedToken: { value: string; expiresAt: number } | null = null;

  async function accessToken(now: Date): Promise<string> {
    if (cachedToken && cachedToken.expiresAt > now.getTime()) return cachedToken.value;
    try {
      const res = await http.get('/oauth/v1/generate', {
        params: { grant_type: 'client_credentials' },
        auth: { username: config.consumerKey, password: config.consumerSecret },
      });
      const token = TokenResponseSchema.parse(res.data);
      const ttlSeconds = Number(token.expires_in ?? 3599);
      cachedToken = { value: token.access_token, expiresAt: now.getTime() + Math.max(0, ttlSeconds - 60) * 1000 };
      return token.access_token;
    } catch (err) {
      throw toProviderError(PROVIDER, 'token', err);
    }
  }

  function password(timestamp: string): string {
    return Buffer.from(`${config.shortCode}${config.passkey}${timestamp}`).toString('base64');
  }

  function callbackUrl(paymentId: string, now: Date): string {
    const t = String(now.getTime());
    const sig = hmacSha256(config.callbackSecret, `${t}.${paymentId}`, 'hex');
    const query = new URLSearchParams({ ref: paymentId, t, sig });
    return `${config.publicBaseUrl}/api/webhooks/${PROVIDER}?${query.toString()}`;
  }

  return {
    provider: PROVIDER,
    wholeAmountsOnly: true,

    async initiate(request: ProviderInitiateRequest): Promise<ProviderInitiateResult> {
      const phone = request.payer.phone;
      if (!phone) throw new ApiError('Phone number is required', 400, { provider: PROVIDER }, 'BAD_REQUEST');

      const token = await accessToken(request.now);
      const timestamp = darajaTimestamp(request.now);
      const payload = {
        BusinessShortCode: config.shortCode,
        Password: password(timestamp),
        Timestamp: timestamp,
        TransactionType: 'CustomerBuyGoodsOnline',
        Amount: Math.round(request.amount),
        PartyA: phone,
        PartyB: config.tillNumber ?? config.shortCode,
        PhoneNumber: phone,
        CallBackURL: callbackUrl(request.paymentId, request.now),
        AccountReference: request.paymentId.slice(0, 12),
        TransactionDesc: 'Credit top-up',
      };

      let body: z.infer<typeof StkPushResponseSchema>;
      try {
        const res = await http.post('/mpesa/stkpush/v1/processrequest', payload, {
          headers: { Authorization: `Bearer ${token}` },
        });
        body = StkPushResponseSchema.parse(res.data);
      } catch (err) {
        throw toProviderError(PROVIDER, 'stk_push', err);
      }

      if (body.ResponseCode !== '0' || !body.CheckoutRequestID) {
        throw new ProviderRejectedError(PROVIDER, body.ResponseDescription ?? `response_code_${body.ResponseCode}`);
      }

      log.info({ paymentId: request.paymentId, checkoutRequestId: body.CheckoutRequestID }, '[PUSH] STK push accepted');
      return {
        providerReference: body.CheckoutRequestID,
        instructions: {
          kind: 'push-prompt',
          customerMessage: body.CustomerMessage ?? 'Check your phone to complete the payment',
        },
        immediate: null,
      };
    },

    async parseNotification(inbound: InboundNotification, now: Date): Promise<NormalizedNotification[]> {
      const paymentId = inbound.query.ref;
      const check = verifyTimestampedSignature({
        timestamp: inbound.query.t,
        signature: inbound.query.sig,
        signedContent: paymentId ?? '',
        secret: config.callbackSecret,
        encoding: 'hex',
        now,
        toleranceMs: config.toleranceMs,
      });
      if (!check.ok) throw new SignatureInvalidError(PROVIDER, check.reason);

      let json: unknown;
      try {
        json = JSON.parse(inbound.rawPayload);
      } catch {
        throw new ApiError('Malformed notification payload', 400, { provider: PROVIDER }, 'BAD_REQUEST');
      }
      const parsed = StkCallbackSchema.safeParse(json);
      if (!parsed.success) {
        throw new ApiError('Malformed notification payload', 400, { provider: PROVIDER, issues: parsed.error.issues }, 'BAD_REQUEST');
      }

      const callback = parsed.data.Body.stkCallback;
      const metadata: Record<string, string> = {};
      for (const item of callback.CallbackMetadata?.Item ?? []) {
        if (item.Value !== undefined) metadata[item.Name] = String(item.Value);
      }
      const { status, failureReason } = resultStatus(callback.ResultCode);
      const amount = metadata.Amount !== undefined ? Number(metadata.Amount) : null;

      const providerData: Record<string, string> = { resultCode: callback.ResultCode };
      if (callback.ResultDesc) providerData.resultDesc = callback.ResultDesc;
      if (metadata.MpesaReceiptNumber) providerData.receiptNumber = metadata.MpesaReceiptNumber;
      if (metadata.PhoneNumber) providerData.phoneNumber = metadata.PhoneNumber;
      if (metadata.TransactionDate) providerData.transactionDate = metadata.TransactionDate;

      return [
        {
          paymentId: paymentId ?? null,
          providerReference: callback.CheckoutRequestID,
          status,
          amount: amount !== null && Number.isFinite(amount) ? amount : null,
          currency: null,
          failureReason,
          providerData,
        },
      ];
    },

    async pollStatus(payment: PaymentRecord, now: Date): Promise<NormalizedNotification> {
      const pending: NormalizedNotification = {
        paymentId: payment.paymentId,
        providerReference: payment.providerReference,
        status: 'pending',
        amount: null,
        currency: null,
        failureReason: null,
        providerData: {},
      };
      if (!payment.providerReference) return pending;

      const token = await accessToken(now);
      const timestamp = darajaTimestamp(now);
      let body: z.infer<typeof StkQueryResponseSchema>;
      try {
        const res = await http.post(
          '/mpesa/stkpushquery/v1/query',
          {
            BusinessShortCode: config.shortCode,
            Password: password(timestamp),
            Timestamp: timestamp,
            CheckoutRequestID: payment.providerReference,
          },
          { headers: { Authorization: `Bearer ${token}` } }
        );
        body = StkQueryResponseSchema.parse(res.data);
      } catch (err) {
        if (processingErrorCode(err) === STILL_PROCESSING) return pending;
        throw toProviderError(PROVIDER, 'stk_query', err);
      }

      if (body.ResultCode === undefined) return pending;
      const { status, failureReason } = resultStatus(body.ResultCode);
      log.info({ paymentId: payment.paymentId, resultCode: body.ResultCode, status }, '[PUSH] STK status queried');
      return {
        ...pending,
        status,
        failureReason,
        providerData: { resultCode: body.ResultCode, resultDesc: body.ResultDesc ?? '' },
      };
    },

    acknowledgement() {
      return { ResultCode: 0, ResultDesc: 'Accepted' };
    },
  };
}
