import { AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  CaptureContext,
  CaptureContextRequest,
  InboundNotification,
  NormalizedNotification,
  PaymentProviderAdapter,
  PaymentRecord,
  ProviderInitiateRequest,
  ProviderInitiateResult,
} from '../../types/payments';
import { ApiError, ProviderRejectedError, SignatureInvalidError } from '../../utils/errorHandler';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { hmacSha256, parseSignatureHeader, sha256Base64, verifyTimestampedSignature } from '../../utils/webhookSignature';
import { toProviderError } from './providerErrors';

const PROVIDER = 'direct-card' as const;
const PAYMENTS_RESOURCE = '/pts/v2/payments';
const CAPTURE_CONTEXT_RESOURCE = '/up/v1/capture-contexts';
const SEARCH_RESOURCE = '/tss/v2/searches';
const refreshStatusResource = (transactionId: string) => `/pts/v2/refresh-payment-status/${encodeURIComponent(transactionId)}`;

export interface DirectCardConfig {
  /** API host without scheme, e.g. apitest.cybersource.com */
  host: string;
  merchantId: string;
  apiKeyId: string;
  /** Base64 shared secret for request signing. */
  secretKey: string;
  /** Base64 shared secret for webhook signatures. */
  webhookSecret: string;
  toleranceMs: number;
  /** Origins allowed to embed the card form when a request names none. */
  targetOrigins: string[];
}

const COMPLETED = new Set(['AUTHORIZED', 'COMPLETED', 'SUCCESS', 'TRANSMITTED']);
const FAILED = new Set(['DECLINED', 'FAILED', 'REVERSED', 'VOIDED', 'CANCELLED', 'AUTHORIZED_RISK_DECLINED', 'INVALID_REQUEST']);

const amountValue = z.union([z.number(), z.string()]).transform((v) => Number(v));

const PaymentResponseSchema = z.object({
  id: z.string().nullish(),
  status: z.string(),
  errorInformation: z.object({ reason: z.string().nullish(), message: z.string().nullish() }).nullish(),
  orderInformation: z
    .object({
      amountDetails: z
        .object({ authorizedAmount: amountValue.nullish(), totalAmount: amountValue.nullish(), currency: z.string().nullish() })
        .nullish(),
    })
    .nullish(),
});

type PaymentResponse = z.infer<typeof PaymentResponseSchema>;

// The capture context comes back as a bare JWT, sometimes JSON-quoted.
const CaptureContextResponseSchema = z
  .string()
  .transform((raw) => raw.trim().replace(/^"|"$/g, ''))
  .pipe(z.string().min(1));

const SearchResponseSchema = z.object({
  _embedded: z
    .object({
      transactionSummaries: z
        .array(z.object({ id: z.string(), clientReferenceInformation: z.object({ code: z.string().nullish() }).nullish() }))
        .default([]),
    })
    .nullish(),
});

const WebhookDataSchema = z.object({
  id: z.string().nullish(),
  transactionId: z.string().nullish(),
  status: z.string().nullish(),
  amount: amountValue.nullish(),
  currency: z.string().nullish(),
  referenceCode: z.string().nullish(),
  clientReferenceCode: z.string().nullish(),
  clientReferenceInformation: z.object({ code: z.string().nullish() }).nullish(),
});

const WebhookSchema = z.object({
  notificationId: z.string().nullish(),
  eventType: z.string().nullish(),
  payloads: z.array(z.object({ data: WebhookDataSchema })).default([]),
});

export function cardStatus(raw: string): 'pending' | 'completed' | 'failed' {
  const status = raw.toUpperCase();
  if (COMPLETED.has(status)) return 'completed';
  if (FAILED.has(status)) return 'failed';
  return 'pending';
}

/** Headers for a CyberSource HTTP-signature request over `body`. */
export function signedRequestHeaders(config: DirectCardConfig, method: 'post', resource: string, body: string, now: Date): Record<string, string> {
  const date = now.toUTCString();
  const digest = `SHA-256=${sha256Base64(body)}`;
  const signingString = [
    `host: ${config.host}`,
    `v-c-date: ${date}`,
    `request-target: ${method} ${resource}`,
    `digest: ${digest}`,
    `v-c-merchant-id: ${config.merchantId}`,
  ].join('\n');
  const signature = hmacSha256(Buffer.from(config.secretKey, 'base64'), signingString, 'base64');

  return {
    'v-c-merchant-id': config.merchantId,
    'v-c-date': date,
    Digest: digest,
    Signature: `keyid="${config.apiKeyId}", algorithm="HmacSHA256", headers="host v-c-date request-target digest v-c-merchant-id", signature="${signature}"`,
    'Content-Type': 'application/json',
  };
}

function responseNotification(response: PaymentResponse, paymentId: string, fallbackAmount: number | null, fallbackCurrency: string | null): NormalizedNotification {
  const status = cardStatus(response.status);
  const amounts = response.orderInformation?.amountDetails;
  return {
    paymentId,
    providerReference: response.id ?? null,
    status,
    amount: amounts?.authorizedAmount ?? amounts?.totalAmount ?? fallbackAmount,
    currency: amounts?.currency ?? fallbackCurrency,
    failureReason: status === 'failed' ? (response.errorInformation?.reason ?? response.status).toLowerCase() : null,
    providerData: { decision: response.status },
  };
}

export type DirectCardAdapter = PaymentProviderAdapter & Required<Pick<PaymentProviderAdapter, 'pollStatus' | 'createCaptureContext'>>;

/**
 * CyberSource card payments from a hosted-fields transient token. The
 * authorization answer is authoritative; webhooks confirm later changes.
 */
export function createDirectCardAdapter(config: DirectCardConfig, http: AxiosInstance, log: Logger = rootLogger): DirectCardAdapter {
  async function signedPost(resource: string, body: string, now: Date, responseType?: 'text') {
    return http.post(resource, body, {
      headers: signedRequestHeaders(config, 'post', resource, body, now),
      responseType,
    });
  }

  /** Transaction id of the authorization sent under `paymentId`, if the provider has one. */
  async function findTransaction(paymentId: string, now: Date): Promise<string | null> {
    const body = JSON.stringify({
      save: false,
      name: `payment ${paymentId}`,
      timezone: 'UTC',
      query: `clientReferenceInformation.code:${paymentId}`,
      offset: 0,
      limit: 10,
      sort: 'id:asc,submitTimeUtc:asc',
    });
    let found: z.infer<typeof SearchResponseSchema>;
    try {
      found = SearchResponseSchema.parse((await signedPost(SEARCH_RESOURCE, body, now)).data);
    } catch (err) {
      throw toProviderError(PROVIDER, 'search', err);
    }
    const match = (found._embedded?.transactionSummaries ?? []).find(
      (summary) => summary.clientReferenceInformation?.code === paymentId
    );
    return match ? match.id : null;
  }

  return {
    provider: PROVIDER,
    wholeAmountsOnly: false,
    pollsWithoutReference: true,

    async initiate(request: ProviderInitiateRequest): Promise<ProviderInitiateResult> {
      if (!request.payer.transientToken) {
        throw new ApiError('A card token is required', 400, { provider: PROVIDER }, 'BAD_REQUEST');
      }

      const body = JSON.stringify({
        clientReferenceInformation: { code: request.paymentId },
        processingInformation: { capture: true },
        orderInformation: {
          amountDetails: { totalAmount: request.amount.toFixed(2), currency: request.currency },
          billTo: request.payer.email ? { email: request.payer.email } : undefined,
        },
        tokenInformation: { transientTokenJwt: request.payer.transientToken },
      });

      let response: PaymentResponse;
      try {
        response = PaymentResponseSchema.parse((await signedPost(PAYMENTS_RESOURCE, body, request.now)).data);
      } catch (err) {
        throw toProviderError(PROVIDER, 'authorize', err);
      }

      const status = cardStatus(response.status);
      log.info({ paymentId: request.paymentId, transactionId: response.id, decision: response.status }, '[CARD] Authorization answered');

      if (status === 'failed' && !response.id) {
        throw new ProviderRejectedError(PROVIDER, response.errorInformation?.reason ?? response.status);
      }

      const immediate = status === 'pending' ? null : responseNotification(response, request.paymentId, request.amount, request.currency);

      return {
        providerReference: response.id ?? null,
        instructions: { kind: 'card-result', decision: response.status },
        immediate,
      };
    },

    async pollStatus(payment: PaymentRecord, now: Date): Promise<NormalizedNotification | null> {
      const transactionId = payment.providerReference ?? (await findTransaction(payment.paymentId, now));
      if (!transactionId) return null;

      const resource = refreshStatusResource(transactionId);
      let response: PaymentResponse;
      try {
        response = PaymentResponseSchema.parse((await signedPost(resource, '{}', now)).data);
      } catch (err) {
        throw toProviderError(PROVIDER, 'refresh_status', err);
      }
      log.info({ paymentId: payment.paymentId, transactionId, decision: response.status }, '[CARD] Status refreshed');
      return responseNotification({ ...response, id: response.id ?? transactionId }, payment.paymentId, null, null);
    },

    async createCaptureContext(request: CaptureContextRequest): Promise<CaptureContext> {
      const targetOrigins = request.targetOrigins.length > 0 ? request.targetOrigins : config.targetOrigins;
      const body = JSON.stringify({
        targetOrigins,
        clientVersion: '0.31',
        allowedCardNetworks: ['VISA', 'MASTERCARD', 'AMEX'],
        allowedPaymentTypes: ['PANENTRY', 'GOOGLEPAY'],
        country: 'KE',
        locale: 'en_KE',
        orderInformation: {
          amountDetails: { totalAmount: request.amount.toFixed(2), currency: request.currency },
        },
      });

      let captureContext: string;
      try {
        captureContext = CaptureContextResponseSchema.parse((await signedPost(CAPTURE_CONTEXT_RESOURCE, body, request.now, 'text')).data);
      } catch (err) {
        throw toProviderError(PROVIDER, 'capture_context', err);
      }
      return { captureContext, targetOrigins };
    },

    async parseNotification(inbound: InboundNotification, now: Date): Promise<NormalizedNotification[]> {
      const parts = parseSignatureHeader(inbound.headers['v-c-signature'], ';');
      const check = verifyTimestampedSignature({
        timestamp: parts.t,
        signature: parts.sig,
        signedContent: inbound.rawPayload,
        secret: Buffer.from(config.webhookSecret, 'base64'),
        encoding: 'base64',
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
      const parsed = WebhookSchema.safeParse(json);
      if (!parsed.success) {
        throw new ApiError('Malformed notification payload', 400, { provider: PROVIDER, issues: parsed.error.issues }, 'BAD_REQUEST');
      }

      return parsed.data.payloads.map(({ data }) => {
        const rawStatus = data.status ?? 'UNKNOWN';
        const status = cardStatus(rawStatus);
        const amount = data.amount ?? null;
        return {
          paymentId: data.clientReferenceInformation?.code ?? data.clientReferenceCode ?? data.referenceCode ?? null,
          providerReference: data.transactionId ?? data.id ?? null,
          status,
          amount: amount !== null && Number.isFinite(amount) ? amount : null,
          currency: data.currency ?? null,
          failureReason: status === 'failed' ? rawStatus.toLowerCase() : null,
          providerData: { decision: rawStatus, eventType: parsed.data.eventType ?? '' },
        };
      });
    },

    acknowledgement() {
      return { status: 'success' };
    },
  };
}
