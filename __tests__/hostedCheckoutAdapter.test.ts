import { buildPayment } from './helpers/fixtures';
import { createStubHttp, StubRoute } from './helpers/stubHttp';
import { createHostedCheckoutAdapter, HostedCheckoutConfig } from '../src/services/payments/hostedCheckoutAdapter';
import { ProviderRejectedError, SignatureInvalidError } from '../src/utils/errorHandler';

const config: HostedCheckoutConfig = {
  consumerKey: 'test-consumer-key',
  consumerSecret: 'test-consumer-secret',
  publicBaseUrl: 'https://ledger.example.test',
  returnUrl: 'https://app.example.test/payments/return',
};

const paymentId = 'c2d3e4f5-a6b7-4c8d-9e0f-a1b2c3d4e5f6';
const now = new Date('2026-03-10T09:00:00.000Z');

const tokenRoute: StubRoute = () => ({ status: 200, data: { token: 'test-access-token', expiryDate: '2026-03-10T09:05:00Z', status: '200' } });
const registerRoute: StubRoute = () => ({ status: 200, data: { ipn_id: 'ipn-1', url: 'https://ledger.example.test/api/webhooks/hosted-checkout' } });
const orderRoute: StubRoute = () => ({
  status: 200,
  data: {
    order_tracking_id: 'otid-1',
    merchant_reference: paymentId,
    redirect_url: 'https://pay.example.test/checkout/otid-1',
    error: null,
    status: '200',
  },
});

const statusRoute = (data: Record<string, unknown>): StubRoute => () => ({ status: 200, data });

const initiateRequest = {
  paymentId,
  userKey: 'user-1',
  amount: 250,
  currency: 'KES',
  payer: { email: 'user1@example.com', firstName: 'Amina' },
  now,
};

describe('hosted checkout adapter', () => {
  describe('initiate', () => {
    it('registers the notification URL once and submits the order', async () => {
      const { http, requests } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'POST /api/URLSetup/RegisterIPN': registerRoute,
        'POST /api/Transactions/SubmitOrderRequest': orderRoute,
      });
      const adapter = createHostedCheckoutAdapter(config, http);

      const result = await adapter.initiate(initiateRequest);
      await adapter.initiate(initiateRequest);

      expect(result).toEqual({
        providerReference: 'otid-1',
        instructions: { kind: 'redirect', redirectUrl: 'https://pay.example.test/checkout/otid-1' },
        immediate: null,
      });
      expect(requests.map((r) => r.url)).toEqual([
        '/api/Auth/RequestToken',
        '/api/URLSetup/RegisterIPN',
        '/api/Transactions/SubmitOrderRequest',
        '/api/Transactions/SubmitOrderRequest',
      ]);
      expect(requests[0].body).toEqual({ consumer_key: 'test-consumer-key', consumer_secret: 'test-consumer-secret' });
      expect(requests[1].body).toEqual({ url: 'https://ledger.example.test/api/webhooks/hosted-checkout', ipn_notification_type: 'POST' });
      expect(requests[2].headers.authorization).toBe('Bearer test-access-token');
      expect(requests[2].body).toEqual({
        id: paymentId,
        currency: 'KES',
        amount: 250,
        description: 'Credit top-up',
        callback_url: 'https://app.example.test/payments/return',
        redirect_mode: 'TOP_WINDOW',
        notification_id: 'ipn-1',
        billing_address: {
          email_address: 'user1@example.com',
          phone_number: '',
          country_code: 'KE',
          first_name: 'Amina',
          last_name: '',
        },
      });
    });

    it('uses a pre-registered notification id', async () => {
      const { http, requests } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'POST /api/Transactions/SubmitOrderRequest': orderRoute,
      });

      await createHostedCheckoutAdapter({ ...config, ipnId: 'ipn-configured' }, http).initiate(initiateRequest);

      expect(requests.map((r) => r.url)).toEqual(['/api/Auth/RequestToken', '/api/Transactions/SubmitOrderRequest']);
      expect(requests[1].body).toMatchObject({ notification_id: 'ipn-configured' });
    });

    it('rejects an order the provider did not create', async () => {
      const { http } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'POST /api/Transactions/SubmitOrderRequest': () => ({
          status: 200,
          data: { error: { code: 'invalid_amount', message: 'Amount is invalid' }, status: '500' },
        }),
      });

      const attempt = createHostedCheckoutAdapter({ ...config, ipnId: 'ipn-1' }, http).initiate(initiateRequest);

      await expect(attempt).rejects.toBeInstanceOf(ProviderRejectedError);
      await expect(attempt).rejects.toMatchObject({ reason: 'Amount is invalid' });
    });

    it('rejects when no token is issued', async () => {
      const { http } = createStubHttp({
        'POST /api/Auth/RequestToken': () => ({ status: 200, data: { error: { code: 'invalid_consumer_key', message: 'Invalid consumer key' } } }),
      });

      await expect(createHostedCheckoutAdapter(config, http).initiate(initiateRequest)).rejects.toMatchObject({
        reason: 'Invalid consumer key',
      });
    });
  });

  describe('notifications', () => {
    const completed = {
      status_code: 1,
      payment_status_description: 'Completed',
      amount: 250,
      currency: 'KES',
      merchant_reference: paymentId,
      confirmation_code: 'CONF1',
      payment_method: 'Visa',
    };

    it('answers a query-string notification from the transaction status', async () => {
      const { http, requests } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'GET /api/Transactions/GetTransactionStatus': statusRoute(completed),
      });
      const adapter = createHostedCheckoutAdapter(config, http);
      const query = { OrderTrackingId: 'otid-1', OrderMerchantReference: paymentId, OrderNotificationType: 'IPNCHANGE' };

      const result = await adapter.parseNotification({ rawPayload: '', headers: {}, query }, now);

      expect(result).toEqual([
        {
          paymentId,
          providerReference: 'otid-1',
          status: 'completed',
          amount: 250,
          currency: 'KES',
          failureReason: null,
          providerData: { statusDescription: 'Completed', confirmationCode: 'CONF1', paymentMethod: 'Visa' },
        },
      ]);
      expect(requests[1].params).toEqual({ orderTrackingId: 'otid-1' });
    });

    it('reads notifications posted as JSON', async () => {
      const { http } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'GET /api/Transactions/GetTransactionStatus': statusRoute({
          status_code: 2,
          payment_status_description: 'Failed',
          amount: 250,
          currency: 'KES',
          merchant_reference: paymentId,
        }),
      });
      const adapter = createHostedCheckoutAdapter(config, http);
      const rawPayload = JSON.stringify({ OrderTrackingId: 'otid-1', OrderMerchantReference: paymentId, OrderNotificationType: 'IPNCHANGE' });

      const [result] = await adapter.parseNotification({ rawPayload, headers: {}, query: {} }, now);

      expect(result).toMatchObject({ status: 'failed', failureReason: 'failed' });
      expect(adapter.acknowledgement({ rawPayload, headers: {}, query: {} }, ['applied'])).toEqual({
        orderNotificationType: 'IPNCHANGE',
        orderTrackingId: 'otid-1',
        orderMerchantReference: paymentId,
        status: 200,
      });
    });

    it('reads notifications posted as a form', async () => {
      const { http } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'GET /api/Transactions/GetTransactionStatus': statusRoute({ status_code: 3, payment_status_description: 'Reversed', merchant_reference: paymentId }),
      });
      const rawPayload = `OrderTrackingId=otid-1&OrderMerchantReference=${paymentId}`;

      const [result] = await createHostedCheckoutAdapter(config, http).parseNotification({ rawPayload, headers: {}, query: {} }, now);

      expect(result).toMatchObject({ status: 'failed', failureReason: 'reversed', providerReference: 'otid-1' });
    });

    it('refuses a notification whose merchant reference the provider does not confirm', async () => {
      const { http } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'GET /api/Transactions/GetTransactionStatus': statusRoute(completed),
      });
      const query = { OrderTrackingId: 'otid-1', OrderMerchantReference: 'someone-elses-payment' };

      await expect(
        createHostedCheckoutAdapter(config, http).parseNotification({ rawPayload: '', headers: {}, query }, now)
      ).rejects.toBeInstanceOf(SignatureInvalidError);
    });

    it('rejects a notification without a tracking id', async () => {
      const adapter = createHostedCheckoutAdapter(config, createStubHttp({}).http);

      await expect(adapter.parseNotification({ rawPayload: '{}', headers: {}, query: {} }, now)).rejects.toMatchObject({ statusCode: 400 });
    });

    it('reports an unpaid order as pending without an amount', async () => {
      const { http } = createStubHttp({
        'POST /api/Auth/RequestToken': tokenRoute,
        'GET /api/Transactions/GetTransactionStatus': statusRoute({ status_code: 0, payment_status_description: 'INVALID', amount: 250, merchant_reference: paymentId }),
      });
      const payment = buildPayment({ paymentId, userKey: 'user-1', provider: 'hosted-checkout', amount: 250, providerReference: 'otid-1' });

      const result = await createHostedCheckoutAdapter(config, http).pollStatus?.(payment, now);

      expect(result).toMatchObject({ status: 'pending', amount: null, paymentId, providerReference: 'otid-1' });
    });
  });
});
