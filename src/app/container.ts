import axios from 'axios';
import { env } from '../config/env';
import { admin, adminDb } from '../config/firebaseAdmin';
import { IdTokenVerifier } from '../middlewares/authMiddleware';
import { createFcmTokenRepository } from '../repository/fcmTokenRepository';
import { createFirestoreDocumentStore } from '../repository/firestoreDocumentStore';
import { createCreditsService, CreditsService } from '../services/creditsService';
import { createFcmNotificationDispatcher } from '../services/notificationService';
import { createDirectCardAdapter } from '../services/payments/directCardAdapter';
import { createHostedCheckoutAdapter } from '../services/payments/hostedCheckoutAdapter';
import { createPaymentReconciler, PaymentReconciler } from '../services/payments/paymentReconciler';
import { buildProviderRegistry } from '../services/payments/providerRegistry';
import { createPushPaymentAdapter } from '../services/payments/pushPaymentAdapter';
import { createSweepService, SweepService } from '../services/sweeps/sweepService';
import { BillingConfig } from '../types/credits';
import { PaymentProviderAdapter } from '../types/payments';
import { logger } from '../utils/logger';

export interface AppContainer {
  credits: CreditsService;
  reconciler: PaymentReconciler;
  sweeps: SweepService;
  verifyIdToken: IdTokenVerifier;
  cronSecretKey?: string;
}

export function billingConfigFromEnv(): BillingConfig {
  return {
    dailyRate: env.dailyRate,
    trialWindowDays: env.trialWindowDays,
    currency: env.billingCurrency,
    minPaymentAmount: env.minPaymentAmount,
    monthlyCap: env.monthlyCap,
    maxPrepayMonths: env.maxPrepayMonths,
    lowCreditThresholdDays: env.lowCreditThresholdDays,
    webhookToleranceMinutes: env.webhookToleranceMinutes,
    forceTrialEnd: env.forceTrialEnd,
    resetOnLogin: env.resetUsersOnLogin,
    trialResetEpoch: env.trialResetEpoch ?? null,
    maxWriteAttempts: env.ledgerMaxWriteAttempts,
  };
}

/** Adapters for every provider whose credentials are configured. */
function configuredAdapters(toleranceMs: number): PaymentProviderAdapter[] {
  const adapters: PaymentProviderAdapter[] = [];

  if (env.mpesaConsumerKey && env.mpesaConsumerSecret && env.mpesaPasskey && env.mpesaCallbackSecret) {
    const http = axios.create({
      baseURL: env.mpesaEnv === 'production' ? 'https://api.safaricom.co.ke' : 'https://sandbox.safaricom.co.ke',
      timeout: env.mpesaTimeoutMs,
    });
    adapters.push(
      createPushPaymentAdapter(
        {
          consumerKey: env.mpesaConsumerKey,
          consumerSecret: env.mpesaConsumerSecret,
          shortCode: env.mpesaShortCode,
          tillNumber: env.mpesaTillNumber,
          passkey: env.mpesaPasskey,
          callbackSecret: env.mpesaCallbackSecret,
          publicBaseUrl: env.publicBaseUrl,
          toleranceMs,
        },
        http
      )
    );
  }

  if (env.pesapalConsumerKey && env.pesapalConsumerSecret) {
    const http = axios.create({
      baseURL: env.pesapalEnv === 'production' ? 'https://pay.pesapal.com/v3' : 'https://cybqa.pesapal.com/pesapalv3',
      timeout: env.pesapalTimeoutMs,
      headers: { Accept: 'application/json' },
    });
    adapters.push(
      createHostedCheckoutAdapter(
        {
          consumerKey: env.pesapalConsumerKey,
          consumerSecret: env.pesapalConsumerSecret,
          ipnId: env.pesapalIpnId,
          publicBaseUrl: env.publicBaseUrl,
          returnUrl: env.pesapalReturnUrl ?? env.publicBaseUrl,
        },
        http
      )
    );
  }

  if (env.cybersourceMerchantId && env.cybersourceApiKeyId && env.cybersourceSecretKey && env.cybersourceWebhookSecret) {
    const host = env.cybersourceEnv === 'production' ? 'api.cybersource.com' : 'apitest.cybersource.com';
    const http = axios.create({ baseURL: `https://${host}`, timeout: env.cybersourceTimeoutMs });
    adapters.push(
      createDirectCardAdapter(
        {
          host,
          merchantId: env.cybersourceMerchantId,
          apiKeyId: env.cybersourceApiKeyId,
          secretKey: env.cybersourceSecretKey,
          webhookSecret: env.cybersourceWebhookSecret,
          toleranceMs,
          targetOrigins: env.cybersourceTargetOrigins.length > 0 ? env.cybersourceTargetOrigins : [new URL(env.publicBaseUrl).origin],
        },
        http
      )
    );
  }

  return adapters;
}

/** Production wiring: Firestore, FCM, Firebase Auth and the configured providers. */
export function createProductionContainer(): AppContainer {
  const config = billingConfigFromEnv();
  const store = createFirestoreDocumentStore(adminDb);
  const adapters = configuredAdapters(config.webhookToleranceMinutes * 60 * 1000);
  logger.info({ providers: adapters.map((a) => a.provider) }, '[BOOT] Payment providers configured');

  const credits = createCreditsService({ store, config });
  const reconciler = createPaymentReconciler({
    store,
    credits,
    providers: buildProviderRegistry(adapters),
    config,
    reconcileGraceMinutes: env.paymentReconcileGraceMinutes,
  });
  const dispatcher = createFcmNotificationDispatcher({
    tokens: createFcmTokenRepository(store),
    messaging: admin.messaging(),
  });
  const sweeps = createSweepService({ store, credits, reconciler, dispatcher, config });

  return {
    credits,
    reconciler,
    sweeps,
    verifyIdToken: async (idToken) => {
      const decoded = await admin.auth().verifyIdToken(idToken);
      return { uid: decoded.uid, email: decoded.email };
    },
    cronSecretKey: env.cronSecretKey,
  };
}
