import { v4 as uuidv4 } from 'uuid';
import { DocumentStore, DocumentWrite } from '../../repository/documentStore';
import { createNotificationInboxRepository } from '../../repository/notificationInboxRepository';
import { createPaymentsRepository, VersionedPayment } from '../../repository/paymentsRepository';
import { BillingConfig } from '../../types/credits';
import {
  CaptureContext,
  InboundNotification,
  InitiatePaymentInput,
  InitiatePaymentResult,
  isPaymentProvider,
  NormalizedNotification,
  NotificationAcknowledgement,
  NotificationOutcome,
  PaymentProvider,
  PaymentProviderAdapter,
  PaymentRecord,
  ProviderInitiateResult,
  ReconcileSummary,
} from '../../types/payments';
import { Clock, systemClock } from '../../utils/calendar';
import {
  ApiError,
  LedgerInvariantError,
  ProviderRejectedError,
  ProviderTimeoutError,
  SignatureInvalidError,
} from '../../utils/errorHandler';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { withOptimisticRetry } from '../../utils/optimisticRetry';
import { normalizeKenyanMsisdn } from '../../utils/phone';
import { CreditsService } from '../creditsService';
import { assertTransition, isTerminal } from './paymentStateMachine';
import { ProviderRegistry, requireAdapter } from './providerRegistry';

export interface PaymentReconcilerDeps {
  store: DocumentStore;
  credits: CreditsService;
  providers: ProviderRegistry;
  config: BillingConfig;
  /** Non-terminal payments younger than this are left to their callbacks. */
  reconcileGraceMinutes?: number;
  clock?: Clock;
  log?: Logger;
}

interface ApplyResult {
  outcome: NotificationOutcome;
  creditTarget: PaymentRecord | null;
}

const AMOUNT_EPSILON = 0.005;

export function createPaymentReconciler(deps: PaymentReconcilerDeps) {
  const { store, credits, providers, config } = deps;
  const clock = deps.clock ?? systemClock;
  const log = deps.log ?? rootLogger;
  const graceMs = (deps.reconcileGraceMinutes ?? 3) * 60 * 1000;
  const payments = createPaymentsRepository(store);
  const inbox = createNotificationInboxRepository(store);

  async function readOwned(userKey: string, paymentId: string): Promise<VersionedPayment> {
    const current = await payments.read(paymentId);
    if (!current || current.payment.userKey !== userKey) {
      throw new ApiError('Payment not found', 404, { paymentId }, 'NOT_FOUND');
    }
    return current;
  }

  /** Reference index writes needed to bind `reference` to `paymentId`, if any. */
  async function referenceWrites(provider: PaymentProvider, reference: string | null, paymentId: string): Promise<DocumentWrite[]> {
    if (!reference) return [];
    const bound = await payments.findByReference(provider, reference);
    if (bound === paymentId) return [];
    if (bound) {
      throw new LedgerInvariantError('Provider reference already bound to another payment', {
        provider,
        providerReference: reference,
        paymentId,
        boundTo: bound,
      });
    }
    return [payments.referenceWrite(provider, reference, paymentId)];
  }

  /** The adapter to query for `payment`, when its status can be asked for at all. */
  function statusQueryFor(payment: PaymentRecord): PaymentProviderAdapter | null {
    const adapter = providers[payment.provider];
    if (!adapter || !adapter.pollStatus) return null;
    if (!payment.providerReference && !adapter.pollsWithoutReference) return null;
    return adapter;
  }

  function assertPayableAmount(adapter: PaymentProviderAdapter, amount: number): void {
    if (!Number.isFinite(amount) || amount < config.minPaymentAmount) {
      throw new ApiError(`Minimum payment is ${config.minPaymentAmount} ${config.currency}`, 400, { minPaymentAmount: config.minPaymentAmount }, 'BAD_REQUEST');
    }
    if (adapter.wholeAmountsOnly && !Number.isInteger(amount)) {
      throw new ApiError('Amount must be a whole number for this provider', 400, { provider: adapter.provider }, 'BAD_REQUEST');
    }
  }

  async function resolve(provider: PaymentProvider, item: NormalizedNotification): Promise<string | null> {
    if (item.paymentId) {
      const direct = await payments.read(item.paymentId);
      if (direct) return direct.payment.paymentId;
    }
    if (item.providerReference) {
      return payments.findByReference(provider, item.providerReference);
    }
    return null;
  }

  async function attachReference(paymentId: string, provider: PaymentProvider, reference: string | null, now: Date): Promise<PaymentRecord> {
    return withOptimisticRetry(`attach:${paymentId}`, config.maxWriteAttempts, async () => {
      const current = await payments.read(paymentId);
      if (!current) throw new LedgerInvariantError('Payment vanished after creation', { paymentId });
      const { payment, version } = current;

      const moveToPending = payment.status === 'initiated';
      const newReference = !payment.providerReference && reference ? reference : null;
      if (!moveToPending && !newReference) return payment;

      if (moveToPending) assertTransition(payment, 'pending');
      const next: PaymentRecord = {
        ...payment,
        status: moveToPending ? 'pending' : payment.status,
        providerReference: payment.providerReference ?? reference,
        updatedAt: now.toISOString(),
      };
      await store.commit([payments.write(next, version), ...(await referenceWrites(provider, newReference, paymentId))]);
      log.info({ paymentId, provider, providerReference: next.providerReference, status: next.status }, '[RECONCILER] Provider acknowledged payment');
      return next;
    });
  }

  async function applyOnce(provider: PaymentProvider, paymentId: string, item: NormalizedNotification, now: Date): Promise<ApplyResult> {
    const current = await payments.read(paymentId);
    if (!current) return { outcome: 'unresolved', creditTarget: null };
    const { payment, version } = current;

    if (payment.provider !== provider) {
      log.warn({ paymentId, provider, recordProvider: payment.provider }, '[RECONCILER] Notification provider does not match payment');
      return { outcome: 'unresolved', creditTarget: null };
    }
    if (item.providerReference && payment.providerReference && item.providerReference !== payment.providerReference) {
      log.warn({ paymentId, provider, providerReference: item.providerReference }, '[RECONCILER] Notification reference does not match payment');
      return { outcome: 'unresolved', creditTarget: null };
    }

    if (isTerminal(payment.status)) {
      if (payment.status === 'failed' && item.status === 'completed') {
        log.error({ paymentId, provider, failureReason: payment.failureReason }, '[RECONCILER] Completed notification for a failed payment needs manual review');
      } else {
        log.info({ paymentId, provider, status: payment.status, incoming: item.status }, '[RECONCILER] Duplicate notification for terminal payment');
      }
      const needsRepair = payment.status === 'completed' && !payment.creditAppliedAt;
      return { outcome: 'duplicate', creditTarget: needsRepair ? payment : null };
    }

    if (item.status === 'pending') {
      const newReference = !payment.providerReference && item.providerReference ? item.providerReference : null;
      if (payment.status !== 'initiated' && !newReference) return { outcome: 'ignored', creditTarget: null };
      if (payment.status === 'initiated') assertTransition(payment, 'pending');
      const pending: PaymentRecord = {
        ...payment,
        status: 'pending',
        providerReference: payment.providerReference ?? newReference,
        providerData: { ...payment.providerData, ...item.providerData },
        updatedAt: now.toISOString(),
      };
      await store.commit([payments.write(pending, version), ...(await referenceWrites(provider, newReference, paymentId))]);
      return { outcome: 'applied', creditTarget: null };
    }

    if (item.status === 'completed') {
      const amountMismatch = item.amount !== null && Math.abs(item.amount - payment.amount) > AMOUNT_EPSILON;
      const currencyMismatch = item.currency !== null && item.currency.toUpperCase() !== payment.currency.toUpperCase();
      if (amountMismatch || currencyMismatch) {
        log.error(
          { paymentId, provider, expected: payment.amount, received: item.amount, currency: item.currency },
          '[RECONCILER] Completed notification does not match the payment amount'
        );
        return { outcome: 'rejected', creditTarget: null };
      }
    }

    assertTransition(payment, item.status);
    const at = now.toISOString();
    const reference = payment.providerReference ?? item.providerReference;
    const next: PaymentRecord = {
      ...payment,
      status: item.status,
      providerReference: reference,
      providerData: { ...payment.providerData, ...item.providerData },
      failureReason: item.status === 'failed' ? item.failureReason ?? 'provider_declined' : null,
      finalizedAt: at,
      updatedAt: at,
    };
    const indexWrites = payment.providerReference ? [] : await referenceWrites(provider, item.providerReference, paymentId);
    await store.commit([payments.write(next, version), ...indexWrites]);

    log.info({ paymentId, provider, from: payment.status, to: next.status, failureReason: next.failureReason }, '[RECONCILER] Payment transitioned');
    return { outcome: 'applied', creditTarget: next.status === 'completed' ? next : null };
  }

  /** Single path for webhooks, polled status and synchronous provider results. */
  async function applyNotification(provider: PaymentProvider, item: NormalizedNotification, now: Date): Promise<NotificationOutcome> {
    const paymentId = await resolve(provider, item);
    if (!paymentId) {
      log.warn({ provider, paymentId: item.paymentId, providerReference: item.providerReference }, '[RECONCILER] Unresolved payment reference');
      return 'unresolved';
    }

    const result = await withOptimisticRetry(`apply:${paymentId}`, config.maxWriteAttempts, () =>
      applyOnce(provider, paymentId, item, now)
    );
    if (result.creditTarget) {
      await credits.creditFromPayment(result.creditTarget, now);
    }
    return result.outcome;
  }

  async function markInitiationFailed(paymentId: string, reason: string, now: Date): Promise<void> {
    await withOptimisticRetry(`fail:${paymentId}`, config.maxWriteAttempts, async () => {
      const current = await payments.read(paymentId);
      if (!current || isTerminal(current.payment.status)) return;
      assertTransition(current.payment, 'failed');
      const at = now.toISOString();
      await store.commit([
        payments.write({ ...current.payment, status: 'failed', failureReason: reason, finalizedAt: at, updatedAt: at }, current.version),
      ]);
    });
  }

  async function initiatePayment(input: InitiatePaymentInput): Promise<InitiatePaymentResult> {
    const { userKey, amount, provider } = input;
    const adapter = requireAdapter(providers, provider);
    assertPayableAmount(adapter, amount);

    const payer = { ...input.payer };
    if (provider === 'push-payment') {
      const msisdn = normalizeKenyanMsisdn(payer.phone);
      if (!msisdn) throw new ApiError('A valid Kenyan mobile number is required', 400, { provider }, 'BAD_REQUEST');
      payer.phone = msisdn;
    }

    const now = clock();
    const account = await credits.ensureAccount(userKey, now, { email: payer.email });
    const maxTopUp = credits.remainingTopUp(account, now);
    if (amount > maxTopUp) {
      throw new ApiError('Amount exceeds the monthly prepay allowance', 400, { maxTopUp }, 'BAD_REQUEST');
    }

    const paymentId = uuidv4();
    const at = now.toISOString();
    const record: PaymentRecord = {
      paymentId,
      userKey,
      provider,
      amount,
      currency: config.currency,
      status: 'initiated',
      providerReference: null,
      creditDays: amount / config.dailyRate,
      creditAppliedAt: null,
      creditDaysApplied: null,
      failureReason: null,
      providerData: {},
      payerPhone: payer.phone ?? null,
      payerEmail: payer.email ?? null,
      createdAt: at,
      updatedAt: at,
      finalizedAt: null,
    };
    await store.commit([payments.write(record, null)]);
    log.info({ paymentId, userKey, provider, amount }, '[RECONCILER] Payment initiated');

    let result: ProviderInitiateResult;
    try {
      result = await adapter.initiate({ paymentId, userKey, amount, currency: config.currency, payer, now });
    } catch (err) {
      if (err instanceof ProviderRejectedError) {
        await markInitiationFailed(paymentId, err.reason, clock());
        log.warn({ paymentId, provider, reason: err.reason }, '[RECONCILER] Provider rejected payment initiation');
      } else if (err instanceof ProviderTimeoutError) {
        log.warn({ paymentId, provider }, '[RECONCILER] Provider timed out on initiation; payment left open');
      }
      throw err;
    }

    let status = (await attachReference(paymentId, provider, result.providerReference, clock())).status;
    if (result.immediate) {
      await applyNotification(provider, { ...result.immediate, paymentId }, clock());
      const settled = await payments.read(paymentId);
      if (settled) status = settled.payment.status;
    }

    return {
      paymentId,
      status,
      creditDays: record.creditDays,
      providerReference: result.providerReference,
      providerInstructions: result.instructions,
    };
  }

  async function handleProviderNotification(providerName: string, inbound: InboundNotification): Promise<NotificationAcknowledgement> {
    if (!isPaymentProvider(providerName)) {
      throw new ApiError('Unknown payment provider', 404, { provider: providerName }, 'NOT_FOUND');
    }
    const provider = providerName;
    const adapter = requireAdapter(providers, provider);
    const now = clock();

    let items: NormalizedNotification[];
    try {
      items = await adapter.parseNotification(inbound, now);
    } catch (err) {
      if (err instanceof SignatureInvalidError) {
        log.warn({ provider, alert: true, data: err.data }, '[RECONCILER] Notification signature rejected');
      }
      throw err;
    }

    const notificationId = uuidv4();
    await inbox.record({
      id: notificationId,
      provider,
      receivedAt: now.toISOString(),
      rawPayload: inbound.rawPayload,
      query: inbound.query,
      outcome: null,
    });

    const outcomes: NotificationOutcome[] = [];
    for (const item of items) {
      outcomes.push(await applyNotification(provider, item, now));
    }
    await inbox.markOutcome(notificationId, outcomes.join(',') || 'empty', config.maxWriteAttempts);

    log.info({ provider, notificationId, outcomes }, '[RECONCILER] Notification processed');
    return { notificationId, outcomes, body: adapter.acknowledgement(inbound, outcomes) };
  }

  /** Status query fed through the notification path. Returns the stored record afterwards. */
  async function pollPayment(paymentId: string): Promise<PaymentRecord> {
    const current = await payments.read(paymentId);
    if (!current) throw new ApiError('Payment not found', 404, { paymentId }, 'NOT_FOUND');
    const { payment } = current;
    const now = clock();

    if (isTerminal(payment.status)) {
      if (payment.status === 'completed' && !payment.creditAppliedAt) {
        await credits.creditFromPayment(payment, now);
      }
    } else {
      const adapter = statusQueryFor(payment);
      if (!adapter || !adapter.pollStatus) return payment;
      const polled = await adapter.pollStatus(payment, now);
      if (!polled) {
        log.info({ paymentId, provider: payment.provider }, '[RECONCILER] Provider holds no record of the payment yet');
        return payment;
      }
      await applyNotification(payment.provider, { ...polled, paymentId }, now);
    }

    const after = await payments.read(paymentId);
    return after ? after.payment : payment;
  }

  async function getPayment(userKey: string, paymentId: string): Promise<PaymentRecord> {
    const { payment } = await readOwned(userKey, paymentId);
    if (isTerminal(payment.status)) return payment;
    try {
      return await pollPayment(paymentId);
    } catch (err) {
      if (err instanceof ProviderTimeoutError || err instanceof ProviderRejectedError) {
        log.warn({ paymentId, provider: payment.provider, code: err.code }, '[RECONCILER] Status query failed; returning stored status');
        return payment;
      }
      throw err;
    }
  }

  /**
   * User cancellation. Where the provider can be queried its status is checked
   * first, so a payment that already went through stays completed.
   */
  async function cancelPayment(userKey: string, paymentId: string): Promise<PaymentRecord> {
    const { payment } = await readOwned(userKey, paymentId);
    if (isTerminal(payment.status)) return payment;

    if (statusQueryFor(payment)) {
      const polled = await pollPayment(paymentId);
      if (isTerminal(polled.status)) return polled;
    }

    await applyNotification(
      payment.provider,
      {
        paymentId,
        providerReference: null,
        status: 'failed',
        amount: null,
        currency: null,
        failureReason: 'cancelled_by_user',
        providerData: {},
      },
      clock()
    );
    log.info({ paymentId, userKey }, '[RECONCILER] Payment cancelled by user');
    const after = await payments.read(paymentId);
    return after ? after.payment : payment;
  }

  /**
   * Capture context for the hosted card form. Nothing is stored: the payment
   * record is created once the client posts the transient token it mints.
   */
  async function createCardCaptureContext(userKey: string, amount: number, targetOrigins: string[]): Promise<CaptureContext> {
    const adapter = requireAdapter(providers, 'direct-card');
    if (!adapter.createCaptureContext) {
      throw new ApiError('Provider does not issue capture contexts', 503, { provider: adapter.provider }, 'PROVIDER_UNAVAILABLE');
    }
    assertPayableAmount(adapter, amount);
    const context = await adapter.createCaptureContext({ targetOrigins, amount, currency: config.currency, now: clock() });
    log.info({ userKey, provider: adapter.provider, targetOrigins: context.targetOrigins }, '[RECONCILER] Capture context issued');
    return context;
  }

  async function reconcilePendingPayments(now: Date = clock()): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { polled: 0, updated: 0, repaired: 0, failures: 0 };
    for (const { payment } of await payments.listOpen()) {
      if (payment.status === 'completed' && !payment.creditAppliedAt) {
        const credited = await credits.creditFromPayment(payment, now);
        if (credited.applied) summary.repaired += 1;
        continue;
      }
      if (isTerminal(payment.status)) continue;
      if (now.getTime() - Date.parse(payment.createdAt) < graceMs) continue;

      if (!statusQueryFor(payment)) continue;

      summary.polled += 1;
      try {
        const after = await pollPayment(payment.paymentId);
        if (after.status !== payment.status) summary.updated += 1;
      } catch (err) {
        summary.failures += 1;
        log.warn({ err, paymentId: payment.paymentId, provider: payment.provider }, '[RECONCILER] Status query failed during reconciliation');
      }
    }

    log.info(summary, '[RECONCILER] Pending payments reconciled');
    return summary;
  }

  return {
    initiatePayment,
    handleProviderNotification,
    applyNotification,
    pollPayment,
    getPayment,
    cancelPayment,
    createCardCaptureContext,
    reconcilePendingPayments,
  };
}

export type PaymentReconciler = ReturnType<typeof createPaymentReconciler>;
