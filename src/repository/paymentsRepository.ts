import { PaymentRecordSchema, PaymentReferenceSchema } from '../schemas/documentSchemas';
import { PaymentProvider, PaymentRecord } from '../types/payments';
import { LedgerInvariantError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { COLLECTIONS, DocumentStore, DocumentWrite, StoredDocument } from './documentStore';

export interface VersionedPayment {
  payment: PaymentRecord;
  version: number;
}

/** Reference index document id: one per provider reference. */
export function referenceKey(provider: PaymentProvider, providerReference: string): string {
  return `${provider}_${providerReference}`.replace(/\//g, '_');
}

function parsePayment(doc: StoredDocument): PaymentRecord | null {
  const parsed = PaymentRecordSchema.safeParse({ paymentId: doc.id, ...doc.data });
  return parsed.success ? parsed.data : null;
}

export function createPaymentsRepository(store: DocumentStore) {
  return {
    async read(paymentId: string): Promise<VersionedPayment | null> {
      const doc = await store.get(COLLECTIONS.payments, paymentId);
      if (!doc) return null;
      const payment = parsePayment(doc);
      if (!payment) {
        throw new LedgerInvariantError('Stored payment record failed validation', { paymentId });
      }
      return { payment, version: doc.version };
    },

    async findByReference(provider: PaymentProvider, providerReference: string): Promise<string | null> {
      const doc = await store.get(COLLECTIONS.paymentReferences, referenceKey(provider, providerReference));
      if (!doc) return null;
      const parsed = PaymentReferenceSchema.safeParse(doc.data);
      if (!parsed.success) {
        logger.warn({ provider, providerReference }, '[PAYMENTS_REPO] Invalid reference index entry');
        return null;
      }
      return parsed.data.paymentId;
    },

    /**
     * Payments the reconcile sweep still has work on: non-terminal ones, and
     * completed ones whose credit was never applied.
     */
    async listOpen(): Promise<VersionedPayment[]> {
      const batches = await Promise.all([
        store.queryWhere(COLLECTIONS.payments, { status: 'initiated' }),
        store.queryWhere(COLLECTIONS.payments, { status: 'pending' }),
        store.queryWhere(COLLECTIONS.payments, { status: 'completed', creditAppliedAt: null }),
      ]);
      const docs = batches.flat();
      const payments: VersionedPayment[] = [];
      for (const doc of docs) {
        const payment = parsePayment(doc);
        if (payment) {
          payments.push({ payment, version: doc.version });
        } else {
          logger.warn({ paymentId: doc.id }, '[PAYMENTS_REPO] Skipping invalid payment document');
        }
      }
      return payments;
    },

    write(payment: PaymentRecord, expectedVersion: number | null): DocumentWrite {
      return {
        collection: COLLECTIONS.payments,
        id: payment.paymentId,
        data: { ...payment },
        expectedVersion,
      };
    },

    /** Create-only: a reference is bound to one payment for good. */
    referenceWrite(provider: PaymentProvider, providerReference: string, paymentId: string): DocumentWrite {
      return {
        collection: COLLECTIONS.paymentReferences,
        id: referenceKey(provider, providerReference),
        data: { provider, providerReference, paymentId },
        expectedVersion: null,
      };
    },
  };
}

export type PaymentsRepository = ReturnType<typeof createPaymentsRepository>;
