import { ProviderNotificationRecord } from '../types/payments';
import { LedgerInvariantError } from '../utils/errorHandler';
import { withOptimisticRetry } from '../utils/optimisticRetry';
import { COLLECTIONS, DocumentStore } from './documentStore';

export function createNotificationInboxRepository(store: DocumentStore) {
  return {
    async record(notification: ProviderNotificationRecord): Promise<void> {
      await store.put(COLLECTIONS.providerNotifications, notification.id, { ...notification }, null);
    },

    async markOutcome(id: string, outcome: string, maxAttempts: number): Promise<void> {
      await withOptimisticRetry(`inbox:${id}`, maxAttempts, async () => {
        const doc = await store.get(COLLECTIONS.providerNotifications, id);
        if (!doc) throw new LedgerInvariantError('Provider notification vanished before its outcome was recorded', { id });
        await store.put(COLLECTIONS.providerNotifications, id, { ...doc.data, outcome }, doc.version);
      });
    },
  };
}

export type NotificationInboxRepository = ReturnType<typeof createNotificationInboxRepository>;
