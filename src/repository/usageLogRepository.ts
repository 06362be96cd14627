import { UsageLogEntrySchema } from '../schemas/documentSchemas';
import { UsageLogEntry } from '../types/credits';
import { COLLECTIONS, DocumentStore, DocumentWrite } from './documentStore';

export function createUsageLogRepository(store: DocumentStore) {
  return {
    /** Entries are append-only, so every write is create-only. */
    append(entry: UsageLogEntry): DocumentWrite {
      return {
        collection: COLLECTIONS.usageLogs,
        id: entry.usageId,
        data: { ...entry },
        expectedVersion: null,
      };
    },

    async listForUser(userKey: string): Promise<UsageLogEntry[]> {
      const docs = await store.queryWhere(COLLECTIONS.usageLogs, { userKey });
      const entries: UsageLogEntry[] = [];
      for (const doc of docs) {
        const parsed = UsageLogEntrySchema.safeParse(doc.data);
        if (parsed.success) entries.push(parsed.data);
      }
      return entries.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    },
  };
}

export type UsageLogRepository = ReturnType<typeof createUsageLogRepository>;
