import { FcmTokenSchema } from '../schemas/documentSchemas';
import { COLLECTIONS, DocumentStore } from './documentStore';

export function createFcmTokenRepository(store: DocumentStore) {
  return {
    async readToken(userKey: string): Promise<string | null> {
      const doc = await store.get(COLLECTIONS.fcmTokens, userKey);
      if (!doc) return null;
      const parsed = FcmTokenSchema.safeParse(doc.data);
      return parsed.success ? parsed.data.token : null;
    },
  };
}

export type FcmTokenRepository = ReturnType<typeof createFcmTokenRepository>;
