import type { Firestore, DocumentSnapshot, Query } from 'firebase-admin/firestore';
import { ConcurrencyConflictError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { DocumentData, DocumentStore, DocumentWrite, QueryFilters, StoredDocument } from './documentStore';

const VERSION_FIELD = '_version';

function toStored(snap: DocumentSnapshot): StoredDocument | null {
  if (!snap.exists) return null;
  const raw = snap.data() ?? {};
  const { [VERSION_FIELD]: version, ...data } = raw;
  return {
    id: snap.id,
    version: typeof version === 'number' ? version : 0,
    data,
  };
}

/**
 * Firestore-backed store. Version checks and writes run inside a single
 * transaction, so a commit of several documents is atomic.
 */
export function createFirestoreDocumentStore(db: Firestore): DocumentStore {
  async function commit(writes: DocumentWrite[]): Promise<void> {
    if (writes.length === 0) return;
    await db.runTransaction(async (tx) => {
      const refs = writes.map((w) => db.collection(w.collection).doc(w.id));
      const snaps = await Promise.all(refs.map((ref) => tx.get(ref)));

      writes.forEach((w, i) => {
        const current = toStored(snaps[i]);
        const currentVersion = current ? current.version : null;
        if (currentVersion !== w.expectedVersion) {
          logger.debug({ collection: w.collection, id: w.id, expected: w.expectedVersion, actual: currentVersion }, '[STORE] Version mismatch');
          throw new ConcurrencyConflictError(w.collection, w.id);
        }
      });

      writes.forEach((w, i) => {
        const nextVersion = (w.expectedVersion ?? 0) + 1;
        tx.set(refs[i], { ...w.data, [VERSION_FIELD]: nextVersion });
      });
    });
  }

  function collectStored(docs: DocumentSnapshot[]): StoredDocument[] {
    const stored: StoredDocument[] = [];
    docs.forEach((doc) => {
      const entry = toStored(doc);
      if (entry) stored.push(entry);
    });
    return stored;
  }

  return {
    async get(collection: string, id: string): Promise<StoredDocument | null> {
      const snap = await db.collection(collection).doc(id).get();
      return toStored(snap);
    },

    async put(collection: string, id: string, data: DocumentData, expectedVersion: number | null): Promise<number> {
      await commit([{ collection, id, data, expectedVersion }]);
      return (expectedVersion ?? 0) + 1;
    },

    commit,

    async queryAll(collection: string): Promise<StoredDocument[]> {
      const snap = await db.collection(collection).get();
      return collectStored(snap.docs);
    },

    async queryWhere(collection: string, filters: QueryFilters): Promise<StoredDocument[]> {
      let query: Query = db.collection(collection);
      for (const [field, value] of Object.entries(filters)) {
        query = query.where(field, '==', value);
      }
      const snap = await query.get();
      return collectStored(snap.docs);
    },
  };
}
