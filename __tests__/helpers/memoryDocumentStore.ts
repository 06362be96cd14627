import { DocumentData, DocumentStore, DocumentWrite, QueryFilters, StoredDocument } from '../../src/repository/documentStore';
import { ConcurrencyConflictError } from '../../src/utils/errorHandler';

interface Entry {
  version: number;
  data: DocumentData;
}

// Yields to the event loop so concurrent callers interleave between reads and writes.
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

/** In-process DocumentStore with the same versioning rules as the Firestore store. */
export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<string, Map<string, Entry>>();

  private collection(name: string): Map<string, Entry> {
    let docs = this.docs.get(name);
    if (!docs) {
      docs = new Map();
      this.docs.set(name, docs);
    }
    return docs;
  }

  private check(collection: string, id: string, expectedVersion: number | null): number {
    const current = this.collection(collection).get(id);
    const currentVersion = current ? current.version : null;
    if (currentVersion !== expectedVersion) throw new ConcurrencyConflictError(collection, id);
    return (currentVersion ?? 0) + 1;
  }

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    await tick();
    const entry = this.collection(collection).get(id);
    return entry ? { id, version: entry.version, data: structuredClone(entry.data) } : null;
  }

  async put(collection: string, id: string, data: DocumentData, expectedVersion: number | null): Promise<number> {
    await tick();
    const version = this.check(collection, id, expectedVersion);
    this.collection(collection).set(id, { version, data: structuredClone(data) });
    return version;
  }

  async commit(writes: DocumentWrite[]): Promise<void> {
    await tick();
    const versions = writes.map((write) => this.check(write.collection, write.id, write.expectedVersion));
    writes.forEach((write, i) => {
      this.collection(write.collection).set(write.id, { version: versions[i], data: structuredClone(write.data) });
    });
  }

  private snapshot(collection: string, include: (data: DocumentData) => boolean): StoredDocument[] {
    return [...this.collection(collection).entries()]
      .filter(([, entry]) => include(entry.data))
      .map(([id, entry]) => ({ id, version: entry.version, data: structuredClone(entry.data) }));
  }

  async queryAll(collection: string): Promise<StoredDocument[]> {
    await tick();
    return this.snapshot(collection, () => true);
  }

  async queryWhere(collection: string, filters: QueryFilters): Promise<StoredDocument[]> {
    await tick();
    return this.snapshot(collection, (data) => Object.entries(filters).every(([field, value]) => data[field] === value));
  }

  /** Writes a document directly, bypassing version checks. */
  seed(collection: string, id: string, data: DocumentData): void {
    const current = this.collection(collection).get(id);
    this.collection(collection).set(id, { version: (current?.version ?? 0) + 1, data: structuredClone(data) });
  }

  peek(collection: string, id: string): DocumentData | null {
    const entry = this.collection(collection).get(id);
    return entry ? structuredClone(entry.data) : null;
  }

  count(collection: string): number {
    return this.collection(collection).size;
  }
}
