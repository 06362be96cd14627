/**
 * Document store contract used by every repository.
 *
 * Each document carries a monotonically increasing version. Writes name the
 * version they were computed from; a mismatch raises ConcurrencyConflictError
 * so the caller can re-read and retry. `expectedVersion: null` means the
 * document must not exist yet.
 */

export type DocumentData = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  version: number;
  data: DocumentData;
}

export interface DocumentWrite {
  collection: string;
  id: string;
  data: DocumentData;
  expectedVersion: number | null;
}

export interface DocumentStore {
  get(collection: string, id: string): Promise<StoredDocument | null>;
  /** Conditional single-document write. Resolves with the new version. */
  put(collection: string, id: string, data: DocumentData, expectedVersion: number | null): Promise<number>;
  /** All writes succeed together or none do. */
  commit(writes: DocumentWrite[]): Promise<void>;
  queryAll(collection: string): Promise<StoredDocument[]>;
  /** Documents whose fields equal every value in `filters`. */
  queryWhere(collection: string, filters: QueryFilters): Promise<StoredDocument[]>;
}

export type QueryFilters = Record<string, string | null>;

export const COLLECTIONS = {
  userAccounts: 'userAccounts',
  payments: 'payments',
  paymentReferences: 'paymentReferences',
  usageLogs: 'usageLogs',
  providerNotifications: 'providerNotifications',
  schedulerMarkers: 'schedulerMarkers',
  fcmTokens: 'fcmTokens',
  userDebts: 'userDebts',
} as const;
