import { UserAccountSchema } from '../schemas/documentSchemas';
import { UserAccount } from '../types/credits';
import { LedgerInvariantError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { COLLECTIONS, DocumentStore, DocumentWrite, StoredDocument } from './documentStore';

export interface VersionedAccount {
  account: UserAccount;
  version: number;
}

function parseAccount(doc: StoredDocument): UserAccount | null {
  const parsed = UserAccountSchema.safeParse({ userKey: doc.id, ...doc.data });
  return parsed.success ? parsed.data : null;
}

export function createUserAccountRepository(store: DocumentStore) {
  return {
    async read(userKey: string): Promise<VersionedAccount | null> {
      const doc = await store.get(COLLECTIONS.userAccounts, userKey);
      if (!doc) return null;
      const account = parseAccount(doc);
      if (!account) {
        throw new LedgerInvariantError('Stored user account failed validation', { userKey });
      }
      return { account, version: doc.version };
    },

    /** Accounts that fail validation are skipped so one bad document cannot stall a sweep. */
    async listAll(): Promise<VersionedAccount[]> {
      const docs = await store.queryAll(COLLECTIONS.userAccounts);
      const accounts: VersionedAccount[] = [];
      for (const doc of docs) {
        const account = parseAccount(doc);
        if (account) {
          accounts.push({ account, version: doc.version });
        } else {
          logger.warn({ userKey: doc.id }, '[ACCOUNTS_REPO] Skipping invalid user account document');
        }
      }
      return accounts;
    },

    write(account: UserAccount, expectedVersion: number | null): DocumentWrite {
      return {
        collection: COLLECTIONS.userAccounts,
        id: account.userKey,
        data: { ...account },
        expectedVersion,
      };
    },
  };
}

export type UserAccountRepository = ReturnType<typeof createUserAccountRepository>;
