import { z } from 'zod';
import { DebtEntrySchema, UserDebtsSchema } from '../schemas/documentSchemas';
import { logger } from '../utils/logger';
import { COLLECTIONS, DocumentStore } from './documentStore';

export type DebtEntry = z.infer<typeof DebtEntrySchema>;

export interface OpenDebt {
  userKey: string;
  debtorId: string;
  accountName: string;
  debtId: string;
  dueDate: string;
  amount: string;
  description: string;
}

/** Debts with a due date that are not yet settled, flattened per user. */
export function createUserDebtsRepository(store: DocumentStore) {
  return {
    async listOpenDebts(): Promise<OpenDebt[]> {
      const docs = await store.queryAll(COLLECTIONS.userDebts);
      const open: OpenDebt[] = [];
      for (const doc of docs) {
        const parsed = UserDebtsSchema.safeParse(doc.data);
        if (!parsed.success) {
          logger.warn({ userKey: doc.id }, '[DEBTS_REPO] Skipping invalid debts document');
          continue;
        }
        for (const [debtorId, debtor] of Object.entries(parsed.data.debtors ?? {})) {
          for (const [debtId, debt] of Object.entries(debtor.debts ?? {})) {
            if (debt.isComplete || !debt.date) continue;
            open.push({
              userKey: doc.id,
              debtorId,
              accountName: debtor.accountName || 'Unknown',
              debtId,
              dueDate: debt.date,
              amount: debt.debtAmount == null ? '0' : String(debt.debtAmount),
              description: debt.description ?? '',
            });
          }
        }
      }
      return open;
    },
  };
}

export type UserDebtsRepository = ReturnType<typeof createUserDebtsRepository>;
