import { PaymentRecord, PaymentStatus } from '../../types/payments';
import { LedgerInvariantError } from '../../utils/errorHandler';

const TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  initiated: ['pending', 'failed'],
  pending: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminal(status: PaymentStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: PaymentStatus, to: PaymentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * States walked from `from` to reach `to`. A confirmation that lands while the
 * record is still `initiated` passes through `pending` in the same write.
 */
export function transitionPath(from: PaymentStatus, to: PaymentStatus): PaymentStatus[] {
  if (canTransition(from, to)) return [to];
  if (from === 'initiated' && to === 'completed') return ['pending', 'completed'];
  return [];
}

export function assertTransition(payment: PaymentRecord, to: PaymentStatus): void {
  if (transitionPath(payment.status, to).length === 0) {
    throw new LedgerInvariantError('Illegal payment transition', {
      paymentId: payment.paymentId,
      from: payment.status,
      to,
    });
  }
}
