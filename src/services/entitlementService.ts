import { Entitlement, EntitlementPolicy, UserAccount } from '../types/credits';
import { MS_PER_DAY, parseInstant } from '../utils/calendar';

type EntitlementInput = Pick<UserAccount, 'registrationTimestamp' | 'creditBalanceDays'>;

/** End of the free trial, or null when the account has no trial start. */
export function trialEndsAt(user: EntitlementInput, policy: EntitlementPolicy): Date | null {
  const registeredAt = parseInstant(user.registrationTimestamp);
  if (!registeredAt) return null;
  return new Date(registeredAt.getTime() + policy.trialWindowDays * MS_PER_DAY);
}

/**
 * Single source of truth for whether a user may use the app at `now`.
 * Used by usage gating, the sweeps and the status endpoints alike.
 */
export function evaluate(user: EntitlementInput, now: Date, policy: EntitlementPolicy): Entitlement {
  const registeredAt = parseInstant(user.registrationTimestamp);
  const requiresTrialReset = registeredAt === null;

  if (registeredAt && !policy.forceTrialEnd) {
    const elapsedDays = Math.max(0, (now.getTime() - registeredAt.getTime()) / MS_PER_DAY);
    if (elapsedDays < policy.trialWindowDays) {
      return {
        status: 'TRIAL',
        daysRemaining: Math.ceil(policy.trialWindowDays - elapsedDays),
        requiresTrialReset,
      };
    }
  }

  if (user.creditBalanceDays > 0) {
    return { status: 'ACTIVE', daysRemaining: Math.floor(user.creditBalanceDays), requiresTrialReset };
  }

  return { status: 'BLOCKED', daysRemaining: 0, requiresTrialReset };
}
