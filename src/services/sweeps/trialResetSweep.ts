import { UserAccountRepository } from '../../repository/userAccountRepository';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { CreditsService } from '../creditsService';

export interface TrialResetSweepReport {
  examined: number;
  reset: number;
}

/** The only sweep that writes to the ledger; each reset goes through the ledger's own guard. */
export function createTrialResetSweep(deps: { accounts: UserAccountRepository; credits: CreditsService; log?: Logger }) {
  const log = deps.log ?? rootLogger;

  return async function runTrialResetSweep(now: Date): Promise<TrialResetSweepReport> {
    const report: TrialResetSweepReport = { examined: 0, reset: 0 };
    for (const { account } of await deps.accounts.listAll()) {
      report.examined += 1;
      if (await deps.credits.resetIfDue(account.userKey, now)) report.reset += 1;
    }
    log.info(report, '[SWEEP] Trial reset done');
    return report;
  };
}
