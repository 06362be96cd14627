import { Request, Response, NextFunction } from 'express';
import { SweepService } from '../services/sweeps/sweepService';
import { formatApiResponse } from '../utils/formatApiResponse';

export function createCronController(sweeps: SweepService) {
  async function lowCredit(_req: Request, res: Response, next: NextFunction) {
    try {
      res.json(formatApiResponse('success', 'Low-credit sweep processed', await sweeps.runLowCredit()));
    } catch (err) {
      next(err);
    }
  }

  async function debtReminders(_req: Request, res: Response, next: NextFunction) {
    try {
      res.json(formatApiResponse('success', 'Debt reminder sweep processed', await sweeps.runDebtReminders()));
    } catch (err) {
      next(err);
    }
  }

  async function allNotifications(_req: Request, res: Response, next: NextFunction) {
    try {
      const lowCreditResult = await sweeps.runLowCredit();
      const debtReminderResult = await sweeps.runDebtReminders();
      res.json(formatApiResponse('success', 'Notification sweeps processed', { lowCredit: lowCreditResult, debtReminders: debtReminderResult }));
    } catch (err) {
      next(err);
    }
  }

  async function trialReset(_req: Request, res: Response, next: NextFunction) {
    try {
      res.json(formatApiResponse('success', 'Trial reset sweep processed', await sweeps.runTrialReset()));
    } catch (err) {
      next(err);
    }
  }

  async function reconcilePayments(_req: Request, res: Response, next: NextFunction) {
    try {
      res.json(formatApiResponse('success', 'Pending payments reconciled', await sweeps.reconcilePayments()));
    } catch (err) {
      next(err);
    }
  }

  return { lowCredit, debtReminders, allNotifications, trialReset, reconcilePayments };
}
