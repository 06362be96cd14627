import { Router } from 'express';
import { createCronController } from '../controllers/cronController';
import { createCronAuth } from '../middlewares/cronAuth';
import { SweepService } from '../services/sweeps/sweepService';

export function createCronRoutes(sweeps: SweepService, cronSecretKey: string | undefined) {
  const router = Router();
  const cronController = createCronController(sweeps);

  router.use(createCronAuth(cronSecretKey));
  router.get('/notifications/low-credit', cronController.lowCredit);
  router.get('/notifications/debt-reminders', cronController.debtReminders);
  router.get('/notifications/all', cronController.allNotifications);
  router.get('/trial-reset', cronController.trialReset);
  router.get('/payments/reconcile', cronController.reconcilePayments);

  return router;
}
