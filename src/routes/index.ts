import { Router } from 'express';
import type { AppContainer } from '../app/container';
import { createRequireAuth } from '../middlewares/authMiddleware';
import { createCreditsRoutes } from './credits';
import { createCronRoutes } from './cron';
import { createPaymentsRoutes } from './payments';

/** JSON API routes. Webhooks are mounted separately, before the body parsers. */
export function createRoutes(container: AppContainer) {
  const router = Router();
  const requireAuth = createRequireAuth(container.verifyIdToken);

  router.use('/credits', createCreditsRoutes(container.credits, requireAuth));
  router.use('/payments', createPaymentsRoutes(container.reconciler, requireAuth));
  router.use('/cron', createCronRoutes(container.sweeps, container.cronSecretKey));

  return router;
}
