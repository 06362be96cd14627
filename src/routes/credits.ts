import { Router, RequestHandler } from 'express';
import { createCreditsController } from '../controllers/creditsController';
import { validateRecordUsage } from '../middlewares/validators/credits/validateCredits';
import { CreditsService } from '../services/creditsService';

export function createCreditsRoutes(credits: CreditsService, requireAuth: RequestHandler) {
  const router = Router();
  const creditsController = createCreditsController(credits);

  router.get('/me', requireAuth, creditsController.me);
  router.get('/usage', requireAuth, creditsController.usage);
  router.post('/usage', requireAuth, validateRecordUsage, creditsController.recordUsage);

  return router;
}
