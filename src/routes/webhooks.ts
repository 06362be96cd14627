import express, { Router } from 'express';
import { createWebhooksController } from '../controllers/webhooksController';
import { createWebhookLimiter } from '../middlewares/rateLimiter';
import { PaymentReconciler } from '../services/payments/paymentReconciler';

/**
 * Provider callbacks. Mounted ahead of the JSON body parser: the body is kept
 * as raw text for signature checks.
 */
export function createWebhookRoutes(reconciler: PaymentReconciler) {
  const router = Router();
  const webhooksController = createWebhooksController(reconciler);

  router.use(createWebhookLimiter());
  router.use(express.text({ type: () => true, limit: '256kb' }));

  router.post('/:provider', webhooksController.receive);
  // Hosted checkout IPNs may be registered as GET notifications.
  router.get('/:provider', webhooksController.receive);

  return router;
}
