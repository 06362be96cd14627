import { Router, RequestHandler } from 'express';
import { createPaymentsController } from '../controllers/paymentsController';
import { createPaymentLimiter } from '../middlewares/rateLimiter';
import { validateCaptureContext, validateInitiatePayment, validatePaymentId } from '../middlewares/validators/payments/validatePayments';
import { PaymentReconciler } from '../services/payments/paymentReconciler';

export function createPaymentsRoutes(reconciler: PaymentReconciler, requireAuth: RequestHandler) {
  const router = Router();
  const paymentsController = createPaymentsController(reconciler);
  const paymentLimiter = createPaymentLimiter();

  router.post('/', requireAuth, paymentLimiter, validateInitiatePayment, paymentsController.initiate);
  router.post('/direct-card/capture-context', requireAuth, paymentLimiter, validateCaptureContext, paymentsController.captureContext);
  router.get('/:paymentId', requireAuth, validatePaymentId, paymentsController.status);
  router.post('/:paymentId/cancel', requireAuth, paymentLimiter, validatePaymentId, paymentsController.cancel);

  return router;
}
