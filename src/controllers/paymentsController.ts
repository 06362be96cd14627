import { Request, Response, NextFunction } from 'express';
import '../types/http';
import { PaymentReconciler } from '../services/payments/paymentReconciler';
import { isPaymentProvider, PayerInfo, PaymentRecord } from '../types/payments';
import { ApiError } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** What the owner of a payment gets to see; provider payload fields stay internal. */
export function toPaymentView(payment: PaymentRecord) {
  return {
    paymentId: payment.paymentId,
    provider: payment.provider,
    amount: payment.amount,
    currency: payment.currency,
    status: payment.status,
    providerReference: payment.providerReference,
    creditDays: payment.creditDays,
    credited: payment.creditAppliedAt !== null,
    failureReason: payment.failureReason,
    createdAt: payment.createdAt,
    finalizedAt: payment.finalizedAt,
  };
}

export function createPaymentsController(reconciler: PaymentReconciler) {
  async function initiate(req: Request, res: Response, next: NextFunction) {
    try {
      const provider = String(req.body.provider);
      if (!isPaymentProvider(provider)) throw new ApiError('Unsupported provider', 400, { provider }, 'BAD_REQUEST');

      const payer: PayerInfo = {
        phone: optionalString(req.body.phone),
        email: optionalString(req.body.email) ?? req.email,
        firstName: optionalString(req.body.firstName),
        lastName: optionalString(req.body.lastName),
        transientToken: optionalString(req.body.transientToken),
      };
      const result = await reconciler.initiatePayment({
        userKey: req.uid,
        amount: Number(req.body.amount),
        provider,
        payer,
      });
      res.status(201).json(formatApiResponse('success', 'Payment initiated', result));
    } catch (err) {
      next(err);
    }
  }

  async function status(req: Request, res: Response, next: NextFunction) {
    try {
      const payment = await reconciler.getPayment(req.uid, req.params.paymentId);
      res.json(formatApiResponse('success', 'Payment status', toPaymentView(payment)));
    } catch (err) {
      next(err);
    }
  }

  async function cancel(req: Request, res: Response, next: NextFunction) {
    try {
      const payment = await reconciler.cancelPayment(req.uid, req.params.paymentId);
      res.json(formatApiResponse('success', 'Payment cancellation processed', toPaymentView(payment)));
    } catch (err) {
      next(err);
    }
  }

  async function captureContext(req: Request, res: Response, next: NextFunction) {
    try {
      const origins: unknown[] = Array.isArray(req.body.targetOrigins) ? req.body.targetOrigins : [];
      const targetOrigins = origins.filter((o): o is string => typeof o === 'string').map((o) => new URL(o).origin);
      const context = await reconciler.createCardCaptureContext(req.uid, Number(req.body.amount), targetOrigins);
      res.json(formatApiResponse('success', 'Capture context issued', context));
    } catch (err) {
      next(err);
    }
  }

  return { initiate, status, cancel, captureContext };
}
