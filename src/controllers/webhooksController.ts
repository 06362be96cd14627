import { Request, Response, NextFunction } from 'express';
import { PaymentReconciler } from '../services/payments/paymentReconciler';
import { InboundNotification } from '../types/payments';

function flattenHeaders(req: Request): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(',') : value;
  }
  return headers;
}

function flattenQuery(req: Request): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [name, value] of Object.entries(req.query)) {
    if (typeof value === 'string') query[name] = value;
  }
  return query;
}

/**
 * Provider callbacks. The body arrives unparsed so signatures are checked over
 * the exact bytes the provider signed; the response is the provider's own
 * acknowledgement shape.
 */
export function createWebhooksController(reconciler: PaymentReconciler) {
  async function receive(req: Request, res: Response, next: NextFunction) {
    try {
      const inbound: InboundNotification = {
        rawPayload: typeof req.body === 'string' ? req.body : '',
        headers: flattenHeaders(req),
        query: flattenQuery(req),
      };
      const ack = await reconciler.handleProviderNotification(req.params.provider, inbound);
      res.status(200).json(ack.body);
    } catch (err) {
      next(err);
    }
  }

  return { receive };
}
