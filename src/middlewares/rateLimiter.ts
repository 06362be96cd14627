/**
 * Rate limits per client IP (in-memory store, one per app instance).
 * - Payment initiation and cancellation: 10 requests/min
 * - Provider webhooks: 120 requests/min
 */

import rateLimit from 'express-rate-limit';

const message = {
  responseStatus: 'error',
  message: 'Too many requests, please try again later',
  data: null,
};

export const createPaymentLimiter = () =>
  rateLimit({
    windowMs: 60 * 1000,
    max: 10,
    message,
    standardHeaders: true,
    legacyHeaders: false,
  });

export const createWebhookLimiter = () =>
  rateLimit({
    windowMs: 60 * 1000,
    max: 120,
    message,
    standardHeaders: true,
    legacyHeaders: false,
  });
