import { body, param } from 'express-validator';
import { PAYMENT_PROVIDERS } from '../../../schemas/documentSchemas';
import { runValidation } from '../runValidation';

export const validateInitiatePayment = [
  body('provider').isString().isIn([...PAYMENT_PROVIDERS]).withMessage('unsupported provider'),
  body('amount').isFloat({ gt: 0 }).withMessage('amount must be a positive number').toFloat(),
  body('phone').optional().isString().isLength({ min: 9, max: 16 }),
  body('email').optional().isEmail(),
  body('firstName').optional().isString().isLength({ max: 100 }),
  body('lastName').optional().isString().isLength({ max: 100 }),
  body('transientToken').optional().isString().isLength({ min: 1, max: 4096 }),
  body('provider').custom((provider, { req }) => {
    if (provider === 'push-payment' && !req.body.phone) throw new Error('phone is required for push-payment');
    if (provider === 'direct-card' && !req.body.transientToken) throw new Error('transientToken is required for direct-card');
    return true;
  }),
  runValidation,
];

export const validateCaptureContext = [
  body('amount').isFloat({ gt: 0 }).withMessage('amount must be a positive number').toFloat(),
  body('targetOrigins').optional().isArray({ min: 1, max: 5 }).withMessage('targetOrigins must list up to 5 origins'),
  body('targetOrigins.*').isURL({ require_protocol: true, require_tld: false, protocols: ['http', 'https'] }).withMessage('invalid origin'),
  runValidation,
];

export const validatePaymentId = [
  param('paymentId').isUUID(4).withMessage('invalid paymentId'),
  runValidation,
];
