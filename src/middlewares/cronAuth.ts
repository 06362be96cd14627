import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/errorHandler';
import { digestsEqual } from '../utils/webhookSignature';
import { logger } from '../utils/logger';

/**
 * Guards cron routes with a shared key, given as `?key=` or `X-Cron-Auth`.
 * With no key configured the routes are open (local development only).
 */
export function createCronAuth(secretKey: string | undefined) {
  return function cronAuth(req: Request, _res: Response, next: NextFunction) {
    if (!secretKey) return next();
    const fromQuery = typeof req.query.key === 'string' ? req.query.key : undefined;
    const provided = fromQuery ?? req.get('x-cron-auth');
    if (provided && digestsEqual(secretKey, provided)) return next();
    logger.warn({ path: req.path }, '[AUTH] Cron request with a bad key');
    return next(new ApiError('Unauthorized', 401, null, 'UNAUTHORIZED'));
  };
}
