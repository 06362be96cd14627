import { Request, Response, NextFunction } from 'express';
import '../types/http';
import { ApiError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface VerifiedIdentity {
  uid: string;
  email?: string;
}

export type IdTokenVerifier = (idToken: string) => Promise<VerifiedIdentity>;

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !/^Bearer\s+/i.test(header)) return null;
  const token = header.replace(/^Bearer\s+/i, '').trim();
  return token || null;
}

/**
 * Requires a Firebase ID token as `Authorization: Bearer <token>` and sets
 * `req.uid` to the verified user.
 */
export function createRequireAuth(verifyIdToken: IdTokenVerifier) {
  return async function requireAuth(req: Request, _res: Response, next: NextFunction) {
    const token = bearerToken(req);
    if (!token) return next(new ApiError('Unauthorized - missing bearer token', 401, null, 'UNAUTHORIZED'));

    try {
      const identity = await verifyIdToken(token);
      req.uid = identity.uid;
      req.email = identity.email;
      return next();
    } catch (err) {
      logger.warn({ err, path: req.path }, '[AUTH] ID token rejected');
      return next(new ApiError('Unauthorized - invalid token', 401, null, 'UNAUTHORIZED'));
    }
  };
}
