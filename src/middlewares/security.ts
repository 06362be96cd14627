import helmet from 'helmet';
import compression from 'compression';
import hpp from 'hpp';
import { v4 as uuidv4 } from 'uuid';
import { Request, Response, NextFunction } from 'express';
import '../types/http';

export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.get('x-request-id');
  req.requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  res.setHeader('X-Request-Id', req.requestId);
  next();
};

// JSON API only: nothing is rendered, so the strictest defaults apply.
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    useDefaults: true,
    directives: { 'default-src': ["'none'"], 'frame-ancestors': ["'none'"] },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  referrerPolicy: { policy: 'no-referrer' },
  frameguard: { action: 'deny' },
  hsts: { maxAge: 15552000, includeSubDomains: true },
});

export const httpParamPollution = hpp();
export const gzipCompression = compression();
