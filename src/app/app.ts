import express from 'express';
import cors from 'cors';
import { createRoutes } from '../routes';
import { createWebhookRoutes } from '../routes/webhooks';
import { errorHandler } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';
import { gzipCompression, httpParamPollution, requestId, securityHeaders } from '../middlewares/security';
import { httpLogger } from '../middlewares/logger';
import { env } from '../config/env';
import type { AppContainer } from './container';
// Note: dotenv is loaded in index.ts, no need to load here

export function createApp(container: AppContainer) {
  const app = express();

  const isProd = env.nodeEnv === 'production';
  app.set('trust proxy', isProd ? 1 : false);

  app.use(requestId);
  app.use(securityHeaders);
  app.use(
    cors({
      // Mobile clients and providers send no Origin header
      origin: env.corsOrigins.length ? env.corsOrigins : false,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
      maxAge: 86400,
    })
  );
  app.use(httpLogger);
  app.use(gzipCompression);

  // Raw-body routes first
  app.use('/api/webhooks', createWebhookRoutes(container.reconciler));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(httpParamPollution);

  app.get('/health', (_req, res) => {
    res.json(formatApiResponse('success', 'OK', { uptime: process.uptime() }));
  });

  app.use('/api', createRoutes(container));
  app.use((_req, res) => {
    res.status(404).json(formatApiResponse('error', 'Not found', null));
  });
  app.use(errorHandler);

  return app;
}
