import dotenv from 'dotenv';
import path from 'path';

// Load .env from the project root before anything reads process.env
const envPath = path.resolve(process.cwd(), '.env');
dotenv.config({ path: envPath });

import { env } from './config/env';
import type { Server as HttpServer } from 'http';
import { createApp } from './app/app';
import { createProductionContainer } from './app/container';
import { startSweepSchedules } from './services/sweeps/sweepSchedules';
import { logger } from './utils/logger';

const container = createProductionContainer();
const app = createApp(container);

const server: HttpServer = app.listen(env.port, () => {
  logger.info({ port: env.port }, 'Credit ledger service running');
});

const schedules = startSweepSchedules(container.sweeps, {
  timezone: env.sweepTimezone,
  lowCredit: env.lowCreditSchedule,
  debtReminders: env.debtReminderSchedule,
  trialReset: env.trialResetSchedule,
  paymentReconcile: env.paymentReconcileSchedule,
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  schedules.stop();
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'HTTP server did not close cleanly');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
