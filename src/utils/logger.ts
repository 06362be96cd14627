import pino from "pino";
import fs from "fs";
import path from "path";
import { env } from "../config/env";

const isDev = env.nodeEnv === "development";
const isTest = env.nodeEnv === "test";

const redact = {
  paths: [
    "req.headers.authorization",
    "req.headers.cookie",
    "req.headers['v-c-signature']",
    "password",
    "token",
    "secret",
    "*.consumerSecret",
    "*.passkey",
  ],
  remove: true,
};

export const logger = pino({
  level: isTest ? "silent" : env.logLevel || "info",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: true, singleLine: false },
      }
    : undefined,
  base: undefined,
  redact,
});

function createRequestLogger(): pino.Logger {
  if (!env.requestLogFile || isTest) {
    return logger.child({ component: "http" });
  }
  const requestLogPath = path.resolve(process.cwd(), env.requestLogFile);
  fs.mkdirSync(path.dirname(requestLogPath), { recursive: true });
  // Dedicated request logger writing to file (non-blocking async mode)
  const requestDestination = pino.destination({ dest: requestLogPath, sync: false });
  return pino({ level: env.logLevel || "info", base: undefined, redact }, requestDestination);
}

export const requestLogger = createRequestLogger();

export type Logger = pino.Logger;
