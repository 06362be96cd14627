import { IncomingMessage } from 'http';
import pinoHttp from 'pino-http';
import { requestLogger } from '../utils/logger';

function requestIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers['x-request-id'];
  return Array.isArray(header) ? header[0] : header;
}

/** Cron triggers may carry their shared key in the query string. */
export function redactUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]*/g, '$1[REDACTED]');
}

export const httpLogger = pinoHttp({
  logger: requestLogger,
  customProps: (req) => ({ requestId: requestIdOf(req) }),
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
  serializers: {
    req(req) {
      return {
        id: req.id,
        method: req.method,
        url: redactUrl(req.url),
        remoteAddress: req.remoteAddress,
        headers: {
          // provider signatures and bearer tokens stay out of the log
          'user-agent': req.headers['user-agent'],
          'content-type': req.headers['content-type']
        }
      };
    }
  }
});
