import { redactUrl } from '../src/middlewares/logger';

describe('request log url redaction', () => {
  it('masks the cron key in the query string', () => {
    expect(redactUrl('/api/cron/trial-reset?key=test-cron-key')).toBe('/api/cron/trial-reset?key=[REDACTED]');
    expect(redactUrl('/api/cron/all?x=1&key=abc&y=2')).toBe('/api/cron/all?x=1&key=[REDACTED]&y=2');
    expect(redactUrl('/api/credits/me')).toBe('/api/credits/me');
  });
});
