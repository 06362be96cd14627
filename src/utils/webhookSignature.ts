import { createHash, createHmac, timingSafeEqual } from 'crypto';

export type SignatureFailure =
  | 'missing_signature'
  | 'malformed_signature'
  | 'stale_timestamp'
  | 'signature_mismatch';

export type SignatureCheck = { ok: true; timestampMs: number } | { ok: false; reason: SignatureFailure };

/**
 * Parses `k=v` pairs joined by `separator`, e.g. "t=1700;keyId=abc;sig=xyz".
 * Only the first `=` splits a pair, since base64 values may end in `=`.
 */
export function parseSignatureHeader(header: string | undefined, separator: string): Record<string, string> {
  const result: Record<string, string> = {};
  if (!header) return result;
  for (const part of header.split(separator)) {
    const idx = part.indexOf('=');
    if (idx <= 0) continue;
    const key = part.slice(0, idx).trim();
    const value = part.slice(idx + 1).trim();
    if (key && value) result[key] = value;
  }
  return result;
}

export function hmacSha256(secret: string | Buffer, message: string, encoding: 'hex' | 'base64'): string {
  return createHmac('sha256', secret).update(message, 'utf8').digest(encoding);
}

export function sha256Base64(payload: string): string {
  return createHash('sha256').update(payload, 'utf8').digest('base64');
}

/** Constant-time comparison of two encoded digests. */
export function digestsEqual(expected: string, received: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(received, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function isFresh(timestampMs: number, now: Date, toleranceMs: number): boolean {
  return Math.abs(now.getTime() - timestampMs) <= toleranceMs;
}

export interface TimestampedSignatureInput {
  timestamp: string | undefined;
  signature: string | undefined;
  /** Signed material that follows `<timestamp>.` */
  signedContent: string;
  secret: string | Buffer;
  encoding: 'hex' | 'base64';
  now: Date;
  toleranceMs: number;
}

/**
 * Verifies `signature == HMAC-SHA256(secret, "<timestamp>.<signedContent>")`
 * with `timestamp` in epoch milliseconds inside the tolerance window.
 */
export function verifyTimestampedSignature(input: TimestampedSignatureInput): SignatureCheck {
  const { timestamp, signature } = input;
  if (!timestamp || !signature) return { ok: false, reason: 'missing_signature' };
  if (!/^\d+$/.test(timestamp)) return { ok: false, reason: 'malformed_signature' };

  const timestampMs = Number(timestamp);
  if (!isFresh(timestampMs, input.now, input.toleranceMs)) return { ok: false, reason: 'stale_timestamp' };

  const expected = hmacSha256(input.secret, `${timestamp}.${input.signedContent}`, input.encoding);
  if (!digestsEqual(expected, signature)) return { ok: false, reason: 'signature_mismatch' };

  return { ok: true, timestampMs };
}
