import admin from 'firebase-admin';
import { z } from 'zod';
import { logger } from '../utils/logger';

const ServiceAccountJsonSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

function parseServiceAccount(raw: string, source: string): admin.ServiceAccount | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn({ err, source }, '[FIREBASE] Service account is not valid JSON');
    return null;
  }
  const parsed = ServiceAccountJsonSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ source, issues: parsed.error.issues.map((issue) => issue.path.join('.')) }, '[FIREBASE] Service account is missing fields');
    return null;
  }
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key,
  };
}

function getServiceAccountFromEnv(): admin.ServiceAccount | null {
  const json = process.env.FIREBASE_SERVICE_ACCOUNT_JSON;
  if (json) return parseServiceAccount(json, 'FIREBASE_SERVICE_ACCOUNT_JSON');
  const b64 = process.env.FIREBASE_SERVICE_ACCOUNT_B64;
  if (b64) return parseServiceAccount(Buffer.from(b64, 'base64').toString('utf8'), 'FIREBASE_SERVICE_ACCOUNT_B64');
  return null;
}

if (!admin.apps.length) {
  const svc = getServiceAccountFromEnv();
  if (svc) {
    admin.initializeApp({ credential: admin.credential.cert(svc) });
  } else {
    // GOOGLE_APPLICATION_CREDENTIALS or the metadata server
    admin.initializeApp();
  }
}

export const adminDb = admin.firestore();
adminDb.settings({ ignoreUndefinedProperties: true });
export { admin };
