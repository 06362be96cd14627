/**
 * Normalizes a Kenyan mobile number to the 2547xxxxxxxx / 2541xxxxxxxx form
 * the push-payment rail expects. Returns null for anything else.
 */
export function normalizeKenyanMsisdn(phone: string | undefined | null): string | null {
  if (!phone) return null;
  const cleaned = phone.trim().replace(/[\s-]/g, '');

  if (/^\+254[17]\d{8}$/.test(cleaned)) return cleaned.slice(1);
  if (/^254[17]\d{8}$/.test(cleaned)) return cleaned;
  if (/^0[17]\d{8}$/.test(cleaned)) return `254${cleaned.slice(1)}`;

  return null;
}
