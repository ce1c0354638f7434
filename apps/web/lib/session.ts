import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';

const COOKIE_NAME = 'careernav_plan';
const MAX_AGE_SEC = 60 * 60 * 24 * 7; // 7 days

const payloadSchema = z.object({ planId: z.string().min(1), iat: z.number() });

function getSecret(): string {
  const secret = process.env.SESSION_SECRET;
  if (!secret || secret.length < 16) {
    throw new Error(
      'SESSION_SECRET must be set and at least 16 characters (e.g. in .env.local). Generate with: openssl rand -base64 24',
    );
  }
  return secret;
}

/** Create a signed session token pointing at the student's latest plan. */
export function createSessionToken(planId: string): string {
  const secret = getSecret();
  const payload = JSON.stringify({ planId, iat: Date.now() });
  const payloadB64 = Buffer.from(payload, 'utf8').toString('base64url');
  const sig = createHmac('sha256', secret).update(payloadB64).digest('hex');
  return `${payloadB64}.${sig}`;
}

/** Verify token and return planId or null if invalid. */
export function verifySessionToken(token: string): string | null {
  try {
    const secret = getSecret();
    const [payloadB64, sig] = token.split('.');
    if (!payloadB64 || !sig) return null;
    const expected = createHmac('sha256', secret).update(payloadB64).digest('hex');
    if (
      sig.length !== expected.length ||
      !timingSafeEqual(Buffer.from(sig, 'hex'), Buffer.from(expected, 'hex'))
    ) {
      return null;
    }
    const parsed = payloadSchema.safeParse(
      JSON.parse(Buffer.from(payloadB64, 'base64url').toString('utf8')),
    );
    return parsed.success ? parsed.data.planId : null;
  } catch {
    return null;
  }
}

export const SESSION_COOKIE_NAME = COOKIE_NAME;
export const SESSION_MAX_AGE_SEC = MAX_AGE_SEC;
