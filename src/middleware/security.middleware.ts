import type { Context, Next } from 'hono';
import { getEnv } from '../config/env.ts';

/**
 * Guards in front of POST /webhook/telegram.
 */

// Rejects bodies whose declared Content-Length exceeds `maxBytes` (Telegram updates are a few KB)
export function validateInputSize(maxBytes: number = 1024 * 1024) {
  return async (c: Context, next: Next) => {
    const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);

    if (Number.isFinite(declared) && declared > maxBytes) {
      console.warn(`[Security] Update of ${declared} bytes refused (limit ${maxBytes})`);
      return c.json({ error: 'Update too large', maxBytes }, 413);
    }

    await next();
  };
}

export function securityHeaders() {
  return async (c: Context, next: Next) => {
    await next();

    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  };
}

/**
 * Logs refused requests (bad secret, oversized update) with the caller's address.
 */
export function auditLog() {
  return async (c: Context, next: Next) => {
    await next();

    const status = c.res.status;
    if (status === 401 || status === 413) {
      console.warn(`[Audit] ${c.req.method} ${c.req.path} refused with ${status} from ${callerAddress(c)}`);
    }
  };
}

// Behind a proxy the first X-Forwarded-For hop is Telegram's server
function callerAddress(c: Context): string {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return forwarded || c.req.header('x-real-ip') || 'unknown';
}

/**
 * Whitelist check. An empty ALLOWED_USER_IDS lets everyone in.
 */
export function isUserAllowed(userId: number, allowedUserIds: number[] = getEnv().ALLOWED_USER_IDS): boolean {
  return allowedUserIds.length === 0 || allowedUserIds.includes(userId);
}

/**
 * Compares X-Telegram-Bot-Api-Secret-Token with the secret given to setWebhook.
 * Without TELEGRAM_WEBHOOK_SECRET every update is accepted.
 */
export function verifyTelegramWebhook() {
  return async (c: Context, next: Next) => {
    const { TELEGRAM_WEBHOOK_SECRET: secret, NODE_ENV } = getEnv();

    if (!secret) {
      if (NODE_ENV === 'production') {
        console.warn('[Security] TELEGRAM_WEBHOOK_SECRET is not set; accepting unsigned updates');
      }
      await next();
      return;
    }

    if (c.req.header('X-Telegram-Bot-Api-Secret-Token') !== secret) {
      console.warn(`[Security] Update with a wrong secret token from ${callerAddress(c)}`);
      return c.json({ error: 'Unauthorized' }, 401);
    }

    await next();
  };
}
