import type { Context } from 'hono';
import type { TelegramUpdate, TelegramMessage, TelegramUser } from '../types/telegram.types.ts';
import { Features } from '../config/index.ts';
import { t } from '../i18n/index.ts';
import { isUserAllowed } from '../middleware/security.middleware.ts';
import { errorMessage } from '../utils/errors.ts';
import { redactSecrets } from '../utils/redact.ts';
import { captureHandler, reviseHandler } from './receipt.handler.ts';
import { callbackHandler } from './callback.handler.ts';
import { commandHandler, isCommand } from './command.handler.ts';

export function getUserName(user: TelegramUser): string {
  return user.username || [user.first_name, user.last_name].filter(Boolean).join(' ') || String(user.id);
}

export async function webhookHandler(c: Context): Promise<Response> {
  const telegram = c.get('telegram');
  const database = c.get('database');

  let update: TelegramUpdate;
  try {
    update = await c.req.json<TelegramUpdate>();
  } catch (error) {
    console.warn(`[Webhook] Invalid update body: ${errorMessage(error)}`);
    return c.json({ ok: false, error: 'Invalid JSON' }, 400);
  }

  try {
    // Handle callback queries (inline button clicks)
    if (update.callback_query) {
      if (!isUserAllowed(update.callback_query.from.id)) {
        await telegram.answerCallbackQuery(update.callback_query.id, t('ui.errors.accessDenied'));
        return c.json({ ok: true });
      }
      return await callbackHandler(c, update.callback_query);
    }

    const message = update.message;
    if (!message?.from) {
      return c.json({ ok: true });
    }

    const chatId = message.chat.id;
    const userId = message.from.id;

    if (!isUserAllowed(userId)) {
      console.warn(`[Webhook] Rejected user ${userId}`);
      await telegram.sendError(chatId, t('ui.errors.accessDenied'));
      return c.json({ ok: true });
    }

    // Idempotency check
    const isNew = await database.checkIdempotency(String(message.message_id), String(chatId));
    if (!isNew) {
      console.log(`[Webhook] Duplicate message ${message.message_id}, skipping`);
      return c.json({ ok: true });
    }

    const decision = c.get('rateLimiter').check(userId);
    if (!decision.allowed) {
      await telegram.sendError(chatId, t('ui.errors.rateLimited', { seconds: decision.retryAfterSeconds }));
      return c.json({ ok: true });
    }

    // Route by message type
    return await routeMessage(c, message);
  } catch (error) {
    console.error(`[Webhook] Error: ${redactSecrets(errorMessage(error))}`);

    const chatId = update.message?.chat.id ?? update.callback_query?.message?.chat.id;
    if (chatId !== undefined) {
      try {
        await telegram.sendError(chatId, t('ui.errors.generic'));
      } catch (sendError) {
        console.error(`[Webhook] Could not report error to chat ${chatId}: ${errorMessage(sendError)}`);
      }
    }

    return c.json({ ok: false, error: 'Internal error' }, 500);
  }
}

export async function routeMessage(c: Context, message: TelegramMessage): Promise<Response> {
  const telegram = c.get('telegram');
  const workflow = c.get('workflow');
  const chatId = message.chat.id;
  const hasPending = workflow.getPending(message.from.id) !== undefined;

  // Photo: Telegram lists sizes ascending, take the largest
  const photo = message.photo?.at(-1);
  if (photo) {
    return captureHandler(c, message, {
      kind: 'image',
      fileId: photo.file_id,
      caption: message.caption,
    });
  }

  // Image sent as a file
  if (message.document) {
    const mimeType = message.document.mime_type || '';
    if (mimeType.startsWith('image/') && Features.imageDocuments()) {
      return captureHandler(c, message, {
        kind: 'image',
        fileId: message.document.file_id,
        caption: message.caption,
        declaredMimeType: mimeType,
      });
    }

    await telegram.sendError(chatId, t('ui.errors.invalidFileType'));
    return c.json({ ok: true });
  }

  // Voice note: a correction while a receipt is pending, otherwise a new receipt
  const voice = message.voice ?? message.audio;
  if (voice) {
    if (!Features.voiceMessages()) {
      await telegram.sendError(chatId, t('ui.errors.voiceDisabled'));
      return c.json({ ok: true });
    }
    const input = { kind: 'voice' as const, fileId: voice.file_id, declaredMimeType: voice.mime_type };
    return hasPending ? reviseHandler(c, message, input) : captureHandler(c, message, input);
  }

  if (message.text) {
    const text = message.text.trim();

    if (isCommand(text)) {
      return commandHandler(c, message);
    }

    return hasPending
      ? reviseHandler(c, message, { kind: 'text', text })
      : captureHandler(c, message, { kind: 'text', text });
  }

  // Unknown message type
  await telegram.sendError(chatId, t('ui.errors.unsupported'));
  return c.json({ ok: true });
}
