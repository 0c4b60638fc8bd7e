import type { Context } from 'hono';
import type { TelegramCallbackQuery } from '../types/telegram.types.ts';
import { t } from '../i18n/index.ts';
import { parseActionData } from '../keyboards/receipt.keyboard.ts';
import { errorMessage } from '../utils/errors.ts';
import { getUserName } from './webhook.handler.ts';

export async function callbackHandler(
  c: Context,
  callbackQuery: TelegramCallbackQuery
): Promise<Response> {
  const telegram = c.get('telegram');
  const workflow = c.get('workflow');

  const userId = callbackQuery.from.id;
  const chatId = callbackQuery.message?.chat.id ?? userId;
  const messageId = callbackQuery.message?.message_id;

  await telegram.answerCallbackQuery(callbackQuery.id);

  // Parse callback data: "approve:<token>" / "reject:<token>"
  const parsed = parseActionData(callbackQuery.data);
  const action = parsed?.action ?? 'unknown';
  console.log(`[CallbackHandler] Action: ${action}, user: ${userId}`);

  const result = await workflow.resolve(userId, action, parsed?.token ?? '', {
    userName: getUserName(callbackQuery.from),
  });

  // A failed save keeps the buttons so Approve can be pressed again
  const keepButtons = !result.ok && result.error.kind !== 'stale_action';
  if (messageId !== undefined && !keepButtons) {
    try {
      await telegram.editMessageReplyMarkup(chatId, messageId);
    } catch (error) {
      console.warn(`[CallbackHandler] Could not clear buttons of message ${messageId}: ${errorMessage(error)}`);
    }
  }

  if (!result.ok) {
    await telegram.sendError(chatId, result.error.userMessage);
    return c.json({ ok: true });
  }

  const text = result.value.action === 'approved'
    ? t('ui.resolve.saved', { id: result.value.receiptId })
    : t('ui.resolve.rejected');
  await telegram.sendText(chatId, text);

  return c.json({ ok: true });
}
