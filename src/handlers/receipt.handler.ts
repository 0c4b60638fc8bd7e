import type { Context } from 'hono';
import type { TelegramMessage } from '../types/telegram.types.ts';
import type { CaptureInput, CommentInput, InputKind, OperationType, Preview, Result } from '../types/workflow.types.ts';
import { t } from '../i18n/index.ts';
import { formatPreview } from '../formatters/preview.formatter.ts';
import { receiptActionsKeyboard } from '../keyboards/receipt.keyboard.ts';

const PROGRESS_KEYS: Record<OperationType, string> = {
  receipt: 'ui.progress.receipt',
  voice: 'ui.progress.voice',
  text: 'ui.progress.text',
  changes: 'ui.progress.changes',
  voice_changes: 'ui.progress.voice_changes',
  approval: 'ui.progress.receipt',
};

const CAPTURE_OPERATIONS: Record<InputKind, OperationType> = {
  image: 'receipt',
  voice: 'voice',
  text: 'text',
};

export async function captureHandler(c: Context, message: TelegramMessage, input: CaptureInput): Promise<Response> {
  const telegram = c.get('telegram');
  const workflow = c.get('workflow');
  const chatId = message.chat.id;
  const userId = message.from.id;

  console.log(`[ReceiptHandler] ${input.kind} capture from ${userId}`);
  await telegram.sendText(chatId, t(PROGRESS_KEYS[CAPTURE_OPERATIONS[input.kind]]));

  const result = await workflow.beginCapture(userId, input, { chatId });
  return deliver(c, message, result, input.kind);
}

export async function reviseHandler(c: Context, message: TelegramMessage, comment: CommentInput): Promise<Response> {
  const telegram = c.get('telegram');
  const workflow = c.get('workflow');
  const chatId = message.chat.id;
  const userId = message.from.id;

  console.log(`[ReceiptHandler] ${comment.kind} revision from ${userId}`);
  await telegram.sendText(chatId, t(PROGRESS_KEYS[comment.kind === 'voice' ? 'voice_changes' : 'changes']));

  const result = await workflow.revise(userId, comment, { chatId });
  return deliver(c, message, result, comment.kind);
}

/**
 * Send the preview with Approve / Reject, or the error the workflow reported.
 */
async function deliver(c: Context, message: TelegramMessage, result: Result<Preview>, kind: InputKind): Promise<Response> {
  const telegram = c.get('telegram');
  const workflow = c.get('workflow');
  const chatId = message.chat.id;

  if (!result.ok) {
    await telegram.sendError(chatId, result.error.userMessage);
    return c.json({ ok: true });
  }

  const preview = result.value;
  const sent = await telegram.sendText(chatId, formatPreview(preview, kind), receiptActionsKeyboard(preview.token));
  workflow.attachPreviewMessage(message.from.id, preview.token, sent.message_id);

  return c.json({ ok: true });
}
