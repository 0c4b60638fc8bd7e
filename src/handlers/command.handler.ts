import type { Context } from 'hono';
import type { TelegramMessage } from '../types/telegram.types.ts';
import { Features } from '../config/index.ts';
import { t } from '../i18n/index.ts';
import { formatMonthlySummary, formatReceiptList, formatReceiptsForDate } from '../formatters/receipts.formatter.ts';
import { classifyError } from '../utils/error-classifier.ts';
import { captureHandler } from './receipt.handler.ts';

export const LIST_DEFAULT = 10;
export const LIST_MAX = 50;
export const SUMMARY_DEFAULT = 3;
export const SUMMARY_MAX = 24;

// Help message text - built from i18n keys
function getHelpText(): string {
  const lines = [
    `ℹ️ ${t('ui.commands.help.title')}`,
    '',
    `📝 ${t('ui.commands.help.howToAdd')}`,
    `• 📷 ${t('ui.commands.help.addPhoto')}`,
  ];
  if (Features.voiceMessages()) {
    lines.push(`• 🎤 ${t('ui.commands.help.addVoice')}`);
  }
  lines.push(
    `• ${t('ui.commands.help.addText')}`,
    '',
    `✏️ ${t('ui.commands.help.reviewTitle')}`,
    `• ${t('ui.commands.help.reviewText')}`,
    `• ${t('ui.commands.help.cancel')}`,
  );
  if (Features.receiptViews()) {
    lines.push(
      '',
      `📊 ${t('ui.commands.help.viewsTitle')}`,
      `• ${t('ui.commands.help.list')}`,
      `• ${t('ui.commands.help.delete')}`,
      `• ${t('ui.commands.help.summary')}`,
      `• ${t('ui.commands.help.date')}`,
    );
  }
  return lines.join('\n');
}

// Check if text is a command
export function isCommand(text: string): boolean {
  return text.startsWith('/');
}

// Parse command from text; "/list@my_bot 5" -> { command: 'list', args: '5' }
export function parseCommand(text: string): { command: string; args: string } | null {
  if (!isCommand(text)) return null;

  const parts = text.slice(1).split(/\s+/);
  const command = parts[0]?.split('@')[0]?.toLowerCase() || '';
  const args = parts.slice(1).join(' ');

  if (!command) return null;

  return { command, args };
}

/**
 * Positive integer argument clamped to `max`; `fallback` when absent or invalid.
 */
export function parseCount(args: string, fallback: number, max: number): number {
  const value = Number.parseInt(args.trim(), 10);
  if (!Number.isFinite(value) || value <= 0) return fallback;
  return Math.min(value, max);
}

/**
 * "25.11" (current year) or "5.5.2023" -> "25-11-2024" / "05-05-2023".
 * null unless the day exists in the calendar.
 */
export function parseDateQuery(args: string, now: Date = new Date()): string | null {
  const match = /^(\d{1,2})\.(\d{1,2})(?:\.(\d{4}))?$/.exec(args.trim());
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = match[3] !== undefined ? Number(match[3]) : now.getFullYear();

  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }

  return `${String(day).padStart(2, '0')}-${String(month).padStart(2, '0')}-${year}`;
}

export async function commandHandler(c: Context, message: TelegramMessage): Promise<Response> {
  const telegram = c.get('telegram');
  const chatId = message.chat.id;
  const cmd = parseCommand(message.text?.trim() ?? '');

  switch (cmd?.command) {
    case 'add': {
      if (!cmd.args.trim()) {
        await telegram.sendError(chatId, t('ui.errors.addUsage'));
        return c.json({ ok: true });
      }
      return captureHandler(c, message, { kind: 'text', text: cmd.args });
    }
    case 'cancel':
      return cancelCommand(c, message);
    case 'list':
    case 'delete':
    case 'summary':
    case 'date':
      if (Features.receiptViews()) {
        return viewCommand(c, message, cmd.command, cmd.args);
      }
      return helpCommand(c, message);
    default:
      // /start, /help and unknown commands
      return helpCommand(c, message);
  }
}

export async function helpCommand(c: Context, message: TelegramMessage): Promise<Response> {
  await c.get('telegram').sendText(message.chat.id, getHelpText());
  return c.json({ ok: true });
}

async function cancelCommand(c: Context, message: TelegramMessage): Promise<Response> {
  const telegram = c.get('telegram');
  const workflow = c.get('workflow');
  const chatId = message.chat.id;

  const pending = workflow.getPending(message.from.id);
  const discarded = workflow.discard(message.from.id);

  if (pending !== undefined && pending.messageId !== null) {
    try {
      await telegram.editMessageReplyMarkup(chatId, pending.messageId);
    } catch (error) {
      console.warn(`[CancelCommand] Could not clear buttons: ${String(error)}`);
    }
  }

  await telegram.sendText(chatId, discarded ? t('ui.resolve.discarded') : t('ui.resolve.nothingToDiscard'));
  return c.json({ ok: true });
}

async function viewCommand(
  c: Context,
  message: TelegramMessage,
  command: 'list' | 'delete' | 'summary' | 'date',
  args: string
): Promise<Response> {
  const telegram = c.get('telegram');
  const database = c.get('database');
  const chatId = message.chat.id;
  const userId = message.from.id;

  try {
    if (command === 'list') {
      const limit = parseCount(args, LIST_DEFAULT, LIST_MAX);
      const receipts = await database.getRecentReceipts(userId, limit);
      await telegram.sendText(chatId, formatReceiptList(receipts, limit));
    } else if (command === 'summary') {
      const months = parseCount(args, SUMMARY_DEFAULT, SUMMARY_MAX);
      const summary = await database.getMonthlySummary(userId, months);
      await telegram.sendText(chatId, formatMonthlySummary(summary, months));
    } else if (command === 'date') {
      const date = parseDateQuery(args);
      if (date === null) {
        await telegram.sendError(chatId, t('ui.views.dateUsage'));
        return c.json({ ok: true });
      }
      const receipts = await database.getReceiptsByDate(userId, date);
      await telegram.sendText(chatId, formatReceiptsForDate(receipts, date));
    } else {
      const receiptId = /^\d+$/.test(args.trim()) ? Number(args.trim()) : null;
      if (receiptId === null) {
        await telegram.sendError(chatId, t('ui.views.deleteUsage'));
        return c.json({ ok: true });
      }
      const deleted = await database.deleteReceipt(receiptId, userId);
      await telegram.sendText(chatId, deleted
        ? t('ui.views.deleted', { id: receiptId })
        : t('ui.views.deleteNotFound', { id: receiptId }));
    }
  } catch (error) {
    const classified = classifyError(error, 'approval');
    console.error(`[ViewCommand] /${command} failed: ${classified.technicalDetail}`);
    await telegram.sendError(chatId, t('ui.errors.generic'));
  }

  return c.json({ ok: true });
}
