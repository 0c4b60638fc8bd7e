import { getEnv } from '../config/env.ts';
import type {
  TelegramMessage,
  TelegramFile,
  SendMessageOptions,
  InlineKeyboardMarkup,
  BotCommand,
} from '../types/telegram.types.ts';
import { ServiceError } from '../utils/errors.ts';
import { redactSecrets } from '../utils/redact.ts';

interface TelegramConfig {
  botToken: string;
  baseUrl?: string;
}

export class TelegramService {
  private botToken: string;
  private baseUrl: string;

  constructor(config?: Partial<TelegramConfig>) {
    const env = getEnv();
    // Use dev token in development mode if available
    const defaultToken = env.NODE_ENV === 'development' && env.TELEGRAM_BOT_TOKEN_DEV
      ? env.TELEGRAM_BOT_TOKEN_DEV
      : env.TELEGRAM_BOT_TOKEN;
    this.botToken = config?.botToken || defaultToken;
    this.baseUrl = config?.baseUrl || 'https://api.telegram.org';
  }

  async sendMessage(options: SendMessageOptions): Promise<TelegramMessage> {
    return this.callApi<TelegramMessage>('sendMessage', options);
  }

  async sendText(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<TelegramMessage> {
    return this.sendMessage({
      chat_id: chatId,
      text: text.slice(0, 4096),
      reply_markup: replyMarkup,
    });
  }

  async sendError(chatId: number, message: string): Promise<TelegramMessage> {
    return this.sendText(chatId, message);
  }

  /**
   * Remove the inline keyboard from a message (pass no markup).
   */
  async editMessageReplyMarkup(
    chatId: number,
    messageId: number,
    replyMarkup?: InlineKeyboardMarkup
  ): Promise<TelegramMessage | boolean> {
    return this.callApi<TelegramMessage | boolean>('editMessageReplyMarkup', {
      chat_id: chatId,
      message_id: messageId,
      reply_markup: replyMarkup ?? { inline_keyboard: [] },
    });
  }

  async answerCallbackQuery(
    callbackQueryId: string,
    text?: string
  ): Promise<boolean> {
    return this.callApi<boolean>('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      text,
    });
  }

  async getFile(fileId: string): Promise<TelegramFile> {
    return this.callApi<TelegramFile>('getFile', {
      file_id: fileId,
    });
  }

  async downloadFile(filePath: string, signal?: AbortSignal): Promise<ArrayBuffer> {
    // Telegram file paths are alphanumeric with slashes, dots, underscores and hyphens
    if (!filePath || filePath.includes('..') || filePath.includes('//') || !/^[a-zA-Z0-9/_.-]+$/.test(filePath)) {
      throw new ServiceError('telegram', 'Invalid file path', { retryable: false });
    }

    const url = `${this.baseUrl}/file/bot${this.botToken}/${filePath}`;
    const response = await fetch(url, { signal });

    if (!response.ok) {
      throw new ServiceError('telegram', `Failed to download file: ${response.status}`, { status: response.status });
    }

    return response.arrayBuffer();
  }

  async setWebhook(url: string, secretToken?: string): Promise<boolean> {
    return this.callApi<boolean>('setWebhook', {
      url,
      secret_token: secretToken,
      allowed_updates: ['message', 'callback_query'],
    });
  }

  async getWebhookInfo(): Promise<{ url: string; pending_update_count: number }> {
    return this.callApi<{ url: string; pending_update_count: number }>('getWebhookInfo', {});
  }

  async setMyCommands(commands: BotCommand[]): Promise<boolean> {
    return this.callApi<boolean>('setMyCommands', { commands });
  }

  private async callApi<T>(method: string, body: object): Promise<T> {
    const url = `${this.baseUrl}/bot${this.botToken}/${method}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (error) {
      // fetch errors can echo the URL, which carries the token
      throw new ServiceError('telegram', redactSecrets(`${method} failed: ${String(error)}`), { cause: error });
    }

    const data = await response.json() as { ok: boolean; result: T; description?: string };

    if (!data.ok) {
      throw new ServiceError('telegram', `Telegram API error (${method}): ${data.description ?? 'unknown'}`, {
        status: response.status,
      });
    }

    return data.result;
  }
}

/**
 * The part of TelegramService the bot handlers use.
 */
export type TelegramApi = Pick<
  TelegramService,
  'sendText' | 'sendError' | 'editMessageReplyMarkup' | 'answerCallbackQuery' | 'getFile' | 'downloadFile'
>;
