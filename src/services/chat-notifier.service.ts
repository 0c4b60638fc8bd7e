import { t } from '../i18n/index.ts';
import type { WorkflowNotifier } from './capture-workflow.service.ts';
import type { TelegramApi } from './telegram.service.ts';

/**
 * Sends the workflow's side-channel messages to Telegram.
 */
export class ChatNotifier implements WorkflowNotifier {
  private telegram: Pick<TelegramApi, 'sendText' | 'editMessageReplyMarkup'>;

  constructor(telegram: Pick<TelegramApi, 'sendText' | 'editMessageReplyMarkup'>) {
    this.telegram = telegram;
  }

  async transcriptReady(
    chatId: number,
    purpose: 'receipt' | 'comment',
    transcript: string,
    elapsedMs: number
  ): Promise<void> {
    const key = purpose === 'receipt' ? 'ui.transcript.receipt' : 'ui.transcript.comment';
    await this.telegram.sendText(chatId, t(key, { text: transcript, seconds: (elapsedMs / 1000).toFixed(1) }));
  }

  async previewSuperseded(chatId: number, messageId: number): Promise<void> {
    await this.telegram.editMessageReplyMarkup(chatId, messageId);
  }
}
