/**
 * Registers the bot command list and, when a URL is given, the webhook.
 * Run once after deployment: npm run setup-bot -- https://example.org
 */

import { getEnv, initConfig } from '../config/index.ts';
import { TelegramService } from '../services/telegram.service.ts';
import type { BotCommand } from '../types/telegram.types.ts';

const BOT_COMMANDS: BotCommand[] = [
  { command: 'help', description: 'Show help' },
  { command: 'add', description: 'Add a receipt from text' },
  { command: 'list', description: 'Show recent receipts' },
  { command: 'delete', description: 'Delete a receipt by ID' },
  { command: 'summary', description: 'Monthly net expenses' },
  { command: 'date', description: 'Receipts of one day (DD.MM or DD.MM.YYYY)' },
  { command: 'cancel', description: 'Discard the pending receipt' },
];

async function setupBot(): Promise<void> {
  initConfig();
  const telegram = new TelegramService();
  const baseUrl = process.argv[2];

  console.log('Setting up Telegram bot...');

  await telegram.setMyCommands(BOT_COMMANDS);
  console.log('Bot commands set:', BOT_COMMANDS.map(c => `/${c.command}`).join(', '));

  if (baseUrl) {
    const webhookUrl = `${baseUrl.replace(/\/+$/, '')}/webhook/telegram`;
    await telegram.setWebhook(webhookUrl, getEnv().TELEGRAM_WEBHOOK_SECRET);
    const info = await telegram.getWebhookInfo();
    console.log(`Webhook set to ${info.url} (pending updates: ${info.pending_update_count})`);
  } else {
    console.log('No base URL given, webhook left unchanged');
  }

  console.log('\nSetup complete!');
}

setupBot().catch((error: unknown) => {
  console.error('[SetupBot] Failed:', error);
  process.exitCode = 1;
});
