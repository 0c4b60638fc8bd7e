import { Hono } from 'hono';
import { logger } from 'hono/logger';

import { webhookHandler } from './handlers/webhook.handler.ts';
import { getEnv, type Env } from './config/index.ts';
import {
  securityHeaders,
  auditLog,
  validateInputSize,
  verifyTelegramWebhook,
} from './middleware/security.middleware.ts';
import { UserRateLimiter } from './utils/rate-limiter.ts';

// Services
import { TelegramService, type TelegramApi } from './services/telegram.service.ts';
import { DatabaseService, type ReceiptDatabase } from './services/database.service.ts';
import { ReceiptExtractorService } from './services/receipt-extractor.service.ts';
import { WhisperService } from './services/whisper.service.ts';
import { FileService, type FileSource } from './services/file.service.ts';
import { InMemoryPendingReceiptStore, type PendingReceiptStore } from './services/pending-receipt.store.ts';
import { CaptureWorkflowService } from './services/capture-workflow.service.ts';
import { ChatNotifier } from './services/chat-notifier.service.ts';
import type { ReceiptExtractor, Transcriber } from './types/ai.types.ts';

// Types for context
declare module 'hono' {
  interface ContextVariableMap {
    telegram: TelegramApi;
    database: ReceiptDatabase;
    workflow: CaptureWorkflowService;
    rateLimiter: UserRateLimiter;
    env: Env;
  }
}

export interface AppDependencies {
  database: ReceiptDatabase;
  telegram: TelegramApi;
  extractor: ReceiptExtractor;
  transcriber: Transcriber;
  files: FileSource;
  store: PendingReceiptStore;
  rateLimiter: UserRateLimiter;
}

export function createApp(deps?: Partial<AppDependencies>) {
  const app = new Hono();
  const env = getEnv();

  // Initialize services (or use provided dependencies)
  const database = deps?.database || new DatabaseService();
  const telegram = deps?.telegram || new TelegramService();
  const extractor = deps?.extractor || new ReceiptExtractorService();
  const transcriber = deps?.transcriber || new WhisperService();
  const files = deps?.files || new FileService(telegram);
  const store = deps?.store || new InMemoryPendingReceiptStore();
  const rateLimiter = deps?.rateLimiter || new UserRateLimiter({
    maxRequests: env.RATE_LIMIT_REQUESTS,
    windowMs: env.RATE_LIMIT_WINDOW_MS,
  });

  const workflow = new CaptureWorkflowService({
    store,
    extractor,
    transcriber,
    files,
    repository: database,
    notifier: new ChatNotifier(telegram),
  });

  // Inject services into context
  app.use('*', async (c, next) => {
    c.set('database', database);
    c.set('telegram', telegram);
    c.set('workflow', workflow);
    c.set('rateLimiter', rateLimiter);
    c.set('env', env);
    await next();
  });

  // Security middleware (applied first)
  app.use('*', securityHeaders());
  app.use('*', auditLog());

  if (env.NODE_ENV !== 'test') {
    app.use('*', logger());
  }

  // Telegram updates are small JSON documents; files are fetched separately
  app.use('/webhook/*', validateInputSize(1024 * 1024));

  // Health check
  app.get('/health', async (c) => {
    const dbOk = await c.get('database').ping();

    return c.json({
      status: dbOk ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: dbOk ? 'ok' : 'error',
        pending_receipts: store.size(),
      },
    }, dbOk ? 200 : 503);
  });

  // Telegram webhook (with signature verification)
  app.post('/webhook/telegram', verifyTelegramWebhook(), webhookHandler);

  return { app, database, telegram, workflow, store, rateLimiter };
}
