import { serve } from '@hono/node-server';
import { Cron } from 'croner';
import { createApp } from './app.ts';
import { initConfig, getDatabaseUrl } from './config/env.ts';
import { initI18n } from './i18n/index.ts';
import { DatabaseService } from './services/database.service.ts';
import { errorMessage } from './utils/errors.ts';

// Load environment (exits on invalid configuration)
const { env } = initConfig();
initI18n();

// Ensure database exists before starting
await DatabaseService.ensureDatabaseExists(getDatabaseUrl());

const database = new DatabaseService();
await database.runMigrations();

const { app, rateLimiter } = createApp({ database });

// Scheduled jobs
const idempotencyCleanup = new Cron('*/5 * * * *', async () => {
  try {
    const deleted = await database.cleanupIdempotency();
    if (deleted > 0) {
      console.log(`[Scheduler] Cleaned up ${deleted} idempotency records`);
    }
  } catch (error) {
    console.error(`[Scheduler] Idempotency cleanup failed: ${errorMessage(error)}`);
  }
});

const rateLimitCleanup = new Cron('*/5 * * * *', () => {
  const removed = rateLimiter.cleanup();
  if (removed > 0) {
    console.log(`[Scheduler] Dropped rate limit state for ${removed} users`);
  }
});

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  console.log(`[Server] Receipt bot listening on port ${info.port}`);
  console.log('[Server] Endpoints: POST /webhook/telegram, GET /health');
});

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log('[Server] Shutting down...');
  idempotencyCleanup.stop();
  rateLimitCleanup.stop();
  server.close();
  await database.close();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
