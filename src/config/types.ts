import { z } from 'zod';

// ============================================================
// Environment Schema
// ============================================================
// Supported languages
export const SUPPORTED_LANGUAGES = ['en'] as const;
export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const commaList = z.string().default('').transform(s => s.split(',').map(v => v.trim()).filter(Boolean));

export const envSchema = z.object({
  PORT: z.string().default('3000').transform(Number),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Language
  LANGUAGE: z.enum(SUPPORTED_LANGUAGES).default('en'),

  // Database
  DATABASE_URL: z.string().optional(),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.string().default('5432').transform(Number),
  POSTGRES_DATABASE: z.string().default('receipts'),
  POSTGRES_USER: z.string().default('test'),
  POSTGRES_PASSWORD: z.string().default('test'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string(),
  TELEGRAM_BOT_TOKEN_DEV: z.string().optional(),
  // Telegram webhook secret (set via setWebhook secret_token parameter)
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),

  // Access control: empty list lets everyone in
  ALLOWED_USER_IDS: commaList.transform(ids => ids.map(Number).filter(id => Number.isInteger(id) && id > 0)),

  // AI APIs
  OPENROUTER_API_KEY: z.string(),
  GROQ_API_KEY: z.string().optional(),

  // AI Models
  AI_PRIMARY_MODEL: z.string().default('openai/gpt-4.1-mini'),
  AI_FALLBACK_MODEL: z.string().default('google/gemini-2.5-flash'),
  AI_VISION_MODEL: z.string().default('openai/gpt-4.1-mini'),
  AI_TIMEOUT_MS: z.string().default('60000').transform(Number),

  // Uploads
  MAX_FILE_SIZE: z.string().default('10485760').transform(Number),

  // Per-user rate limiting
  RATE_LIMIT_REQUESTS: z.string().default('10').transform(Number),
  RATE_LIMIT_WINDOW_MS: z.string().default('60000').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

// ============================================================
// Feature Flags Schema
// ============================================================
export const featureFlagsSchema = z.object({
  // Voice notes as receipts and as corrections
  FEATURE_VOICE_MESSAGES: z.string().default('true').transform(s => s === 'true'),

  // Receipts sent as image documents (uncompressed photos)
  FEATURE_IMAGE_DOCUMENTS: z.string().default('true').transform(s => s === 'true'),

  // /list, /delete and /summary commands
  FEATURE_RECEIPT_VIEWS: z.string().default('true').transform(s => s === 'true'),
});

export type FeatureFlags = z.infer<typeof featureFlagsSchema>;

// ============================================================
// Combined App Config
// ============================================================
export interface AppConfig {
  env: Env;
  features: FeatureFlags;
}
