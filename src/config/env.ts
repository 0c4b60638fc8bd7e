import { envSchema, featureFlagsSchema, type Env, type FeatureFlags, type AppConfig } from './types.ts';

let cachedConfig: AppConfig | null = null;

/**
 * Initialize configuration at startup.
 * MUST be called before any other config access.
 * Exits the process on validation failure (fail-fast).
 */
export function initConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const envResult = envSchema.safeParse(source);
  if (!envResult.success) {
    console.error('=== CONFIGURATION ERROR ===');
    console.error('Required environment variables are missing or invalid:');

    const fieldErrors = envResult.error.flatten().fieldErrors;
    for (const [key, errors] of Object.entries(fieldErrors)) {
      if (errors && errors.length > 0) {
        console.error(`  - ${key}: ${errors.join(', ')}`);
      }
    }

    console.error('===========================');
    process.exit(1);
  }

  const featuresResult = featureFlagsSchema.safeParse(source);
  if (!featuresResult.success) {
    console.error('=== FEATURE FLAGS ERROR ===');
    console.error(featuresResult.error.flatten().fieldErrors);
    console.error('===========================');
    process.exit(1);
  }

  cachedConfig = {
    env: envResult.data,
    features: featuresResult.data,
  };

  // Log loaded configuration (without secrets)
  console.log('[Config] Loaded successfully');
  console.log(`[Config] Environment: ${cachedConfig.env.NODE_ENV}`);
  console.log(`[Config] Features enabled: ${Object.entries(cachedConfig.features)
    .filter(([, v]) => v === true)
    .map(([k]) => k.replace('FEATURE_', ''))
    .join(', ') || 'none'}`);

  return cachedConfig;
}

/**
 * Drop the cached configuration so the next initConfig() re-reads the environment.
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    throw new Error('Config not initialized. Call initConfig() at app startup.');
  }
  return cachedConfig;
}

export function getEnv(): Env {
  return getConfig().env;
}

export function getFeatures(): FeatureFlags {
  return getConfig().features;
}

export function isFeatureEnabled(feature: keyof FeatureFlags): boolean {
  return getFeatures()[feature] === true;
}

export function getDatabaseUrl(): string {
  const env = getEnv();
  if (env.DATABASE_URL) return env.DATABASE_URL;
  return `postgres://${env.POSTGRES_USER}:${env.POSTGRES_PASSWORD}@${env.POSTGRES_HOST}:${env.POSTGRES_PORT}/${env.POSTGRES_DATABASE}`;
}
