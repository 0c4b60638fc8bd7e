// Main config exports
export {
  initConfig,
  resetConfig,
  getEnv,
  getConfig,
  isFeatureEnabled,
  getDatabaseUrl,
} from './env.ts';

export { Features } from './features.ts';

export type { Env, FeatureFlags, AppConfig } from './types.ts';
