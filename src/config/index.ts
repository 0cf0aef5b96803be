// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Providers and Environment Helpers
// ═══════════════════════════════════════════════════════════════════════════════

export { type Env, envNumber, envFloat, envList } from './env.js';

export {
  type ConfigMapping,
  type ConfigProvider,
  RETRY_CONFIG_SCOPE,
  DEFAULTS_NAME,
  InMemoryConfigProvider,
  EnvConfigProvider,
  loadRetryDefaultsFromEnv,
} from './provider.js';
