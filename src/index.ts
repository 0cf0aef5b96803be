// ═══════════════════════════════════════════════════════════════════════════════
// RETRYABLE — Package Entry
// ═══════════════════════════════════════════════════════════════════════════════

export * from './infrastructure/retry/index.js';

export {
  type ConfigMapping,
  type ConfigProvider,
  RETRY_CONFIG_SCOPE,
  DEFAULTS_NAME,
  InMemoryConfigProvider,
  EnvConfigProvider,
  loadRetryDefaultsFromEnv,
} from './config/index.js';

export {
  type LogLevel,
  type LogSink,
  type LoggerConfig,
  type ILogger,
  configureLogger,
  getLogger,
  resetLogger,
} from './observability/logging/index.js';

export {
  type Ok,
  type Err,
  type Result,
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
} from './types/result.js';
