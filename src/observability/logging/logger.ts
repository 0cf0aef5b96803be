// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with JSON or Pretty Output
// ═══════════════════════════════════════════════════════════════════════════════
//
// Structured logging with:
// - JSON output for production, pretty-print for development
// - Component-based child loggers
// - LOG_LEVEL environment override
//
// Usage:
//   import { getLogger } from './logging/index.js';
//
//   const logger = getLogger({ component: 'retry' });
//   logger.debug('Retrying', { attempt: 1 });
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Destination for formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Service name for logs */
  serviceName?: string;

  /** Enable timestamp */
  timestamp?: boolean;

  /** Custom base context added to all logs */
  base?: Record<string, unknown>;

  /** Where lines go; defaults to the console */
  sink?: LogSink;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function initialConfig(): LoggerConfig {
  return {
    level: 'info',
    pretty: process.env.NODE_ENV !== 'production',
    serviceName: 'retryable',
    timestamp: true,
    sink: consoleSink,
  };
}

let globalConfig: LoggerConfig = initialConfig();

/**
 * Configure the global logger settings.
 *
 * Loggers read the configuration when they write, so loggers created before
 * this call pick up the change.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment or config.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Format error for logging.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

/**
 * Format log entry for output.
 */
function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  return {
    level,
    levelNum: LOG_LEVELS[level],
    ...(globalConfig.timestamp ? { time: new Date().toISOString() } : {}),
    msg: message,
    ...globalConfig.base,
    service: globalConfig.serviceName,
    ...(component ? { component } : {}),
    ...context,
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Pretty print a log entry (for development).
 */
function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const { time, msg, component, level: _level, levelNum: _levelNum, service: _service, ...rest } = entry;

  const timeStr = typeof time === 'string' ? time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = typeof component === 'string' ? `[${component}] ` : '';
  const levelStr = level.toUpperCase().padEnd(5);

  let contextStr = '';
  if (Object.keys(rest).length > 0) {
    contextStr = ` ${DIM}${JSON.stringify(rest)}${RESET}`;
  }

  return `${DIM}${timeStr}${RESET} ${COLORS[level]}${levelStr}${RESET} ${componentStr}${String(msg)}${contextStr}`;
}

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const line = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);
  (globalConfig.sink ?? consoleSink)(level, line);
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS[level] >= LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (!enabled(level)) {
      return;
    }
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context }, component));
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (!enabled(level)) {
      return;
    }
    const errorContext = error !== undefined ? formatError(error) : {};
    writeLog(
      level,
      formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component)
    );
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger =>
      createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      }),

    isLevelEnabled: enabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and its configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = initialConfig();
}
