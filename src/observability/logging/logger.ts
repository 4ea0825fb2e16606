// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Leveled Logging with Component Context
// ═══════════════════════════════════════════════════════════════════════════════
//
// JSON lines in production, single-line coloured output everywhere else.
//
// Usage:
//   import { getLogger } from '../observability/logging/index.js';
//
//   const logger = getLogger({ component: 'synonym-index' });
//   logger.info('Loaded documents', { count: 12 });
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
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;

  /** Custom base context added to all logs */
  base?: Record<string, unknown>;
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

  isLevelEnabled(level: LogLevel): boolean;

  time(message: string, startTime: number, context?: Record<string, unknown>): void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  serviceName: 'canonical-resolver',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

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

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  return {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    ...globalConfig.base,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component && { component }),
    ...context,
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',  // Gray
  debug: '\x1b[36m',  // Cyan
  info: '\x1b[32m',   // Green
  warn: '\x1b[33m',   // Yellow
  error: '\x1b[31m',  // Red
  fatal: '\x1b[35m',  // Magenta
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const time = typeof entry.time === 'string' ? entry.time : undefined;
  const component = typeof entry.component === 'string' ? entry.component : undefined;

  const levelStr = level.toUpperCase().padEnd(5);
  const timeStr = time ? time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = component ? `[${component}]` : '';

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      contextFields[key] = value;
    }
  }

  let contextStr = '';
  if (Object.keys(contextFields).length > 0) {
    contextStr = ` ${DIM}${JSON.stringify(contextFields)}${RESET}`;
  }

  return `${DIM}${timeStr}${RESET} ${COLORS[level]}${levelStr}${RESET} ${componentStr} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const output = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);

  if (level === 'error' || level === 'fatal') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const levelNum = LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (LOG_LEVELS[level] < levelNum) {
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
    if (LOG_LEVELS[level] < levelNum) {
      return;
    }
    const errorContext = error ? formatError(error) : {};
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled: (level: LogLevel): boolean => {
      return LOG_LEVELS[level] >= levelNum;
    },

    time: (message: string, startTime: number, context?: Record<string, unknown>): void => {
      log('info', message, { ...context, durationMs: Date.now() - startTime });
    },
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
 * Reset the root logger (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
}
