// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  configureLogger,
  getLoggerConfig,
  getLogger,
  resetLogger,
} from './logger.js';
