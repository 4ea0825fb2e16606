// ═══════════════════════════════════════════════════════════════════════════════
// CANONICAL RESOLVER — Entity Canonicalization & Resolution Engine
// ═══════════════════════════════════════════════════════════════════════════════

export * from './resolver/index.js';
export * from './resources/index.js';
export * from './search/index.js';

export {
  SYSTEM_ENTITY_PREFIX,
  isSystemEntity,
  stripAliases,
  type Entity,
  type CanonicalItem,
  type ResolvedItem,
} from './types/entities.js';

export {
  loadConfig,
  reloadConfig,
  readEnvironment,
  validateConfig,
  getDefaultConfig,
  ConfigValidationError,
  type ResolverConfig,
  type ResolverConfigInput,
} from './config/index.js';

export {
  RetryExhaustedError,
  createShutdownSignal,
  type ShutdownSignal,
} from './infrastructure/index.js';

export {
  configureLogger,
  getLogger,
  type LogLevel,
  type ILogger,
} from './observability/logging/index.js';
