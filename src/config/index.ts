// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for the Resolution Engine
// ═══════════════════════════════════════════════════════════════════════════════

import {
  validateConfig,
  type Environment,
  type ResolverConfig,
  type ResolverConfigInput,
} from './schema.js';

export {
  ResolverConfigSchema,
  ConfigValidationError,
  validateConfig,
  formatConfigErrors,
  getDefaultConfig,
  type Environment,
  type ResolverConfig,
  type ResolverConfigInput,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function envEnvironment(): Environment | undefined {
  switch (process.env.NODE_ENV) {
    case 'development':
    case 'staging':
    case 'production':
    case 'test':
      return process.env.NODE_ENV;
    default:
      return undefined;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read raw configuration from process.env. Unset variables are left
 * undefined so schema defaults apply.
 */
export function readEnvironment(): ResolverConfigInput {
  return {
    environment: envEnvironment(),
    backend: {
      host: envString('RESOLVER_BACKEND_HOST'),
      username: envString('RESOLVER_BACKEND_USERNAME'),
      password: envString('RESOLVER_BACKEND_PASSWORD'),
      requestTimeoutMs: envNumber('RESOLVER_BACKEND_TIMEOUT_MS'),
    },
    ingest: {
      batchSize: envNumber('RESOLVER_BATCH_SIZE'),
      maxInFlightBatches: envNumber('RESOLVER_MAX_IN_FLIGHT_BATCHES'),
    },
    fuzzy: {
      topK: envNumber('RESOLVER_TOP_K'),
      sampleSize: envNumber('RESOLVER_SAMPLE_SIZE'),
      maxGroups: envNumber('RESOLVER_MAX_GROUPS'),
    },
    connect: {
      maxAttempts: envNumber('RESOLVER_CONNECT_ATTEMPTS'),
      initialDelayMs: envNumber('RESOLVER_CONNECT_DELAY_MS'),
      maxDelayMs: envNumber('RESOLVER_CONNECT_MAX_DELAY_MS'),
    },
  };
}

let cachedConfig: ResolverConfig | null = null;

export function loadConfig(): ResolverConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = validateConfig(readEnvironment());
  return cachedConfig;
}

export function reloadConfig(): ResolverConfig {
  cachedConfig = null;
  return loadConfig();
}

export function isProduction(): boolean {
  return loadConfig().environment === 'production';
}
