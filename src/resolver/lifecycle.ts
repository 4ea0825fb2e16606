// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE MANAGER — Synonym Index Creation and Backend Connection
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { DEFAULT_ANALYSIS_SETTINGS } from '../search/analysis.js';
import { BackendUnavailableError, IndexAlreadyExistsError, UnsupportedHostError } from '../search/errors.js';
import type {
  AnalysisSettings,
  BackendConnectionOptions,
  BackendConnector,
  FieldMapping,
  IndexSettings,
  SearchBackend,
} from '../search/types.js';
import {
  RetryExhaustedError,
  createRetryPolicy,
  formatDelay,
  type RetryConfig,
  type RetryPolicy,
} from '../infrastructure/retry/index.js';

const logger = getLogger({ component: 'lifecycle' });

// ─────────────────────────────────────────────────────────────────────────────────
// INDEX CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

const ALIAS_FIELD: FieldMapping = Object.freeze({
  analyzer: 'default',
  fields: Object.freeze({
    normalized_keyword: 'keyword_match',
    char_ngram: 'char_ngram',
  }),
});

const ANALYSIS: AnalysisSettings = Object.freeze({
  shingle: Object.freeze({ ...DEFAULT_ANALYSIS_SETTINGS.shingle }),
  edgeNGram: Object.freeze({ ...DEFAULT_ANALYSIS_SETTINGS.edgeNGram }),
});

/**
 * Settings every synonym index is created with. `cname` and `whitelist` are
 * analysed for full-text matching, with `.normalized_keyword` and
 * `.char_ngram` sub-fields for whole-value and prefix matching.
 */
export const SYNONYM_INDEX_CONFIG: IndexSettings = Object.freeze({
  analysis: ANALYSIS,
  mappings: Object.freeze({
    cname: ALIAS_FIELD,
    whitelist: ALIAS_FIELD,
  }),
});

export const SYNONYM_INDEX_PREFIX = 'synonym_';

export function synonymIndexName(entityType: string): string {
  return `${SYNONYM_INDEX_PREFIX}${entityType}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LIFECYCLE MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

export interface LifecycleManagerOptions {
  readonly connector: BackendConnector;
  readonly connection: BackendConnectionOptions;

  /** Backoff for connection attempts */
  readonly retry?: Partial<RetryConfig>;

  /** Replaces the backoff sleep (tests) */
  readonly wait?: (ms: number) => Promise<void>;
}

/**
 * Owns one lazily opened backend handle and the synonym indices behind it.
 */
export class LifecycleManager {
  private readonly connector: BackendConnector;
  private readonly connection: BackendConnectionOptions;
  private readonly retry: RetryPolicy;
  private backend: SearchBackend | null = null;
  private connecting: Promise<SearchBackend> | null = null;

  constructor(options: LifecycleManagerOptions) {
    this.connector = options.connector;
    this.connection = options.connection;
    this.retry = createRetryPolicy(
      {
        ...options.retry,
        isRetryable: error => !(error instanceof UnsupportedHostError),
        onRetry: event => {
          logger.warn('Search backend connection failed, retrying', {
            host: this.host,
            attempt: event.attempt,
            maxAttempts: event.maxAttempts,
            error: event.error.message,
            delay: formatDelay(event.delayMs),
          });
        },
      },
      options.wait
    );
  }

  get host(): string {
    return this.connection.host;
  }

  /**
   * The cached handle, connecting on first use. Concurrent first callers
   * share one connection attempt.
   */
  async getBackend(): Promise<SearchBackend> {
    if (this.backend) {
      return this.backend;
    }
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Create the index for an entity type unless it exists. Returns its name.
   */
  async ensureIndex(entityType: string): Promise<string> {
    const index = synonymIndexName(entityType);
    const backend = await this.getBackend();

    if (await backend.indexExists(index)) {
      return index;
    }

    try {
      await backend.createIndex(index, SYNONYM_INDEX_CONFIG);
      logger.info('Created synonym index', { index });
    } catch (error) {
      if (!(error instanceof IndexAlreadyExistsError)) {
        throw error;
      }
      logger.debug('Synonym index created concurrently', { index });
    }
    return index;
  }

  /**
   * Prepare the index for a fit. A clean rebuild drops and recreates it; an
   * incremental one keeps existing documents, including those of records
   * since removed from the mapping.
   */
  async rebuild(entityType: string, clean: boolean): Promise<string> {
    if (!clean) {
      return this.ensureIndex(entityType);
    }

    const index = synonymIndexName(entityType);
    const backend = await this.getBackend();
    if (await backend.deleteIndex(index)) {
      logger.info('Deleted synonym index for clean rebuild', { index });
    }
    return this.ensureIndex(entityType);
  }

  /**
   * Close and forget the cached handle; the next call reconnects.
   */
  async reset(): Promise<void> {
    const backend = this.backend;
    this.backend = null;
    if (backend) {
      await backend.close();
      logger.debug('Closed search backend handle', { host: this.host });
    }
  }

  private async connect(): Promise<SearchBackend> {
    try {
      const backend = await this.retry.execute(attempt => {
        logger.debug('Connecting to search backend', { host: this.host, attempt });
        return this.connector(this.connection);
      });
      this.backend = backend;
      logger.info('Connected to search backend', { host: this.host });
      return backend;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        const last = error.allErrors[error.allErrors.length - 1];
        const message = error.reason === 'non_retryable'
          ? `Could not connect to search backend '${this.host}': ${last?.message ?? error.message}`
          : `Could not connect to search backend '${this.host}' after ${error.attempts} attempt(s)`;
        throw new BackendUnavailableError(this.host, message, { cause: error });
      }
      throw error;
    }
  }
}
