// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY RESOLVER — Per-Entity-Type Resolution Facade
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   const resolver = new EntityResolver({
//     entityType: 'city',
//     mappingSource: new FileMappingSource(appPath),
//   });
//   await resolver.load();
//   await resolver.predict({ text: 'SEA', type: 'city' }, { exactMatchOnly: true });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { loadConfig, type ResolverConfig } from '../config/index.js';
import { isSystemEntity, stripAliases, type Entity, type ResolvedItem } from '../types/entities.js';
import { createMemoryConnector } from '../search/memory-backend.js';
import type { BackendConnector } from '../search/types.js';
import type { MappingSource } from '../resources/mapping-source.js';
import { LifecycleManager, synonymIndexName } from './lifecycle.js';
import { KeyedMutex } from './mutex.js';
import { defaultNormalizer } from './normalizer.js';
import { buildSynonymTables, pushSynonymDocuments } from './synonym-index.js';
import { resolveExact, resolveFuzzy } from './resolution.js';
import { FitAbortedError } from './errors.js';
import type {
  Normalizer,
  PushSummary,
  RankedResolution,
  ResolutionResult,
  SynonymTables,
  ValueProbability,
} from './types.js';

const logger = getLogger({ component: 'entity-resolver' });

// Fits of one entity type never overlap within the process
const FIT_LOCKS = new KeyedMutex();

// Handles for the same memory:// host share one store
const defaultConnector = createMemoryConnector();

const EMPTY_TABLES: SynonymTables = { items: new Map(), synonyms: new Map() };

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface EntityResolverOptions {
  readonly entityType: string;
  readonly mappingSource: MappingSource;

  /** Defaults to loadConfig() */
  readonly config?: ResolverConfig;

  /** Defaults to the in-process memory:// connector */
  readonly connector?: BackendConnector;

  readonly normalize?: Normalizer;

  /** Replaces the connection backoff sleep (tests) */
  readonly wait?: (ms: number) => Promise<void>;
}

export interface FitOptions {
  /** Drop and recreate the index first */
  readonly clean?: boolean;

  /** Checked between ingestion batches */
  readonly signal?: AbortSignal;
}

export interface PredictOptions {
  readonly exactMatchOnly?: boolean;
}

export interface FitSummary extends PushSummary {
  readonly entityType: string;
  readonly index: string;
  readonly canonicalNames: number;
  readonly synonyms: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENTITY RESOLVER
// ─────────────────────────────────────────────────────────────────────────────────

export class EntityResolver {
  readonly entityType: string;
  private readonly mappingSource: MappingSource;
  private readonly config: ResolverConfig;
  private readonly normalize: Normalizer;
  private readonly lifecycle: LifecycleManager;

  // Replaced wholesale by fit; readers see either the old or the new tables
  private tables: SynonymTables = EMPTY_TABLES;

  constructor(options: EntityResolverOptions) {
    this.entityType = options.entityType;
    this.mappingSource = options.mappingSource;
    this.config = options.config ?? loadConfig();
    this.normalize = options.normalize ?? defaultNormalizer;
    this.lifecycle = new LifecycleManager({
      connector: options.connector ?? defaultConnector,
      connection: this.config.backend,
      retry: {
        maxAttempts: this.config.connect.maxAttempts,
        initialDelayMs: this.config.connect.initialDelayMs,
        maxDelayMs: this.config.connect.maxDelayMs,
      },
      wait: options.wait,
    });
  }

  get indexName(): string {
    return synonymIndexName(this.entityType);
  }

  /**
   * The currently published tables.
   */
  getTables(): SynonymTables {
    return this.tables;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Fitting
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Load the mapping, rebuild the index and publish new tables. Concurrent
   * fits of the same entity type run one after the other. No-op for system
   * entity types.
   */
  async fit(options: FitOptions = {}): Promise<FitSummary | null> {
    if (isSystemEntity(this.entityType)) {
      logger.debug('Skipping fit for system entity type', { entityType: this.entityType });
      return null;
    }

    const { clean = false, signal } = options;

    return FIT_LOCKS.runExclusive(this.entityType, async () => {
      const started = Date.now();
      logger.info('Fitting entity resolver', { entityType: this.entityType, clean });

      const records = await this.mappingSource.getEntityMap(this.entityType);
      const tables = buildSynonymTables(this.entityType, records, this.normalize);

      const notStarted: PushSummary = { indexed: 0, failed: 0, batches: 0, aborted: true };
      if (signal?.aborted) {
        throw new FitAbortedError(this.entityType, notStarted, { cause: signal.reason });
      }

      const index = await this.lifecycle.rebuild(this.entityType, clean);
      const backend = await this.lifecycle.getBackend();
      const summary = await pushSynonymDocuments(backend, index, records, {
        batchSize: this.config.ingest.batchSize,
        maxInFlightBatches: this.config.ingest.maxInFlightBatches,
        signal,
      });

      if (summary.aborted) {
        logger.warn('Fit aborted, keeping previous tables', { entityType: this.entityType, ...summary });
        throw new FitAbortedError(this.entityType, summary, { cause: signal?.reason });
      }

      this.tables = tables;
      logger.time('Fitted entity resolver', started, {
        entityType: this.entityType,
        indexed: summary.indexed,
        failed: summary.failed,
      });

      return {
        ...summary,
        entityType: this.entityType,
        index,
        canonicalNames: tables.items.size,
        synonyms: tables.synonyms.size,
      };
    });
  }

  /**
   * Incremental fit over the existing index.
   */
  async load(): Promise<FitSummary | null> {
    return this.fit({ clean: false });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Resolution
  // ─────────────────────────────────────────────────────────────────────────────

  async predict(entity: Entity, options: PredictOptions = {}): Promise<ResolutionResult> {
    if (isSystemEntity(entity.type)) {
      return { kind: 'system', value: entity.value };
    }
    if (options.exactMatchOnly) {
      return this.resolveExact(entity);
    }
    return this.resolveFuzzy(entity.text);
  }

  resolveExact(entity: Entity): ResolutionResult {
    return resolveExact(entity, this.tables, this.normalize);
  }

  async resolveFuzzy(text: string, topK: number = this.config.fuzzy.topK): Promise<RankedResolution> {
    const backend = await this.lifecycle.getBackend();
    return resolveFuzzy(text, backend, this.indexName, this.normalize, {
      topK,
      sampleSize: this.config.fuzzy.sampleSize,
      maxGroups: this.config.fuzzy.maxGroups,
    });
  }

  /**
   * Records published under a cname, without their alias lists. Follows up
   * a ranked candidate.
   */
  lookup(cname: string): ResolvedItem[] {
    return (this.tables.items.get(cname) ?? []).map(stripAliases);
  }

  /**
   * Reserved for a statistical resolver. Not implemented: always returns an
   * empty list.
   */
  predictProba(entity: Entity): ValueProbability[] {
    logger.debug('predictProba is not implemented', { entityType: entity.type });
    return [];
  }

  /**
   * Reserved. Not implemented.
   */
  evaluate(): undefined {
    return undefined;
  }

  /**
   * Reserved. Not implemented.
   */
  dump(): undefined {
    return undefined;
  }

  /**
   * Close the backend handle. A later call reconnects.
   */
  async close(): Promise<void> {
    await this.lifecycle.reset();
  }
}
