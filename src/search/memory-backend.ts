// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY SEARCH BACKEND — In-Process Implementation of SearchBackend
// ═══════════════════════════════════════════════════════════════════════════════
//
// A MemoryIndexStore plays the part of a search cluster: it owns the indices
// and may be shared. Each MemorySearchBackend is one connection handle onto a
// store; closing a handle leaves the store and other handles untouched.
//
// Every index is a single shard, so "per shard" sampling is per index.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type {
  BackendConnector,
  BulkItemResult,
  GroupedSearchRequest,
  GroupedSearchResponse,
  HitGroup,
  IndexSettings,
  SearchBackend,
  SearchDocument,
  SearchHit,
} from './types.js';
import {
  FieldIndexer,
  SearchRanker,
  type IndexedDocument,
  type TermStatistics,
} from './engine.js';
import {
  BackendUnavailableError,
  IndexAlreadyExistsError,
  IndexNotFoundError,
  UnsupportedHostError,
} from './errors.js';

const logger = getLogger({ component: 'search-backend' });

export const MEMORY_HOST_SCHEME = 'memory://';

// ─────────────────────────────────────────────────────────────────────────────────
// INDEX
// ─────────────────────────────────────────────────────────────────────────────────

export class MemoryIndex implements TermStatistics {
  readonly name: string;
  readonly settings: IndexSettings;
  private readonly indexer: FieldIndexer;
  private readonly documents = new Map<string, IndexedDocument>();

  // field -> term -> number of documents containing it
  private readonly frequencies = new Map<string, Map<string, number>>();

  constructor(name: string, settings: IndexSettings) {
    this.name = name;
    this.settings = settings;
    this.indexer = new FieldIndexer(settings);
  }

  get documentCount(): number {
    return this.documents.size;
  }

  documentFrequency(field: string, term: string): number {
    return this.frequencies.get(field)?.get(term) ?? 0;
  }

  /**
   * Insert or replace a document. Returns true when the id was new.
   */
  upsert(document: SearchDocument): boolean {
    const indexed = this.indexer.indexDocument(document);
    const previous = this.documents.get(document.id);

    if (previous) {
      this.adjustFrequencies(previous, -1);
    }
    this.documents.set(document.id, indexed);
    this.adjustFrequencies(indexed, 1);

    return previous === undefined;
  }

  get(id: string): SearchDocument | null {
    return this.documents.get(id)?.source ?? null;
  }

  search(request: GroupedSearchRequest, ranker: SearchRanker): Omit<GroupedSearchResponse, 'tookMs'> {
    const query = this.indexer.compile(request.query);
    const hits: SearchHit[] = [];

    for (const document of this.documents.values()) {
      const score = ranker.score(query, document, this);
      if (score > 0) {
        hits.push({ id: document.id, score, source: document.source });
      }
    }

    // Array.prototype.sort is stable: equal scores keep insertion order
    hits.sort((a, b) => b.score - a.score);
    const sample = hits.slice(0, request.grouping.sampleSize);

    return {
      totalHits: hits.length,
      groups: this.group(sample, request.grouping.field, request.grouping.maxGroups, request.grouping.topHits),
    };
  }

  /**
   * Terms-style bucketing: most hits first, ties by key ascending.
   */
  private group(sample: SearchHit[], field: string, maxGroups: number, topHits: number): HitGroup[] {
    const buckets = new Map<string, SearchHit[]>();

    for (const hit of sample) {
      const key = hit.source[field];
      if (typeof key !== 'string') continue;

      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(hit);
      } else {
        buckets.set(key, [hit]);
      }
    }

    return [...buckets.entries()]
      .sort(([keyA, a], [keyB, b]) => b.length - a.length || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0))
      .slice(0, maxGroups)
      .map(([key, bucketHits]) => ({
        key,
        maxScore: bucketHits[0]?.score ?? 0,
        hitCount: bucketHits.length,
        topHits: bucketHits.slice(0, topHits),
      }));
  }

  private adjustFrequencies(document: IndexedDocument, delta: 1 | -1): void {
    for (const [field, analyzed] of document.fields) {
      let terms = this.frequencies.get(field);
      if (!terms) {
        terms = new Map();
        this.frequencies.set(field, terms);
      }
      for (const term of analyzed.terms.keys()) {
        const next = (terms.get(term) ?? 0) + delta;
        if (next > 0) {
          terms.set(term, next);
        } else {
          terms.delete(term);
        }
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class MemoryIndexStore {
  private readonly indices = new Map<string, MemoryIndex>();

  has(name: string): boolean {
    return this.indices.has(name);
  }

  get(name: string): MemoryIndex | undefined {
    return this.indices.get(name);
  }

  create(name: string, settings: IndexSettings): MemoryIndex {
    if (this.indices.has(name)) {
      throw new IndexAlreadyExistsError(name);
    }
    const index = new MemoryIndex(name, settings);
    this.indices.set(name, index);
    return index;
  }

  delete(name: string): boolean {
    return this.indices.delete(name);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// BACKEND HANDLE
// ─────────────────────────────────────────────────────────────────────────────────

export class MemorySearchBackend implements SearchBackend {
  private readonly store: MemoryIndexStore;
  private readonly host: string;
  private readonly ranker = new SearchRanker();
  private closed = false;

  constructor(store: MemoryIndexStore = new MemoryIndexStore(), host: string = `${MEMORY_HOST_SCHEME}local`) {
    this.store = store;
    this.host = host;
  }

  async indexExists(index: string): Promise<boolean> {
    this.assertOpen();
    return this.store.has(index);
  }

  async createIndex(index: string, settings: IndexSettings): Promise<void> {
    this.assertOpen();
    this.store.create(index, settings);
    logger.debug('Created index', { index, host: this.host });
  }

  async deleteIndex(index: string): Promise<boolean> {
    this.assertOpen();
    const deleted = this.store.delete(index);
    if (deleted) {
      logger.debug('Deleted index', { index, host: this.host });
    }
    return deleted;
  }

  async bulkUpsert(index: string, documents: readonly SearchDocument[]): Promise<BulkItemResult[]> {
    this.assertOpen();
    const target = this.requireIndex(index);

    return documents.map((document): BulkItemResult => {
      if (typeof document.id !== 'string' || document.id.length === 0) {
        return { id: String(document.id), ok: false, error: 'Document id must be a non-empty string' };
      }
      try {
        const created = target.upsert(document);
        return { id: document.id, ok: true, created };
      } catch (error) {
        return {
          id: document.id,
          ok: false,
          error: error instanceof Error ? error.message : String(error),
        };
      }
    });
  }

  async search(index: string, request: GroupedSearchRequest): Promise<GroupedSearchResponse> {
    this.assertOpen();
    const started = Date.now();
    const result = this.requireIndex(index).search(request, this.ranker);
    return { ...result, tookMs: Date.now() - started };
  }

  async getById(index: string, id: string): Promise<SearchDocument | null> {
    this.assertOpen();
    return this.requireIndex(index).get(id);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BackendUnavailableError(this.host, `Connection to '${this.host}' is closed`);
    }
  }

  private requireIndex(index: string): MemoryIndex {
    const found = this.store.get(index);
    if (!found) {
      throw new IndexNotFoundError(index);
    }
    return found;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONNECTOR
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Connector for `memory://<name>` hosts. Handles created for the same host
 * share one store.
 */
export function createMemoryConnector(stores: Map<string, MemoryIndexStore> = new Map()): BackendConnector {
  return async options => {
    if (!options.host.startsWith(MEMORY_HOST_SCHEME)) {
      throw new UnsupportedHostError(options.host);
    }

    let store = stores.get(options.host);
    if (!store) {
      store = new MemoryIndexStore();
      stores.set(options.host, store);
    }

    logger.debug('Opened search backend handle', { host: options.host });
    return new MemorySearchBackend(store, options.host);
  };
}
