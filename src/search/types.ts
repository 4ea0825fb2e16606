// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH TYPES — Ranked-Search Backend Contract
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ANALYSIS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Built-in analyzers.
 *
 * - `default`: whitespace tokens, lowercase, ASCII folding, 2..4 word shingles
 *   plus unigrams
 * - `keyword_match`: the whole value as one lowercased, folded token
 * - `char_ngram`: whitespace tokens, lowercase, folding, edge n-grams
 */
export type AnalyzerName = 'default' | 'keyword_match' | 'char_ngram';

export interface ShingleOptions {
  readonly minShingleSize: number;
  readonly maxShingleSize: number;
  readonly outputUnigrams: boolean;
}

export interface EdgeNGramOptions {
  readonly minGram: number;
  readonly maxGram: number;
}

export interface AnalysisSettings {
  readonly shingle: ShingleOptions;
  readonly edgeNGram: EdgeNGramOptions;
}

export interface FieldMapping {
  readonly analyzer: AnalyzerName;

  /** Sub-fields addressed as `<field>.<name>`, each with its own analyzer */
  readonly fields?: Readonly<Record<string, AnalyzerName>>;
}

export interface IndexSettings {
  readonly analysis: AnalysisSettings;
  readonly mappings: Readonly<Record<string, FieldMapping>>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface SearchDocument {
  readonly id: string;
  readonly [field: string]: unknown;
}

export type BulkItemResult =
  | { readonly id: string; readonly ok: true; readonly created: boolean }
  | { readonly id: string; readonly ok: false; readonly error: string };

// ─────────────────────────────────────────────────────────────────────────────────
// QUERIES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Full-text match: the query is analysed with the field's analyzer and any
 * shared token scores.
 */
export interface MatchClause {
  readonly match: {
    readonly field: string;
    readonly query: string;
    readonly boost?: number;
  };
}

/**
 * Disjunction: a document matches when any clause matches; matching clause
 * scores are summed.
 */
export interface BoolClause {
  readonly bool: {
    readonly should: readonly QueryClause[];
    readonly boost?: number;
  };
}

export type QueryClause = MatchClause | BoolClause;

export interface GroupingOptions {
  /** Keyword field whose value is the group key */
  readonly field: string;

  /** Top-scoring hits per shard that are grouped; the rest are ignored */
  readonly sampleSize: number;

  /** Max number of groups returned */
  readonly maxGroups: number;

  /** Hits kept per group */
  readonly topHits: number;
}

export interface GroupedSearchRequest {
  readonly query: QueryClause;
  readonly grouping: GroupingOptions;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSES
// ─────────────────────────────────────────────────────────────────────────────────

export interface SearchHit<D extends SearchDocument = SearchDocument> {
  readonly id: string;
  readonly score: number;
  readonly source: D;
}

export interface HitGroup<D extends SearchDocument = SearchDocument> {
  readonly key: string;
  readonly maxScore: number;
  readonly hitCount: number;
  readonly topHits: readonly SearchHit<D>[];
}

export interface GroupedSearchResponse<D extends SearchDocument = SearchDocument> {
  /** Documents matching the query before sampling */
  readonly totalHits: number;
  readonly groups: readonly HitGroup<D>[];
  readonly tookMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// BACKEND
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Ranked-search backend used by the resolution engine.
 *
 * Implementations throw BackendUnavailableError when the backend cannot be
 * reached and IndexNotFoundError when an operation targets a missing index.
 */
export interface SearchBackend {
  indexExists(index: string): Promise<boolean>;
  createIndex(index: string, settings: IndexSettings): Promise<void>;

  /** Returns false when there was nothing to delete */
  deleteIndex(index: string): Promise<boolean>;

  /** Insert or replace documents by id; one result per input document, in order */
  bulkUpsert(index: string, documents: readonly SearchDocument[]): Promise<BulkItemResult[]>;

  search(index: string, request: GroupedSearchRequest): Promise<GroupedSearchResponse>;
  getById(index: string, id: string): Promise<SearchDocument | null>;

  /** Release this handle; later calls fail with BackendUnavailableError */
  close(): Promise<void>;
}

export interface BackendConnectionOptions {
  readonly host: string;
  readonly username?: string;
  readonly password?: string;
  readonly requestTimeoutMs: number;
}

export type BackendConnector = (options: BackendConnectionOptions) => Promise<SearchBackend>;
