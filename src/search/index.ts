// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH MODULE — Ranked-Search Backend Contract and In-Process Backend
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  AnalyzerName,
  ShingleOptions,
  EdgeNGramOptions,
  AnalysisSettings,
  FieldMapping,
  IndexSettings,
  SearchDocument,
  BulkItemResult,
  MatchClause,
  BoolClause,
  QueryClause,
  GroupingOptions,
  GroupedSearchRequest,
  SearchHit,
  HitGroup,
  GroupedSearchResponse,
  SearchBackend,
  BackendConnectionOptions,
  BackendConnector,
} from './types.js';

// Errors
export {
  BackendUnavailableError,
  UnsupportedHostError,
  IndexNotFoundError,
  IndexAlreadyExistsError,
} from './errors.js';

// Analysis
export {
  CHAR_FILTERS,
  DEFAULT_ANALYSIS_SETTINGS,
  Analyzer,
  applyCharFilters,
  foldToAscii,
} from './analysis.js';

// Engine
export {
  FieldIndexer,
  SearchRanker,
  type AnalyzedField,
  type IndexedDocument,
  type CompiledQuery,
  type TermStatistics,
} from './engine.js';

// In-process backend
export {
  MEMORY_HOST_SCHEME,
  MemoryIndex,
  MemoryIndexStore,
  MemorySearchBackend,
  createMemoryConnector,
} from './memory-backend.js';
