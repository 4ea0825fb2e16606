// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVER MODULE — Entity Canonicalization and Resolution
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  Normalizer,
  SynonymTable,
  ItemTable,
  SynonymTables,
  SynonymDocument,
  PushSummary,
  ResolvedCandidate,
  ExactResolution,
  RankedResolution,
  UnresolvedMention,
  SystemEntityValue,
  ResolutionResult,
  ValueProbability,
} from './types.js';

export {
  DuplicateIdentifierError,
  FitAbortedError,
} from './errors.js';

export { defaultNormalizer } from './normalizer.js';
export { KeyedMutex } from './mutex.js';

export {
  buildSynonymTables,
  pushSynonymDocuments,
  toSynonymDocument,
  documentIdFor,
  type PushOptions,
} from './synonym-index.js';

export {
  LifecycleManager,
  SYNONYM_INDEX_CONFIG,
  SYNONYM_INDEX_PREFIX,
  synonymIndexName,
  type LifecycleManagerOptions,
} from './lifecycle.js';

export {
  resolveExact,
  resolveFuzzy,
  buildFuzzyQuery,
  KEYWORD_BOOST,
  FULL_TEXT_BOOST,
  NGRAM_BOOST,
  DEFAULT_FUZZY_OPTIONS,
  type FuzzyOptions,
} from './resolution.js';

export {
  EntityResolver,
  type EntityResolverOptions,
  type FitOptions,
  type FitSummary,
  type PredictOptions,
} from './resolver.js';
