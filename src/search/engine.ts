// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH ENGINE — Field Indexing, Query Compilation, Ranking
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  AnalyzerName,
  IndexSettings,
  QueryClause,
  SearchDocument,
} from './types.js';
import { Analyzer } from './analysis.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface AnalyzedField {
  /** term -> frequency */
  readonly terms: ReadonlyMap<string, number>;
  readonly length: number;
}

export interface IndexedDocument {
  readonly id: string;
  readonly source: SearchDocument;
  readonly fields: ReadonlyMap<string, AnalyzedField>;
}

interface FieldRoute {
  readonly sourceField: string;
  readonly analyzer: Analyzer;
}

export type CompiledQuery =
  | { readonly kind: 'match'; readonly field: string; readonly terms: readonly string[]; readonly boost: number }
  | { readonly kind: 'bool'; readonly should: readonly CompiledQuery[]; readonly boost: number };

/**
 * Corpus statistics the ranker needs for inverse document frequency.
 */
export interface TermStatistics {
  readonly documentCount: number;
  documentFrequency(field: string, term: string): number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FIELD INDEXER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Resolves field paths (`cname`, `cname.char_ngram`, ...) to analyzers and
 * analyses documents and queries against them.
 */
export class FieldIndexer {
  private readonly routes = new Map<string, FieldRoute>();

  constructor(settings: IndexSettings) {
    const analyzers = new Map<AnalyzerName, Analyzer>();
    const analyzerFor = (name: AnalyzerName): Analyzer => {
      let analyzer = analyzers.get(name);
      if (!analyzer) {
        analyzer = new Analyzer(name, settings.analysis);
        analyzers.set(name, analyzer);
      }
      return analyzer;
    };

    for (const [field, mapping] of Object.entries(settings.mappings)) {
      this.routes.set(field, { sourceField: field, analyzer: analyzerFor(mapping.analyzer) });
      for (const [subfield, analyzerName] of Object.entries(mapping.fields ?? {})) {
        this.routes.set(`${field}.${subfield}`, { sourceField: field, analyzer: analyzerFor(analyzerName) });
      }
    }
  }

  get fieldPaths(): string[] {
    return [...this.routes.keys()];
  }

  /**
   * Analyse every mapped field of a document. Throws when a mapped field is
   * neither text nor a list of text.
   */
  indexDocument(document: SearchDocument): IndexedDocument {
    const fields = new Map<string, AnalyzedField>();

    for (const [path, route] of this.routes) {
      const values = this.textValues(document, route.sourceField);
      const terms = new Map<string, number>();
      let length = 0;

      // Values are analysed separately so shingles never span two aliases
      for (const value of values) {
        for (const term of route.analyzer.analyze(value)) {
          terms.set(term, (terms.get(term) ?? 0) + 1);
          length++;
        }
      }

      if (length > 0) {
        fields.set(path, { terms, length });
      }
    }

    return { id: document.id, source: document, fields };
  }

  /**
   * Analyse query text once per clause. Unknown fields compile to a clause
   * that matches nothing.
   */
  compile(clause: QueryClause): CompiledQuery {
    if ('match' in clause) {
      const { field, query, boost = 1 } = clause.match;
      const route = this.routes.get(field);
      const terms = route ? [...new Set(route.analyzer.analyze(query))] : [];
      return { kind: 'match', field, terms, boost };
    }

    return {
      kind: 'bool',
      should: clause.bool.should.map(child => this.compile(child)),
      boost: clause.bool.boost ?? 1,
    };
  }

  private textValues(document: SearchDocument, field: string): string[] {
    const value = document[field];
    if (value === undefined || value === null) {
      return [];
    }
    if (typeof value === 'string') {
      return [value];
    }
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
      return value;
    }
    throw new TypeError(`Field '${field}' of document '${document.id}' must be text or a list of text`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH RANKER
// ─────────────────────────────────────────────────────────────────────────────────

export class SearchRanker {
  /**
   * Score a document against a compiled query; 0 means no match.
   */
  score(query: CompiledQuery, document: IndexedDocument, stats: TermStatistics): number {
    if (query.kind === 'bool') {
      let total = 0;
      for (const child of query.should) {
        total += this.score(child, document, stats);
      }
      return total * query.boost;
    }

    const field = document.fields.get(query.field);
    if (!field) {
      return 0;
    }

    let total = 0;
    for (const term of query.terms) {
      const tf = field.terms.get(term);
      if (tf === undefined) continue;

      const idf = this.inverseDocumentFrequency(stats.documentCount, stats.documentFrequency(query.field, term));
      total += idf * Math.log(1 + tf) / Math.sqrt(field.length);
    }

    return total * query.boost;
  }

  /**
   * Probabilistic IDF, always positive.
   */
  inverseDocumentFrequency(documentCount: number, documentFrequency: number): number {
    return Math.log(1 + (documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5));
  }
}
