// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVER TYPES — Tables, Candidates, Results
// ═══════════════════════════════════════════════════════════════════════════════

import type { CanonicalItem, ResolvedItem } from '../types/entities.js';
import type { SearchDocument } from '../search/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TABLES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Pure text normalization applied to aliases and mentions alike.
 */
export type Normalizer = (text: string) => string;

/**
 * normalized alias -> cnames claiming it, in first-registration order.
 * Every cname is a key of the ItemTable.
 */
export type SynonymTable = ReadonlyMap<string, readonly string[]>;

/**
 * cname -> records sharing that display name, in mapping order.
 */
export type ItemTable = ReadonlyMap<string, readonly CanonicalItem[]>;

export interface SynonymTables {
  readonly items: ItemTable;
  readonly synonyms: SynonymTable;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INGESTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Backend document for one mapping record.
 */
export interface SynonymDocument extends SearchDocument {
  readonly cname: string;
  readonly whitelist: readonly string[];
}

export interface PushSummary {
  /** Documents the backend accepted */
  readonly indexed: number;

  /** Documents the backend rejected */
  readonly failed: number;

  /** Batches dispatched */
  readonly batches: number;

  /** True when the abort signal stopped dispatch before the last batch */
  readonly aborted: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESULTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ResolvedCandidate {
  readonly cname: string;

  /** Relevance of the group's best hit */
  readonly score: number;

  /** Sampled hits supporting this cname */
  readonly hitCount: number;
}

export interface ExactResolution {
  readonly kind: 'exact';
  readonly items: readonly ResolvedItem[];
}

export interface RankedResolution {
  readonly kind: 'ranked';
  readonly candidates: readonly ResolvedCandidate[];
}

export interface UnresolvedMention {
  readonly kind: 'unresolved';

  /** The mention text, unchanged */
  readonly text: string;
}

export interface SystemEntityValue {
  readonly kind: 'system';
  readonly value: unknown;
}

export type ResolutionResult =
  | ExactResolution
  | RankedResolution
  | UnresolvedMention
  | SystemEntityValue;

/**
 * Reserved output shape of predictProba.
 */
export interface ValueProbability {
  readonly value: unknown;
  readonly probability: number;
}
