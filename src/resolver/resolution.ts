// ═══════════════════════════════════════════════════════════════════════════════
// RESOLUTION — Exact Synonym Lookup and Ranked Fuzzy Search
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { isSystemEntity, stripAliases, type Entity, type ResolvedItem } from '../types/entities.js';
import type { QueryClause, SearchBackend } from '../search/types.js';
import type {
  Normalizer,
  RankedResolution,
  ResolutionResult,
  ResolvedCandidate,
  SynonymTables,
} from './types.js';

const logger = getLogger({ component: 'entity-resolver' });

// ─────────────────────────────────────────────────────────────────────────────────
// EXACT PATH
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Resolve a mention through the synonym table.
 *
 * System entities pass through with their value. A miss is logged and
 * returned as `unresolved`; it never throws. When several cnames claim the
 * normalized text, items for all of them are returned, cname order first,
 * then mapping order within a cname.
 */
export function resolveExact(entity: Entity, tables: SynonymTables, normalize: Normalizer): ResolutionResult {
  if (isSystemEntity(entity.type)) {
    return { kind: 'system', value: entity.value };
  }

  const normalized = normalize(entity.text);
  const cnames = tables.synonyms.get(normalized);

  if (!cnames || cnames.length === 0) {
    logger.warn('Failed to resolve entity', { entityType: entity.type, text: entity.text, normalized });
    return { kind: 'unresolved', text: entity.text };
  }

  if (cnames.length > 1) {
    logger.info('Multiple possible canonical names', { entityType: entity.type, text: entity.text, cnames });
  }

  const items: ResolvedItem[] = [];
  for (const cname of cnames) {
    for (const item of tables.items.get(cname) ?? []) {
      items.push(stripAliases(item));
    }
  }

  return { kind: 'exact', items };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FUZZY PATH
// ─────────────────────────────────────────────────────────────────────────────────

/** Whole-value match on a normalized alias or cname */
export const KEYWORD_BOOST = 10;

/** Token and shingle match */
export const FULL_TEXT_BOOST = 1;

/** Prefix n-gram match */
export const NGRAM_BOOST = 0.5;

export interface FuzzyOptions {
  readonly topK: number;

  /** Top hits of the index that are grouped */
  readonly sampleSize: number;

  /** Groups considered before ranking */
  readonly maxGroups: number;
}

export const DEFAULT_FUZZY_OPTIONS: FuzzyOptions = {
  topK: 10,
  sampleSize: 20,
  maxGroups: 100,
};

/**
 * Disjunction over the alias fields; keyword matches outrank full-text
 * matches, which outrank prefix matches.
 */
export function buildFuzzyQuery(normalized: string): QueryClause {
  return {
    bool: {
      should: [
        {
          bool: {
            should: [
              { match: { field: 'whitelist.normalized_keyword', query: normalized } },
              { match: { field: 'cname.normalized_keyword', query: normalized } },
            ],
            boost: KEYWORD_BOOST,
          },
        },
        { match: { field: 'whitelist', query: normalized, boost: FULL_TEXT_BOOST } },
        { match: { field: 'cname', query: normalized, boost: FULL_TEXT_BOOST } },
        { match: { field: 'cname.char_ngram', query: normalized, boost: NGRAM_BOOST } },
        { match: { field: 'whitelist.char_ngram', query: normalized, boost: NGRAM_BOOST } },
      ],
    },
  };
}

/**
 * Rank cnames for a mention through the search backend. Throws RangeError
 * for a topK that is not a positive integer.
 *
 * Backend failures propagate: a missing index or unreachable backend is an
 * error, not an empty result.
 */
export async function resolveFuzzy(
  text: string,
  backend: SearchBackend,
  indexName: string,
  normalize: Normalizer,
  options: Partial<FuzzyOptions> = {}
): Promise<RankedResolution> {
  const { topK, sampleSize, maxGroups } = { ...DEFAULT_FUZZY_OPTIONS, ...options };
  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${topK}`);
  }
  const normalized = normalize(text);

  const response = await backend.search(indexName, {
    query: buildFuzzyQuery(normalized),
    grouping: { field: 'cname', sampleSize, maxGroups, topHits: 1 },
  });

  // Stable sort: equal scores keep the backend's group order
  const candidates: ResolvedCandidate[] = response.groups
    .map(group => ({ cname: group.key, score: group.maxScore, hitCount: group.hitCount }))
    .sort((a, b) => b.score - a.score)
    .slice(0, topK);

  logger.debug('Fuzzy resolution', {
    index: indexName,
    text,
    totalHits: response.totalHits,
    groups: response.groups.length,
    returned: candidates.length,
    tookMs: response.tookMs,
  });

  return { kind: 'ranked', candidates };
}
