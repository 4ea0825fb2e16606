// ═══════════════════════════════════════════════════════════════════════════════
// SYNONYM INDEX — Table Building and Backend Ingestion
// ═══════════════════════════════════════════════════════════════════════════════
//
// buildSynonymTables turns mapping records into the in-memory ItemTable and
// SynonymTable used by exact resolution. pushSynonymDocuments streams the same
// records to the search backend in bounded batches for fuzzy resolution.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v5 as uuidv5 } from 'uuid';
import { getLogger } from '../observability/logging/index.js';
import type { CanonicalItem } from '../types/entities.js';
import type { BulkItemResult, SearchBackend } from '../search/types.js';
import type {
  Normalizer,
  PushSummary,
  SynonymDocument,
  SynonymTables,
} from './types.js';
import { DuplicateIdentifierError } from './errors.js';

const logger = getLogger({ component: 'synonym-index' });

// Namespace for ids of records that carry none
const DOCUMENT_ID_NAMESPACE = '5b0f7c1e-3d2a-4e8b-9c61-2f4a8d7e1b30';

// ─────────────────────────────────────────────────────────────────────────────────
// TABLES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build the ItemTable and SynonymTable for one entity type.
 *
 * Repeated cnames and aliases claimed by several cnames are kept and logged.
 * A repeated `id` throws DuplicateIdentifierError.
 */
export function buildSynonymTables(
  entityType: string,
  records: readonly CanonicalItem[],
  normalize: Normalizer
): SynonymTables {
  const items = new Map<string, CanonicalItem[]>();
  const synonyms = new Map<string, string[]>();
  const seenIds = new Set<string>();

  for (const record of records) {
    if (record.id !== undefined && record.id !== '') {
      if (seenIds.has(record.id)) {
        throw new DuplicateIdentifierError(entityType, record.id);
      }
      seenIds.add(record.id);
    }

    const sameName = items.get(record.cname);
    if (sameName) {
      logger.debug('Canonical name specified multiple times', { entityType, cname: record.cname });
      sameName.push(record);
    } else {
      items.set(record.cname, [record]);
    }

    for (const alias of [record.cname, ...(record.whitelist ?? [])]) {
      const key = normalize(alias);
      if (key === '') continue;

      const claimed = synonyms.get(key);
      if (!claimed) {
        synonyms.set(key, [record.cname]);
        continue;
      }

      logger.debug('Synonym specified multiple times', { entityType, synonym: key, cname: record.cname });
      if (!claimed.includes(record.cname)) {
        claimed.push(record.cname);
      }
    }
  }

  return { items, synonyms };
}

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The record's own id, or a name-based UUID of its content so re-pushing an
 * unchanged record replaces its document.
 */
export function documentIdFor(record: CanonicalItem): string {
  if (record.id !== undefined && record.id !== '') {
    return record.id;
  }
  return uuidv5(JSON.stringify(record), DOCUMENT_ID_NAMESPACE);
}

export function toSynonymDocument(record: CanonicalItem): SynonymDocument {
  return {
    ...record,
    id: documentIdFor(record),
    whitelist: record.whitelist ?? [],
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// INGESTION
// ─────────────────────────────────────────────────────────────────────────────────

export interface PushOptions {
  readonly batchSize: number;
  readonly maxInFlightBatches: number;

  /** Checked before each batch is dispatched */
  readonly signal?: AbortSignal;
}

/**
 * Upsert records into an index in batches, with at most
 * `maxInFlightBatches` bulk requests outstanding. Rejected documents are
 * logged and counted; they do not stop the push.
 */
export async function pushSynonymDocuments(
  backend: SearchBackend,
  indexName: string,
  records: readonly CanonicalItem[],
  options: PushOptions
): Promise<PushSummary> {
  const { batchSize, maxInFlightBatches, signal } = options;
  const batches: SynonymDocument[][] = [];
  for (let start = 0; start < records.length; start += batchSize) {
    batches.push(records.slice(start, start + batchSize).map(toSynonymDocument));
  }

  let next = 0;
  let dispatched = 0;
  let indexed = 0;
  let failed = 0;
  let aborted = false;

  // Set on the first bulk failure; siblings stop dispatching
  let stopped = false;

  const worker = async (): Promise<void> => {
    while (next < batches.length && !stopped) {
      if (signal?.aborted) {
        aborted = true;
        return;
      }

      const batch = batches[next++];
      if (batch === undefined) return;
      dispatched++;

      let results: BulkItemResult[];
      try {
        results = await backend.bulkUpsert(indexName, batch);
      } catch (error) {
        stopped = true;
        throw error;
      }
      for (const result of results) {
        if (result.ok) {
          indexed++;
          logger.debug('Indexed document', { index: indexName, id: result.id });
        } else {
          failed++;
          logger.error('Failed to index document', undefined, {
            index: indexName,
            id: result.id,
            reason: result.error,
          });
        }
      }
    }
  };

  const workers = Math.min(maxInFlightBatches, batches.length);
  // Every worker settles before returning, so no write outlives the push
  const settled = await Promise.allSettled(Array.from({ length: workers }, () => worker()));
  const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
  if (failure) {
    logger.error('Bulk indexing failed', failure.reason, { index: indexName, indexed, failed, batches: dispatched });
    throw failure.reason;
  }

  logger.info(`Loaded ${indexed} document(s)`, { index: indexName, failed, batches: dispatched, aborted });

  return { indexed, failed, batches: dispatched, aborted };
}
