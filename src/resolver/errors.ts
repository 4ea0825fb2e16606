// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVER ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

import type { PushSummary } from './types.js';

/**
 * Two mapping records of one entity type share an `id`. Raised while the
 * tables are built, before anything is written to the backend.
 */
export class DuplicateIdentifierError extends Error {
  readonly name = 'DuplicateIdentifierError';
  readonly entityType: string;
  readonly id: string;

  constructor(entityType: string, id: string) {
    super(`Knowledge base for '${entityType}' has more than one record with id '${id}'`);
    this.entityType = entityType;
    this.id = id;
  }
}

/**
 * A fit was abandoned between batches. Previously published tables stay in
 * place; a later clean fit repairs the index.
 */
export class FitAbortedError extends Error {
  readonly name = 'FitAbortedError';
  readonly entityType: string;
  readonly summary: PushSummary;

  constructor(entityType: string, summary: PushSummary, options?: { cause?: unknown }) {
    super(`Fit for '${entityType}' aborted after ${summary.batches} batch(es)`, options);
    this.entityType = entityType;
    this.summary = summary;
  }
}
