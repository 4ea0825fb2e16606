// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY BACKEND TESTS — Indexing, Ranking, Grouping, Handles
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DEFAULT_ANALYSIS_SETTINGS,
  FieldIndexer,
  SearchRanker,
  MemoryIndex,
  MemoryIndexStore,
  MemorySearchBackend,
  createMemoryConnector,
  BackendUnavailableError,
  IndexAlreadyExistsError,
  IndexNotFoundError,
  UnsupportedHostError,
  type GroupedSearchRequest,
  type IndexSettings,
} from '../index.js';

const SETTINGS: IndexSettings = {
  analysis: DEFAULT_ANALYSIS_SETTINGS,
  mappings: {
    cname: { analyzer: 'default', fields: { raw: 'keyword_match' } },
  },
};

function matchName(query: string, grouping: Partial<GroupedSearchRequest['grouping']> = {}): GroupedSearchRequest {
  return {
    query: { match: { field: 'cname', query } },
    grouping: { field: 'cname', sampleSize: 20, maxGroups: 100, topHits: 1, ...grouping },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('FieldIndexer', () => {
  const indexer = new FieldIndexer(SETTINGS);

  it('should route fields and sub-fields', () => {
    expect(indexer.fieldPaths).toEqual(['cname', 'cname.raw']);
  });

  it('should analyse each list value separately', () => {
    const indexer = new FieldIndexer({
      analysis: DEFAULT_ANALYSIS_SETTINGS,
      mappings: { whitelist: { analyzer: 'char_ngram' } },
    });

    const document = indexer.indexDocument({ id: 'd1', whitelist: ['SEA', 'Emerald City'] });
    const field = document.fields.get('whitelist');

    expect(field?.length).toBe(5);
    expect([...(field?.terms.keys() ?? [])]).toEqual(['emer', 'emera', 'emeral', 'emerald', 'city']);
  });

  it('should reject non-text field values', () => {
    expect(() => indexer.indexDocument({ id: 'd1', cname: 42 })).toThrow(
      "Field 'cname' of document 'd1' must be text or a list of text"
    );
  });

  it('should compile unique query terms', () => {
    expect(indexer.compile({ match: { field: 'cname', query: 'apple apple' } })).toEqual({
      kind: 'match',
      field: 'cname',
      terms: ['apple', 'apple apple'],
      boost: 1,
    });
  });

  it('should compile unknown fields to an empty clause', () => {
    expect(indexer.compile({ match: { field: 'missing', query: 'apple', boost: 3 } })).toEqual({
      kind: 'match',
      field: 'missing',
      terms: [],
      boost: 3,
    });
  });
});

describe('SearchRanker', () => {
  const ranker = new SearchRanker();

  it('should compute probabilistic idf', () => {
    expect(ranker.inverseDocumentFrequency(10, 0)).toBeCloseTo(Math.log(22));
    expect(ranker.inverseDocumentFrequency(1, 1)).toBeCloseTo(Math.log(1 + 0.5 / 1.5));
  });

  it('should score a single-term match', () => {
    const indexer = new FieldIndexer(SETTINGS);
    const document = indexer.indexDocument({ id: 'd1', cname: 'Seattle' });
    const stats = { documentCount: 1, documentFrequency: () => 1 };

    const score = ranker.score(indexer.compile({ match: { field: 'cname', query: 'seattle', boost: 2 } }), document, stats);

    // idf(1, 1) * ln(1 + 1) / sqrt(1) * 2
    expect(score).toBeCloseTo(Math.log(1 + 0.5 / 1.5) * Math.log(2) * 2);
  });

  it('should sum bool children and apply the bool boost', () => {
    const indexer = new FieldIndexer(SETTINGS);
    const document = indexer.indexDocument({ id: 'd1', cname: 'Seattle' });
    const stats = { documentCount: 1, documentFrequency: () => 1 };
    const single = ranker.score(indexer.compile({ match: { field: 'cname', query: 'seattle' } }), document, stats);

    const score = ranker.score(
      indexer.compile({
        bool: {
          should: [
            { match: { field: 'cname', query: 'seattle' } },
            { match: { field: 'cname.raw', query: 'portland' } },
          ],
          boost: 10,
        },
      }),
      document,
      stats
    );

    expect(score).toBeCloseTo(single * 10);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// INDEX TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryIndex', () => {
  it('should track document frequencies across replacement', () => {
    const index = new MemoryIndex('fruit', SETTINGS);

    expect(index.upsert({ id: 'a', cname: 'apple' })).toBe(true);
    expect(index.documentFrequency('cname', 'apple')).toBe(1);

    expect(index.upsert({ id: 'a', cname: 'pear' })).toBe(false);
    expect(index.documentCount).toBe(1);
    expect(index.documentFrequency('cname', 'apple')).toBe(0);
    expect(index.documentFrequency('cname', 'pear')).toBe(1);
    expect(index.get('a')).toEqual({ id: 'a', cname: 'pear' });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BACKEND TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemorySearchBackend', () => {
  let store: MemoryIndexStore;
  let backend: MemorySearchBackend;

  beforeEach(async () => {
    store = new MemoryIndexStore();
    backend = new MemorySearchBackend(store, 'memory://tests');
    await backend.createIndex('fruit', SETTINGS);
    await backend.bulkUpsert('fruit', [
      { id: '1', cname: 'red apple' },
      { id: '2', cname: 'red apple' },
      { id: '3', cname: 'green apple' },
      { id: '4', cname: 'banana' },
    ]);
  });

  describe('indices', () => {
    it('should report existing indices', async () => {
      expect(await backend.indexExists('fruit')).toBe(true);
      expect(await backend.indexExists('vegetables')).toBe(false);
    });

    it('should refuse to create an index twice', async () => {
      await expect(backend.createIndex('fruit', SETTINGS)).rejects.toBeInstanceOf(IndexAlreadyExistsError);
    });

    it('should report whether a delete removed anything', async () => {
      expect(await backend.deleteIndex('fruit')).toBe(true);
      expect(await backend.deleteIndex('fruit')).toBe(false);
    });

    it('should fail operations on a missing index', async () => {
      await expect(backend.search('vegetables', matchName('apple'))).rejects.toBeInstanceOf(IndexNotFoundError);
      await expect(backend.getById('vegetables', '1')).rejects.toBeInstanceOf(IndexNotFoundError);
      await expect(backend.bulkUpsert('vegetables', [])).rejects.toBeInstanceOf(IndexNotFoundError);
    });
  });

  describe('bulkUpsert', () => {
    it('should report created and replaced documents in order', async () => {
      const results = await backend.bulkUpsert('fruit', [
        { id: '4', cname: 'plantain' },
        { id: '5', cname: 'cherry' },
      ]);

      expect(results).toEqual([
        { id: '4', ok: true, created: false },
        { id: '5', ok: true, created: true },
      ]);
      expect(await backend.getById('fruit', '4')).toEqual({ id: '4', cname: 'plantain' });
    });

    it('should reject individual documents without failing the batch', async () => {
      const results = await backend.bulkUpsert('fruit', [
        { id: '6', cname: ['kiwi', 7] },
        { id: '', cname: 'fig' },
        { id: '7', cname: 'lime' },
      ]);

      expect(results).toEqual([
        { id: '6', ok: false, error: "Field 'cname' of document '6' must be text or a list of text" },
        { id: '', ok: false, error: 'Document id must be a non-empty string' },
        { id: '7', ok: true, created: true },
      ]);
      expect(await backend.getById('fruit', '6')).toBeNull();
    });
  });

  describe('search', () => {
    it('should group hits by key, largest group first', async () => {
      const response = await backend.search('fruit', matchName('apple'));

      expect(response.totalHits).toBe(3);
      expect(response.groups.map(group => [group.key, group.hitCount])).toEqual([
        ['red apple', 2],
        ['green apple', 1],
      ]);
      expect(response.groups[0]?.topHits.map(hit => hit.id)).toEqual(['1']);
    });

    it('should break equal group sizes by key', async () => {
      const response = await backend.search('fruit', matchName('green apple banana'));

      // green apple: 1 hit, red apple: 2 hits, banana: 1 hit
      expect(response.groups.map(group => group.key)).toEqual(['red apple', 'banana', 'green apple']);
    });

    it('should only group the top sampled hits', async () => {
      const response = await backend.search('fruit', matchName('apple', { sampleSize: 2 }));

      expect(response.totalHits).toBe(3);
      expect(response.groups.map(group => [group.key, group.hitCount])).toEqual([['red apple', 2]]);
    });

    it('should cap the number of groups', async () => {
      const response = await backend.search('fruit', matchName('apple', { maxGroups: 1 }));

      expect(response.groups).toHaveLength(1);
    });

    it('should rank fuller matches higher', async () => {
      const response = await backend.search('fruit', matchName('red apple'));
      const [red, green] = response.groups;

      expect(red?.key).toBe('red apple');
      expect(green?.key).toBe('green apple');
      expect(red?.maxScore ?? 0).toBeGreaterThan(green?.maxScore ?? 0);
    });

    it('should return no groups when nothing matches', async () => {
      const response = await backend.search('fruit', matchName('durian'));

      expect(response.totalHits).toBe(0);
      expect(response.groups).toEqual([]);
    });
  });

  describe('handles', () => {
    it('should fail every call after close', async () => {
      await backend.close();

      await expect(backend.indexExists('fruit')).rejects.toBeInstanceOf(BackendUnavailableError);
      await expect(backend.search('fruit', matchName('apple'))).rejects.toBeInstanceOf(BackendUnavailableError);
    });

    it('should leave other handles on the same store open', async () => {
      const other = new MemorySearchBackend(store, 'memory://tests');
      await backend.close();

      expect(await other.getById('fruit', '1')).toEqual({ id: '1', cname: 'red apple' });
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CONNECTOR TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('createMemoryConnector', () => {
  it('should share one store per host', async () => {
    const connect = createMemoryConnector();
    const first = await connect({ host: 'memory://shared', requestTimeoutMs: 1000 });
    const second = await connect({ host: 'memory://shared', requestTimeoutMs: 1000 });
    const isolated = await connect({ host: 'memory://other', requestTimeoutMs: 1000 });

    await first.createIndex('fruit', SETTINGS);

    expect(second).not.toBe(first);
    expect(await second.indexExists('fruit')).toBe(true);
    expect(await isolated.indexExists('fruit')).toBe(false);
  });

  it('should refuse hosts it cannot serve', async () => {
    const connect = createMemoryConnector();

    await expect(connect({ host: 'https://search.example.com:9200', requestTimeoutMs: 1000 }))
      .rejects.toBeInstanceOf(UnsupportedHostError);
  });
});
