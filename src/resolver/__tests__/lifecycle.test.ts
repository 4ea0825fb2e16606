// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE MANAGER TESTS — Index Creation, Rebuilds, Connection
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  BackendUnavailableError,
  MemorySearchBackend,
  UnsupportedHostError,
  createMemoryConnector,
  type BackendConnectionOptions,
  type SearchBackend,
} from '../../search/index.js';
import { RetryExhaustedError } from '../../infrastructure/retry/index.js';
import {
  LifecycleManager,
  SYNONYM_INDEX_CONFIG,
  synonymIndexName,
} from '../lifecycle.js';

const CONNECTION: BackendConnectionOptions = { host: 'memory://lifecycle', requestTimeoutMs: 1000 };

const noWait = async (_ms: number): Promise<void> => undefined;

describe('SYNONYM_INDEX_CONFIG', () => {
  it('should map cname and whitelist with keyword and n-gram sub-fields', () => {
    expect(SYNONYM_INDEX_CONFIG.mappings).toEqual({
      cname: { analyzer: 'default', fields: { normalized_keyword: 'keyword_match', char_ngram: 'char_ngram' } },
      whitelist: { analyzer: 'default', fields: { normalized_keyword: 'keyword_match', char_ngram: 'char_ngram' } },
    });
    expect(SYNONYM_INDEX_CONFIG.analysis.edgeNGram).toEqual({ minGram: 4, maxGram: 20 });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(SYNONYM_INDEX_CONFIG)).toBe(true);
    expect(Object.isFrozen(SYNONYM_INDEX_CONFIG.mappings)).toBe(true);
    expect(Object.isFrozen(SYNONYM_INDEX_CONFIG.analysis.shingle)).toBe(true);
  });
});

describe('synonymIndexName', () => {
  it('should prefix the entity type', () => {
    expect(synonymIndexName('city')).toBe('synonym_city');
  });
});

describe('LifecycleManager', () => {
  let backend: MemorySearchBackend;
  let connector: Mock<[BackendConnectionOptions], Promise<SearchBackend>>;
  let lifecycle: LifecycleManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    backend = new MemorySearchBackend();
    connector = vi.fn(async (_options: BackendConnectionOptions): Promise<SearchBackend> => backend);
    lifecycle = new LifecycleManager({ connector, connection: CONNECTION, wait: noWait });
  });

  describe('connection', () => {
    it('should connect lazily and once', async () => {
      expect(connector).not.toHaveBeenCalled();

      const [first, second] = await Promise.all([lifecycle.getBackend(), lifecycle.getBackend()]);

      expect(first).toBe(backend);
      expect(second).toBe(backend);
      expect(await lifecycle.getBackend()).toBe(backend);
      expect(connector).toHaveBeenCalledTimes(1);
      expect(connector).toHaveBeenCalledWith(CONNECTION);
    });

    it('should retry a failed connection attempt', async () => {
      connector.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      expect(await lifecycle.getBackend()).toBe(backend);
      expect(connector).toHaveBeenCalledTimes(2);
    });

    it('should raise BackendUnavailableError when attempts run out', async () => {
      connector.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const error = await lifecycle.getBackend().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendUnavailableError);
      if (error instanceof BackendUnavailableError) {
        expect(error.host).toBe('memory://lifecycle');
        expect(error.cause).toBeInstanceOf(RetryExhaustedError);
      }
      expect(connector).toHaveBeenCalledTimes(3);
    });

    it('should warn before each retry', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      connector.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await lifecycle.getBackend();

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Search backend connection failed, retrying'));
    });

    it('should fail at once for a host no connector serves', async () => {
      const wait = vi.fn(noWait);
      const memoryConnector = vi.fn(createMemoryConnector());
      const unsupported = new LifecycleManager({
        connector: memoryConnector,
        connection: { host: 'https://search.internal:9200', requestTimeoutMs: 1000 },
        wait,
      });

      const error = await unsupported.getBackend().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendUnavailableError);
      if (error instanceof BackendUnavailableError) {
        expect(error.message).toBe(
          "Could not connect to search backend 'https://search.internal:9200': No connector for host 'https://search.internal:9200'"
        );
        expect(error.cause).toBeInstanceOf(RetryExhaustedError);
        if (error.cause instanceof RetryExhaustedError) {
          expect(error.cause.reason).toBe('non_retryable');
          expect(error.cause.allErrors[0]).toBeInstanceOf(UnsupportedHostError);
        }
      }
      expect(memoryConnector).toHaveBeenCalledTimes(1);
      expect(wait).not.toHaveBeenCalled();
    });

    it('should close the handle on reset and reconnect on next use', async () => {
      const first = await lifecycle.getBackend();
      await lifecycle.reset();

      await expect(first.indexExists('synonym_city')).rejects.toBeInstanceOf(BackendUnavailableError);

      const replacement = new MemorySearchBackend();
      connector.mockResolvedValueOnce(replacement);
      expect(await lifecycle.getBackend()).toBe(replacement);
      expect(connector).toHaveBeenCalledTimes(2);
    });
  });

  describe('ensureIndex', () => {
    it('should create the index once', async () => {
      const create = vi.spyOn(backend, 'createIndex');

      expect(await lifecycle.ensureIndex('city')).toBe('synonym_city');
      expect(await lifecycle.ensureIndex('city')).toBe('synonym_city');

      expect(create).toHaveBeenCalledTimes(1);
      expect(create).toHaveBeenCalledWith('synonym_city', SYNONYM_INDEX_CONFIG);
    });

    it('should tolerate a concurrent creation', async () => {
      await Promise.all([lifecycle.ensureIndex('city'), lifecycle.ensureIndex('city')]);

      expect(await backend.indexExists('synonym_city')).toBe(true);
    });
  });

  describe('rebuild', () => {
    beforeEach(async () => {
      await lifecycle.ensureIndex('city');
      await backend.bulkUpsert('synonym_city', [{ id: '1', cname: 'Seattle', whitelist: [] }]);
    });

    it('should keep documents on an incremental rebuild', async () => {
      await lifecycle.rebuild('city', false);

      expect(await backend.getById('synonym_city', '1')).not.toBeNull();
    });

    it('should drop documents on a clean rebuild', async () => {
      await lifecycle.rebuild('city', true);

      expect(await backend.indexExists('synonym_city')).toBe(true);
      expect(await backend.getById('synonym_city', '1')).toBeNull();
    });

    it('should create a missing index on a clean rebuild', async () => {
      await backend.deleteIndex('synonym_city');

      expect(await lifecycle.rebuild('city', true)).toBe('synonym_city');
      expect(await backend.indexExists('synonym_city')).toBe(true);
    });
  });
});
