import { Pinecone } from '@pinecone-database/pinecone';
import { ChromaClient } from 'chromadb';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DenseIndex, VectorDbProvider, cosineSimilarity } from './denseIndex.js';
import { MockEmbeddingFunction } from './embedding.js';

const { mockCollection, mockNamespace, mockPineconeIndex } = vi.hoisted(() => {
  const mockNamespace = {
    upsert: vi.fn(),
    query: vi.fn(),
    deleteAll: vi.fn(),
    describeIndexStats: vi.fn(),
  };
  return {
    mockCollection: {
      upsert: vi.fn(),
      query: vi.fn(),
      get: vi.fn(),
      delete: vi.fn(),
      count: vi.fn(),
    },
    mockNamespace,
    mockPineconeIndex: { namespace: vi.fn(() => mockNamespace) },
  };
});

vi.mock('chromadb', async (importOriginal) => {
  const original = await importOriginal<typeof import('chromadb')>();
  return {
    ...original,
    ChromaClient: vi.fn(function () {
      return { getOrCreateCollection: vi.fn(async () => mockCollection) };
    }),
  };
});

vi.mock('@pinecone-database/pinecone', () => ({
  Pinecone: vi.fn(function () {
    return { index: vi.fn(() => mockPineconeIndex) };
  }),
}));

describe('DenseIndex', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('in-memory provider', () => {
    it('should rank by cosine similarity and break ties by chunk id', async () => {
      const index = await DenseIndex.create({ provider: VectorDbProvider.InMemory });
      await index.addMany([
        { chunkId: 'c', vector: [1, 0] },
        { chunkId: 'b', vector: [0, 1] },
        { chunkId: 'a', vector: [2, 0] },
      ]);

      const results = await index.search([1, 0], 5);

      expect(results).toEqual([
        { chunkId: 'a', score: 1 },
        { chunkId: 'c', score: 1 },
        { chunkId: 'b', score: 0 },
      ]);
      expect(await index.search([1, 0], 1)).toEqual([{ chunkId: 'a', score: 1 }]);
    });

    it('should keep separate stores per instance', async () => {
      const first = await DenseIndex.create({ provider: VectorDbProvider.InMemory });
      const second = await DenseIndex.create({ provider: VectorDbProvider.InMemory });
      await first.add('x', [1, 1]);

      expect(await first.count()).toBe(1);
      expect(await second.count()).toBe(0);
      expect(await second.search([1, 1], 3)).toEqual([]);
    });

    it('should fix the dimension on first insert and reject mismatches', async () => {
      const index = await DenseIndex.create({ provider: VectorDbProvider.InMemory });
      await index.add('x', [1, 0, 0]);

      expect(index.dimension).toBe(3);
      await expect(index.add('y', [1, 0])).rejects.toThrow('Vector dimension mismatch: expected 3, got 2.');
      await expect(index.search([1, 0], 1)).rejects.toThrow('Query vector dimension mismatch: expected 3, got 2.');
    });

    it('should replace a vector added twice and forget everything on clear', async () => {
      const index = await DenseIndex.create({ provider: VectorDbProvider.InMemory });
      await index.add('x', [1, 0]);
      await index.add('x', [0, 1]);

      expect(await index.count()).toBe(1);
      expect(index.exportVectors()).toEqual([{ chunkId: 'x', vector: [0, 1] }]);

      await index.clear();
      expect(await index.count()).toBe(0);
      expect(index.dimension).toBeNull();
      await index.add('z', [1, 2, 3]);
      expect(index.dimension).toBe(3);
    });

    it('should not be changed by searching', async () => {
      const index = await DenseIndex.create({ provider: VectorDbProvider.InMemory });
      await index.addMany([
        { chunkId: 'a', vector: [1, 0] },
        { chunkId: 'b', vector: [0, 1] },
      ]);
      const before = index.exportVectors();
      await index.search([1, 1], 2);
      expect(index.exportVectors()).toEqual(before);
    });
  });

  describe('chromadb provider', () => {
    it('should require an embedding function', async () => {
      await expect(DenseIndex.create({ provider: VectorDbProvider.ChromaDB, collectionName: 'c' })).rejects.toThrow(
        'DenseIndex initialization failed: ChromaDB provider requires an embedding function',
      );
    });

    it('should create a cosine collection and convert distances to similarities', async () => {
      mockCollection.query.mockResolvedValueOnce({ ids: [['a', 'b']], distances: [[0.25, 0.5]] });
      const embeddingFn = new MockEmbeddingFunction(2);
      const index = await DenseIndex.create(
        { provider: VectorDbProvider.ChromaDB, collectionName: 'satzungen', path: 'http://chroma.local' },
        embeddingFn,
      );
      await index.addMany([
        { chunkId: 'a', vector: [1, 0] },
        { chunkId: 'b', vector: [0, 1] },
      ]);

      const results = await index.search([1, 0], 2);

      expect(ChromaClient).toHaveBeenCalledWith({ path: 'http://chroma.local' });
      expect(mockCollection.upsert).toHaveBeenCalledWith({
        ids: ['a', 'b'],
        embeddings: [
          [1, 0],
          [0, 1],
        ],
      });
      expect(results).toEqual([
        { chunkId: 'a', score: 0.75 },
        { chunkId: 'b', score: 0.5 },
      ]);
      expect(index.exportVectors()).toBeNull();
    });

    it('should delete every stored id on clear', async () => {
      mockCollection.get.mockResolvedValueOnce({ ids: ['a', 'b'] });
      const index = await DenseIndex.create(
        { provider: VectorDbProvider.ChromaDB, collectionName: 'satzungen' },
        new MockEmbeddingFunction(2),
      );

      await index.clear();

      expect(mockCollection.delete).toHaveBeenCalledWith({ ids: ['a', 'b'] });
    });
  });

  describe('pinecone provider', () => {
    const config = {
      provider: VectorDbProvider.Pinecone,
      apiKey: 'test-secret',
      indexName: 'civic',
      namespace: 'stadt',
    } as const;

    it('should upsert in batches of 100 and map query matches', async () => {
      mockNamespace.query.mockResolvedValueOnce({ matches: [{ id: 'a', score: 0.9 }, { id: 'b' }] });
      const index = await DenseIndex.create(config);
      const entries = Array.from({ length: 150 }, (_, i) => ({ chunkId: `c${i}`, vector: [i, 1] }));

      await index.addMany(entries);
      const results = await index.search([1, 1], 2);

      expect(Pinecone).toHaveBeenCalledWith({ apiKey: 'test-secret' });
      expect(mockPineconeIndex.namespace).toHaveBeenCalledWith('stadt');
      expect(mockNamespace.upsert).toHaveBeenCalledTimes(2);
      expect(mockNamespace.upsert.mock.calls[1][0]).toHaveLength(50);
      expect(mockNamespace.query).toHaveBeenCalledWith({ vector: [1, 1], topK: 2 });
      expect(results).toEqual([
        { chunkId: 'a', score: 0.9 },
        { chunkId: 'b', score: 0 },
      ]);
    });

    it('should count the namespace records and clear the namespace', async () => {
      mockNamespace.describeIndexStats.mockResolvedValueOnce({ namespaces: { stadt: { recordCount: 7 } } });
      const index = await DenseIndex.create(config);

      expect(await index.count()).toBe(7);
      await index.clear();
      expect(mockNamespace.deleteAll).toHaveBeenCalledOnce();
    });

    it('should wrap provider errors', async () => {
      mockNamespace.query.mockRejectedValueOnce(new Error('unavailable'));
      const index = await DenseIndex.create(config);

      await expect(index.search([1, 0], 3)).rejects.toThrow('Query failed: unavailable');
    });
  });

  it('should compute cosine similarity and treat zero vectors as dissimilar', () => {
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 1])).toBe(0);
  });
});
