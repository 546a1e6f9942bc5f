import { SnapshotInvalid } from '@civic-rag/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { segment } from './chunking.js';
import { DenseIndex, VectorDbProvider } from './denseIndex.js';
import { MockEmbeddingFunction } from './embedding.js';
import { HybridRetriever } from './hybridRetriever.js';
import { KnowledgeBase, SNAPSHOT_VERSION } from './knowledgeBase.js';

const SATZUNG = [
  '§ 1 Geltungsbereich',
  'Diese Satzung gilt für das Parken von Anwohnern im Stadtgebiet.',
  '§ 2 Gebühren',
  'Die Gebühr für einen Anwohnerparkausweis beträgt 25 Euro pro Jahr.',
  '§ 3 Antrag',
  'Der Antrag ist beim Bürgeramt schriftlich zu stellen.',
].join('\n');

const embeddingFn = new MockEmbeddingFunction(32);

async function buildKnowledgeBase(): Promise<KnowledgeBase> {
  const chunks = segment({ documentId: 'parken.pdf', source: 'parken.pdf', text: SATZUNG, ocrDerived: false, pageOffsets: [0] });
  const knowledgeBase = new KnowledgeBase(await DenseIndex.create({ provider: VectorDbProvider.InMemory }));
  await knowledgeBase.addChunks(chunks, await embeddingFn.generate(chunks.map((c) => c.text)));
  return knowledgeBase;
}

const inMemoryIndex = () => DenseIndex.create({ provider: VectorDbProvider.InMemory });

describe('KnowledgeBase', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register chunks in the table and both indexes', async () => {
    const knowledgeBase = await buildKnowledgeBase();

    expect(knowledgeBase.listChunks().map((c) => c.structuralPath)).toEqual([['§ 1'], ['§ 2'], ['§ 3']]);
    expect(knowledgeBase.getChunk('parken.pdf::chunk_1')?.text).toBe(
      '§ 2 Gebühren\nDie Gebühr für einen Anwohnerparkausweis beträgt 25 Euro pro Jahr.',
    );
    const status = await knowledgeBase.status();
    expect(status).toMatchObject({ documents: 1, chunks: 3, denseVectors: 3, embeddingDimension: 32 });
    expect(status.sparseTerms).toBeGreaterThan(0);
  });

  it('should reject a vector count that does not match the chunks', async () => {
    const knowledgeBase = new KnowledgeBase(await inMemoryIndex());
    const [first] = segment({ documentId: 'd', source: 'd', text: 'Kurzer Text.', ocrDerived: false, pageOffsets: [] });

    await expect(knowledgeBase.addChunks([first], [])).rejects.toThrow('Expected 1 vectors, got 0.');
    expect(knowledgeBase.chunkCount()).toBe(0);
  });

  it('should retrieve identically after a snapshot round trip', async () => {
    const original = await buildKnowledgeBase();
    const snapshot: unknown = JSON.parse(JSON.stringify(original.snapshot()));

    const restored = await KnowledgeBase.restore(snapshot, await inMemoryIndex());

    const query = 'Wie hoch ist die Gebühr für den Anwohnerparkausweis?';
    const before = await new HybridRetriever({ knowledgeBase: original, embeddingFn }).retrieve(query, 3);
    const after = await new HybridRetriever({ knowledgeBase: restored, embeddingFn }).retrieve(query, 3);
    expect(after).toEqual(before);
    expect(after.hits[0].chunk.id).toBe('parken.pdf::chunk_1');
    expect(await restored.status()).toEqual(await original.status());
  });

  it('should describe the dense provider and dimension in the snapshot', async () => {
    const snapshot = (await buildKnowledgeBase()).snapshot();

    expect(snapshot.version).toBe(SNAPSHOT_VERSION);
    expect(snapshot.embeddingDimension).toBe(32);
    expect(snapshot.dense.provider).toBe(VectorDbProvider.InMemory);
    expect(snapshot.dense.vectors?.map((v) => v.chunkId)).toEqual([
      'parken.pdf::chunk_0',
      'parken.pdf::chunk_1',
      'parken.pdf::chunk_2',
    ]);
  });

  it('should throw SnapshotInvalid for data that does not validate', async () => {
    const failure = await KnowledgeBase.restore({ version: 99, chunks: 'none' }, await inMemoryIndex()).catch(
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(SnapshotInvalid);
    expect(failure).toHaveProperty('code', 'SNAPSHOT_INVALID');
    expect(failure).toHaveProperty('message', expect.stringMatching(/^Index snapshot is invalid: version: /));
  });

  it('should throw SnapshotInvalid for duplicate chunk ids', async () => {
    const snapshot = (await buildKnowledgeBase()).snapshot();
    snapshot.chunks.push(snapshot.chunks[0]);

    await expect(KnowledgeBase.restore(snapshot, await inMemoryIndex())).rejects.toThrow(
      "Index snapshot is invalid: duplicate chunk id 'parken.pdf::chunk_0'",
    );
  });

  it('should throw SnapshotInvalid when an index refers to an unknown chunk', async () => {
    const snapshot = (await buildKnowledgeBase()).snapshot();
    snapshot.chunks = snapshot.chunks.slice(1);

    await expect(KnowledgeBase.restore(snapshot, await inMemoryIndex())).rejects.toThrow(
      "Index snapshot is invalid: sparse entry for unknown chunk 'parken.pdf::chunk_0'",
    );
  });

  it('should throw SnapshotInvalid when vectors have the wrong dimension', async () => {
    const snapshot = (await buildKnowledgeBase()).snapshot();
    snapshot.embeddingDimension = 8;

    await expect(KnowledgeBase.restore(snapshot, await inMemoryIndex())).rejects.toBeInstanceOf(SnapshotInvalid);
  });

  it('should refuse to restore an in-memory index from a snapshot without vectors', async () => {
    const snapshot = (await buildKnowledgeBase()).snapshot();
    snapshot.dense = { provider: VectorDbProvider.Pinecone, vectors: null };

    await expect(KnowledgeBase.restore(snapshot, await inMemoryIndex())).rejects.toThrow(
      "Index snapshot is invalid: no dense vectors stored (built with provider 'pinecone'), the in-memory index cannot be refilled",
    );
  });
});
