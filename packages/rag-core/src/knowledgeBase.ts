import { SnapshotInvalid } from '@civic-rag/core';
import { z } from 'zod';
import { type DenseIndex, VectorDbProvider } from './denseIndex.js';
import type { EmbeddingVector } from './embedding.js';
import { SparseIndex, SparseIndexStateSchema } from './sparseIndex.js';
import { type Chunk, ChunkSchema } from './types.js';

export const SNAPSHOT_VERSION = 1;

export const KnowledgeBaseSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  createdAt: z.string(),
  embeddingDimension: z.number().int().positive().nullable(),
  chunks: z.array(ChunkSchema),
  sparse: SparseIndexStateSchema,
  dense: z.object({
    provider: z.nativeEnum(VectorDbProvider),
    /** `null` when the vectors stay in a remote store. */
    vectors: z.array(z.object({ chunkId: z.string(), vector: z.array(z.number()) })).nullable(),
  }),
});

export type KnowledgeBaseSnapshot = z.infer<typeof KnowledgeBaseSnapshotSchema>;

export interface KnowledgeBaseStatus {
  documents: number;
  chunks: number;
  denseVectors: number;
  sparseTerms: number;
  embeddingDimension: number | null;
}

/**
 * Chunk table plus the two indexes built over it. Every chunk id in either index resolves here.
 */
export class KnowledgeBase {
  private readonly chunks = new Map<string, Chunk>();

  constructor(
    readonly dense: DenseIndex,
    readonly sparse: SparseIndex = new SparseIndex(),
  ) {}

  /** Registers chunks with their embeddings; `vectors[i]` belongs to `chunks[i]`. */
  async addChunks(chunks: Chunk[], vectors: EmbeddingVector[]): Promise<void> {
    if (chunks.length !== vectors.length) {
      throw new Error(`Expected ${chunks.length} vectors, got ${vectors.length}.`);
    }
    await this.dense.addMany(chunks.map((chunk, i) => ({ chunkId: chunk.id, vector: vectors[i] })));
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
      this.sparse.add(chunk.id, chunk.text);
    }
  }

  getChunk(chunkId: string): Chunk | undefined {
    return this.chunks.get(chunkId);
  }

  listChunks(): Chunk[] {
    return [...this.chunks.values()];
  }

  chunkCount(): number {
    return this.chunks.size;
  }

  documentCount(): number {
    return new Set([...this.chunks.values()].map((chunk) => chunk.documentId)).size;
  }

  async status(): Promise<KnowledgeBaseStatus> {
    return {
      documents: this.documentCount(),
      chunks: this.chunkCount(),
      denseVectors: await this.dense.count(),
      sparseTerms: this.sparse.termCount(),
      embeddingDimension: this.dense.dimension,
    };
  }

  snapshot(): KnowledgeBaseSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      createdAt: new Date().toISOString(),
      embeddingDimension: this.dense.dimension,
      chunks: this.listChunks(),
      sparse: this.sparse.toJSON(),
      dense: { provider: this.dense.provider, vectors: this.dense.exportVectors() },
    };
  }

  /**
   * Rebuilds a knowledge base from a snapshot without recomputing embeddings.
   * `dense` is cleared and refilled when the snapshot carries vectors.
   *
   * @throws SnapshotInvalid when the data does not validate or is inconsistent.
   */
  static async restore(data: unknown, dense: DenseIndex): Promise<KnowledgeBase> {
    const parsed = KnowledgeBaseSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'snapshot'}: ${issue.message}`);
      throw new SnapshotInvalid(details.join('; '), parsed.error);
    }
    const snapshot = parsed.data;

    const chunkIds = new Set<string>();
    for (const chunk of snapshot.chunks) {
      if (chunkIds.has(chunk.id)) throw new SnapshotInvalid(`duplicate chunk id '${chunk.id}'`);
      chunkIds.add(chunk.id);
    }
    const unknownSparse = snapshot.sparse.entries.find((entry) => !chunkIds.has(entry.chunkId));
    if (unknownSparse) {
      throw new SnapshotInvalid(`sparse entry for unknown chunk '${unknownSparse.chunkId}'`);
    }

    const { vectors } = snapshot.dense;
    if (vectors) {
      const stray = vectors.find(
        (entry) => !chunkIds.has(entry.chunkId) || entry.vector.length !== snapshot.embeddingDimension,
      );
      if (stray) {
        throw new SnapshotInvalid(`vector for '${stray.chunkId}' does not match the chunk table or dimension`);
      }
      await dense.clear();
      await dense.addMany(vectors);
    } else if (dense.provider === VectorDbProvider.InMemory && snapshot.chunks.length > 0) {
      throw new SnapshotInvalid(
        `no dense vectors stored (built with provider '${snapshot.dense.provider}'), the in-memory index cannot be refilled`,
      );
    }

    const knowledgeBase = new KnowledgeBase(dense, SparseIndex.fromJSON(snapshot.sparse));
    for (const chunk of snapshot.chunks) knowledgeBase.chunks.set(chunk.id, chunk);
    console.log(`[KnowledgeBase] Restored ${snapshot.chunks.length} chunks from snapshot of ${snapshot.createdAt}.`);
    return knowledgeBase;
  }
}
