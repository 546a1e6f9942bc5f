import { CapabilityTimeout, withTimeout } from '@civic-rag/core';
import { z } from 'zod';
import { type IEmbeddingFunction, embed } from './embedding.js';
import type { KnowledgeBase } from './knowledgeBase.js';
import type { Chunk, ScoredId } from './types.js';

export const RetrievalOptionsSchema = z.object({
  weights: z
    .object({
      dense: z.number().min(0).default(0.3),
      sparse: z.number().min(0).default(0.7),
    })
    .default({}),
  /** Each index is asked for `ceil(k * overfetchFactor)` candidates before fusion. */
  overfetchFactor: z.number().min(1).default(2),
  defaultTopK: z.number().int().positive().default(5),
});

export type RetrievalOptions = z.infer<typeof RetrievalOptionsSchema>;

export interface RetrievalHit {
  chunk: Chunk;
  /** Fused score in [0, wDense + wSparse]. */
  score: number;
  /** Normalised dense similarity, 0 when the chunk was not among the dense candidates. */
  denseScore: number;
  /** Normalised BM25 score, 0 when the chunk was not among the sparse candidates. */
  sparseScore: number;
}

export interface RetrievalResult {
  query: string;
  k: number;
  hits: RetrievalHit[];
}

/**
 * Min-max normalisation into [0, 1]. A set whose scores are all equal maps every member to 1
 * when that score is positive and to 0 otherwise, so a query vector that matches nothing
 * (all similarities 0) adds no dense weight.
 */
export function normalizeScores(results: ScoredId[]): Map<string, number> {
  const normalized = new Map<string, number>();
  if (results.length === 0) return normalized;
  const scores = results.map((result) => result.score);
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  const flat = max > 0 ? 1 : 0;
  for (const { chunkId, score } of results) {
    normalized.set(chunkId, max === min ? flat : (score - min) / (max - min));
  }
  return normalized;
}

export interface FusedScore {
  chunkId: string;
  score: number;
  denseScore: number;
  sparseScore: number;
}

/** Weighted sum over the union of both candidate sets; a missing component counts as 0. */
export function fuseScores(
  dense: ScoredId[],
  sparse: ScoredId[],
  weights: RetrievalOptions['weights'],
): FusedScore[] {
  const denseScores = normalizeScores(dense);
  const sparseScores = normalizeScores(sparse);
  const ids = new Set([...denseScores.keys(), ...sparseScores.keys()]);
  return [...ids].map((chunkId) => {
    const denseScore = denseScores.get(chunkId) ?? 0;
    const sparseScore = sparseScores.get(chunkId) ?? 0;
    return {
      chunkId,
      denseScore,
      sparseScore,
      score: weights.dense * denseScore + weights.sparse * sparseScore,
    };
  });
}

export function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.chunk.sequenceIndex !== b.chunk.sequenceIndex) return a.chunk.sequenceIndex - b.chunk.sequenceIndex;
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}

export interface HybridRetrieverDependencies {
  knowledgeBase: KnowledgeBase;
  embeddingFn: IEmbeddingFunction;
  options?: Partial<RetrievalOptions>;
  embeddingTimeoutMs?: number;
}

/**
 * Combines dense and sparse candidates into one ranking.
 */
export class HybridRetriever {
  private readonly knowledgeBase: KnowledgeBase;
  private readonly embeddingFn: IEmbeddingFunction;
  readonly options: RetrievalOptions;
  private readonly embeddingTimeoutMs: number;

  constructor(dependencies: HybridRetrieverDependencies) {
    this.knowledgeBase = dependencies.knowledgeBase;
    this.embeddingFn = dependencies.embeddingFn;
    this.options = RetrievalOptionsSchema.parse(dependencies.options ?? {});
    this.embeddingTimeoutMs = dependencies.embeddingTimeoutMs ?? 30_000;
  }

  async retrieve(query: string, k: number = this.options.defaultTopK): Promise<RetrievalResult> {
    if (k <= 0 || this.knowledgeBase.chunkCount() === 0) {
      return { query, k, hits: [] };
    }
    const candidates = Math.max(k, Math.ceil(k * this.options.overfetchFactor));

    const [dense, sparse] = await Promise.all([
      this.searchDense(query, candidates),
      Promise.resolve(this.knowledgeBase.sparse.search(query, candidates)),
    ]);

    const hits: RetrievalHit[] = [];
    for (const fused of fuseScores(dense, sparse, this.options.weights)) {
      const chunk = this.knowledgeBase.getChunk(fused.chunkId);
      if (!chunk) {
        console.warn(`[HybridRetriever] Index returned unknown chunk '${fused.chunkId}', skipping.`);
        continue;
      }
      hits.push({ chunk, score: fused.score, denseScore: fused.denseScore, sparseScore: fused.sparseScore });
    }
    hits.sort(compareHits);

    return { query, k, hits: hits.slice(0, k) };
  }

  private async searchDense(query: string, candidates: number): Promise<ScoredId[]> {
    const queryVector = await withTimeout(
      (signal) => embed(this.embeddingFn, query, signal),
      this.embeddingTimeoutMs,
      () => new CapabilityTimeout('embedding', this.embeddingTimeoutMs),
    );
    return this.knowledgeBase.dense.search(queryVector, candidates);
  }
}
