import { z } from 'zod';
import { tokenize } from './tokenizer.js';
import type { ScoredId } from './types.js';

export const SparseIndexStateSchema = z.object({
  k1: z.number().positive(),
  b: z.number().min(0).max(1),
  entries: z.array(
    z.object({
      chunkId: z.string(),
      length: z.number().int().nonnegative(),
      terms: z.record(z.number().int().positive()),
    }),
  ),
});

export type SparseIndexState = z.infer<typeof SparseIndexStateSchema>;

export interface SparseIndexOptions {
  k1?: number;
  b?: number;
}

/**
 * Okapi BM25 over the shared tokenizer.
 *
 * Exact administrative terms (`§12`, defined words) score through the inverse document
 * frequency; common words carry little weight.
 */
export class SparseIndex {
  readonly k1: number;
  readonly b: number;
  /** term -> chunkId -> term frequency */
  private readonly postings = new Map<string, Map<string, number>>();
  private readonly lengths = new Map<string, number>();
  private totalLength = 0;

  constructor(options: SparseIndexOptions = {}) {
    this.k1 = options.k1 ?? 1.5;
    this.b = options.b ?? 0.75;
  }

  add(chunkId: string, text: string): void {
    this.addTermFrequencies(chunkId, countTerms(tokenize(text)));
  }

  private addTermFrequencies(chunkId: string, frequencies: Map<string, number>): void {
    if (this.lengths.has(chunkId)) this.remove(chunkId);
    let length = 0;
    for (const [term, frequency] of frequencies) {
      let posting = this.postings.get(term);
      if (!posting) {
        posting = new Map();
        this.postings.set(term, posting);
      }
      posting.set(chunkId, frequency);
      length += frequency;
    }
    this.lengths.set(chunkId, length);
    this.totalLength += length;
  }

  remove(chunkId: string): void {
    const length = this.lengths.get(chunkId);
    if (length === undefined) return;
    for (const [term, posting] of this.postings) {
      if (posting.delete(chunkId) && posting.size === 0) this.postings.delete(term);
    }
    this.lengths.delete(chunkId);
    this.totalLength -= length;
  }

  /** Chunks with a positive score, best first; equal scores ordered by chunk id. */
  search(queryText: string, k: number): ScoredId[] {
    const documentCount = this.lengths.size;
    if (documentCount === 0 || k <= 0) return [];
    const averageLength = this.totalLength / documentCount;

    const scores = new Map<string, number>();
    for (const term of new Set(tokenize(queryText))) {
      const posting = this.postings.get(term);
      if (!posting) continue;
      const idf = Math.log(1 + (documentCount - posting.size + 0.5) / (posting.size + 0.5));
      for (const [chunkId, frequency] of posting) {
        const length = this.lengths.get(chunkId) ?? 0;
        const norm = averageLength > 0 ? 1 - this.b + (this.b * length) / averageLength : 1;
        const termScore = (idf * frequency * (this.k1 + 1)) / (frequency + this.k1 * norm);
        scores.set(chunkId, (scores.get(chunkId) ?? 0) + termScore);
      }
    }

    return [...scores]
      .filter(([, score]) => score > 0)
      .map(([chunkId, score]) => ({ chunkId, score }))
      .sort((a, b) => b.score - a.score || compareIds(a.chunkId, b.chunkId))
      .slice(0, k);
  }

  count(): number {
    return this.lengths.size;
  }

  termCount(): number {
    return this.postings.size;
  }

  clear(): void {
    this.postings.clear();
    this.lengths.clear();
    this.totalLength = 0;
  }

  toJSON(): SparseIndexState {
    const terms = new Map<string, Record<string, number>>();
    for (const chunkId of this.lengths.keys()) terms.set(chunkId, {});
    for (const [term, posting] of this.postings) {
      for (const [chunkId, frequency] of posting) {
        const entry = terms.get(chunkId);
        if (entry) entry[term] = frequency;
      }
    }
    return {
      k1: this.k1,
      b: this.b,
      entries: [...this.lengths].map(([chunkId, length]) => ({ chunkId, length, terms: terms.get(chunkId) ?? {} })),
    };
  }

  static fromJSON(state: SparseIndexState): SparseIndex {
    const index = new SparseIndex({ k1: state.k1, b: state.b });
    for (const entry of state.entries) {
      index.addTermFrequencies(entry.chunkId, new Map(Object.entries(entry.terms)));
    }
    return index;
  }
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);
  return counts;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
