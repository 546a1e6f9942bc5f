import { type Index as PineconeIndex, Pinecone } from '@pinecone-database/pinecone';
import { ChromaClient, type Collection, IncludeEnum } from 'chromadb';
import { z } from 'zod';
import type { EmbeddingVector, IEmbeddingFunction } from './embedding.js';
import type { ScoredId } from './types.js';

export enum VectorDbProvider {
  InMemory = 'in-memory',
  Pinecone = 'pinecone',
  ChromaDB = 'chromadb',
}

const InMemoryConfigSchema = z.object({
  provider: z.literal(VectorDbProvider.InMemory),
});

const PineconeConfigSchema = z.object({
  provider: z.literal(VectorDbProvider.Pinecone),
  apiKey: z.string().min(1, 'Pinecone API key is required'),
  indexName: z.string().min(1, 'Pinecone index name is required'),
  namespace: z.string().optional(),
});

const ChromaDBConfigSchema = z.object({
  provider: z.literal(VectorDbProvider.ChromaDB),
  path: z.string().optional(),
  collectionName: z.string().default('civic_rag_chunks'),
});

export const VectorDbConfigSchema = z.discriminatedUnion('provider', [
  InMemoryConfigSchema,
  PineconeConfigSchema,
  ChromaDBConfigSchema,
]);

export type VectorDbConfig = z.infer<typeof VectorDbConfigSchema>;

export interface DenseEntry {
  chunkId: string;
  vector: EmbeddingVector;
}

const PINECONE_UPSERT_BATCH = 100; // Pinecone recommended batch size

export function cosineSimilarity(vecA: number[], vecB: number[]): number {
  if (vecA.length !== vecB.length || vecA.length === 0) {
    return 0;
  }
  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;
  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    magnitudeA += vecA[i] * vecA[i];
    magnitudeB += vecB[i] * vecB[i];
  }
  magnitudeA = Math.sqrt(magnitudeA);
  magnitudeB = Math.sqrt(magnitudeB);
  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }
  return dotProduct / (magnitudeA * magnitudeB);
}

/**
 * Nearest-neighbour index over chunk embeddings, scored by cosine similarity.
 *
 * The in-memory store belongs to the instance, so several indexes can live side by side.
 * Remote providers keep the vectors in their own store.
 */
export class DenseIndex {
  private readonly config: VectorDbConfig;
  private readonly store = new Map<string, EmbeddingVector>();
  private chromaCollection: Collection | null = null;
  private pineconeIndex: PineconeIndex | null = null;
  private dimensionValue: number | null = null;

  private constructor(config: VectorDbConfig) {
    this.config = config;
  }

  public static async create(config: VectorDbConfig, embeddingFn?: IEmbeddingFunction): Promise<DenseIndex> {
    const index = new DenseIndex(config);
    await index.initialize(embeddingFn);
    return index;
  }

  private async initialize(embeddingFn?: IEmbeddingFunction): Promise<void> {
    try {
      switch (this.config.provider) {
        case VectorDbProvider.InMemory:
          break;
        case VectorDbProvider.Pinecone: {
          const client = new Pinecone({ apiKey: this.config.apiKey });
          this.pineconeIndex = client.index(this.config.indexName);
          break;
        }
        case VectorDbProvider.ChromaDB: {
          if (!embeddingFn) {
            throw new Error('ChromaDB provider requires an embedding function to be provided during DenseIndex creation.');
          }
          const client = new ChromaClient(this.config.path ? { path: this.config.path } : {});
          this.chromaCollection = await client.getOrCreateCollection({
            name: this.config.collectionName,
            embeddingFunction: embeddingFn,
            metadata: { 'hnsw:space': 'cosine' },
          });
          break;
        }
        default: {
          const exhaustiveCheck: never = this.config;
          throw new Error(`Unhandled vector DB provider during initialization: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (error) {
      throw new Error(`DenseIndex initialization failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    console.log(`[DenseIndex] Ready (provider: ${this.config.provider}).`);
  }

  get provider(): VectorDbProvider {
    return this.config.provider;
  }

  /** Fixed by the first vector inserted; `null` while nothing has been added. */
  get dimension(): number | null {
    return this.dimensionValue;
  }

  private checkDimension(vector: EmbeddingVector): void {
    if (vector.length === 0) {
      throw new Error('Vector must not be empty.');
    }
    if (this.dimensionValue === null) {
      this.dimensionValue = vector.length;
    } else if (vector.length !== this.dimensionValue) {
      throw new Error(`Vector dimension mismatch: expected ${this.dimensionValue}, got ${vector.length}.`);
    }
  }

  private pineconeNamespace() {
    if (!this.pineconeIndex || this.config.provider !== VectorDbProvider.Pinecone) {
      throw new Error('Pinecone index not initialized.');
    }
    return this.pineconeIndex.namespace(this.config.namespace || '');
  }

  private collection(): Collection {
    if (!this.chromaCollection) throw new Error('ChromaDB collection not initialized.');
    return this.chromaCollection;
  }

  async add(chunkId: string, vector: EmbeddingVector): Promise<void> {
    await this.addMany([{ chunkId, vector }]);
  }

  async addMany(entries: DenseEntry[]): Promise<void> {
    if (entries.length === 0) return;
    for (const entry of entries) this.checkDimension(entry.vector);
    try {
      switch (this.config.provider) {
        case VectorDbProvider.InMemory:
          for (const entry of entries) {
            this.store.set(entry.chunkId, entry.vector);
          }
          break;
        case VectorDbProvider.Pinecone: {
          const ns = this.pineconeNamespace();
          for (let i = 0; i < entries.length; i += PINECONE_UPSERT_BATCH) {
            const batch = entries.slice(i, i + PINECONE_UPSERT_BATCH);
            await ns.upsert(batch.map((entry) => ({ id: entry.chunkId, values: entry.vector })));
          }
          break;
        }
        case VectorDbProvider.ChromaDB:
          await this.collection().upsert({
            ids: entries.map((entry) => entry.chunkId),
            embeddings: entries.map((entry) => entry.vector),
          });
          break;
        default: {
          const exhaustiveCheck: never = this.config;
          throw new Error(`Unsupported vector DB provider: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (error) {
      throw new Error(`Upsert failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** The `k` most similar chunks, best first. Never modifies the index. */
  async search(queryVector: EmbeddingVector, k: number): Promise<ScoredId[]> {
    if (k <= 0) return [];
    if (this.dimensionValue !== null && queryVector.length !== this.dimensionValue) {
      throw new Error(`Query vector dimension mismatch: expected ${this.dimensionValue}, got ${queryVector.length}.`);
    }
    try {
      switch (this.config.provider) {
        case VectorDbProvider.InMemory: {
          const results: ScoredId[] = [];
          for (const [chunkId, vector] of this.store) {
            results.push({ chunkId, score: cosineSimilarity(queryVector, vector) });
          }
          results.sort((a, b) => b.score - a.score || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0));
          return results.slice(0, k);
        }
        case VectorDbProvider.Pinecone: {
          const response = await this.pineconeNamespace().query({ vector: queryVector, topK: k });
          return (response.matches || []).map((match) => ({ chunkId: match.id, score: match.score ?? 0 }));
        }
        case VectorDbProvider.ChromaDB: {
          const response = await this.collection().query({
            queryEmbeddings: [queryVector],
            nResults: k,
            include: [IncludeEnum.Distances],
          });
          const ids = response.ids[0] ?? [];
          const distances = response.distances?.[0] ?? [];
          return ids.map((chunkId, i) => {
            const distance = distances[i];
            // Cosine space: distance = 1 - similarity.
            return { chunkId, score: typeof distance === 'number' ? 1 - distance : 0 };
          });
        }
        default: {
          const exhaustiveCheck: never = this.config;
          throw new Error(`Unsupported vector DB provider: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (error) {
      throw new Error(`Query failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async count(): Promise<number> {
    switch (this.config.provider) {
      case VectorDbProvider.InMemory:
        return this.store.size;
      case VectorDbProvider.Pinecone: {
        const stats = await this.pineconeNamespace().describeIndexStats();
        return stats.namespaces?.[this.config.namespace || '']?.recordCount ?? 0;
      }
      case VectorDbProvider.ChromaDB:
        return this.collection().count();
      default: {
        const exhaustiveCheck: never = this.config;
        throw new Error(`Unsupported vector DB provider: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  }

  async clear(): Promise<void> {
    try {
      switch (this.config.provider) {
        case VectorDbProvider.InMemory:
          this.store.clear();
          break;
        case VectorDbProvider.Pinecone:
          await this.pineconeNamespace().deleteAll();
          break;
        case VectorDbProvider.ChromaDB: {
          const { ids } = await this.collection().get({ limit: 1000000 });
          if (ids.length > 0) await this.collection().delete({ ids });
          break;
        }
        default: {
          const exhaustiveCheck: never = this.config;
          throw new Error(`Unsupported vector DB provider: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (error) {
      throw new Error(`Clear failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    this.dimensionValue = null;
  }

  /** All vectors for snapshotting, or `null` when they live in a remote store. */
  exportVectors(): DenseEntry[] | null {
    if (this.config.provider !== VectorDbProvider.InMemory) return null;
    return [...this.store].map(([chunkId, vector]) => ({ chunkId, vector }));
  }
}
