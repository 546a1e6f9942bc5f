import { embedMany } from 'ai';
import type { IEmbeddingFunction as ChromaIEmbeddingFunction } from 'chromadb';
import { fetch } from 'node-fetch-native';
import { createOllama } from 'ollama-ai-provider';
import { z } from 'zod';

/**
 * The embedding capability: texts in, one fixed-dimension vector per text out.
 * Aborting `signal` cancels the underlying request.
 */
export interface IEmbeddingFunction extends ChromaIEmbeddingFunction {
  generate(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export type EmbeddingVector = number[];

export enum EmbeddingModelProvider {
  Mock = 'mock', // For testing
  Ollama = 'ollama',
  Http = 'http',
}

const MockConfigSchema = z.object({
  provider: z.literal(EmbeddingModelProvider.Mock),
  mockDimension: z.number().int().positive().default(256),
  batchSize: z.number().int().positive().default(32),
});

const OllamaConfigSchema = z.object({
  provider: z.literal(EmbeddingModelProvider.Ollama),
  modelName: z.string().default('nomic-embed-text'),
  baseURL: z.string().url().optional(),
  batchSize: z.number().int().positive().default(50),
});

const HttpConfigSchema = z.object({
  provider: z.literal(EmbeddingModelProvider.Http),
  url: z.string().url('A valid URL for the embedding endpoint is required'),
  headers: z.record(z.string()).optional(),
  batchSize: z.number().int().positive().default(100),
});

export const EmbeddingModelConfigSchema = z.discriminatedUnion('provider', [
  MockConfigSchema,
  OllamaConfigSchema,
  HttpConfigSchema,
]);

export type EmbeddingModelConfig = z.infer<typeof EmbeddingModelConfigSchema>;

export const defaultEmbeddingConfig: EmbeddingModelConfig = {
  provider: EmbeddingModelProvider.Mock,
  mockDimension: 256,
  batchSize: 32,
};

// --- Embedding Function Implementations ---

/**
 * Deterministic stand-in: hashes character trigrams of each word into `dimension` buckets
 * and L2-normalises. Texts sharing words land close together, identical texts identically.
 */
export class MockEmbeddingFunction implements IEmbeddingFunction {
  constructor(private readonly dimension = 256) {}

  public async generate(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const word of text.toLowerCase().match(/[\p{L}\p{N}§]+/gu) ?? []) {
      const padded = ` ${word} `;
      for (let i = 0; i + 3 <= padded.length; i++) {
        vector[fnv1a(padded.slice(i, i + 3)) % this.dimension] += 1;
      }
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// Ollama Implementation (using Vercel AI SDK)
export class OllamaEmbeddingFunction implements IEmbeddingFunction {
  private ollamaInstance: ReturnType<typeof createOllama>;
  private modelId: string;

  constructor(modelName: string, baseURL?: string) {
    this.ollamaInstance = createOllama({ baseURL });
    this.modelId = modelName;
    console.log(`[OllamaEmbeddingFunction] Initialized for model: ${this.modelId}, BaseURL: ${baseURL || 'default'}`);
  }

  public async generate(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const { embeddings } = await embedMany({
        model: this.ollamaInstance.embedding(this.modelId),
        values: texts,
        abortSignal: signal,
      });
      if (embeddings.length !== texts.length) {
        throw new Error(`Ollama embedding count mismatch: expected ${texts.length}, got ${embeddings.length}`);
      }
      return embeddings;
    } catch (error) {
      console.error(`[OllamaEmbeddingFunction] Generation failed for model ${this.modelId}:`, error);
      throw error;
    }
  }
}

const HttpEmbeddingResponseSchema = z.object({ embeddings: z.array(z.array(z.number())) });

// Http Implementation: POST { texts } -> { embeddings }
export class HttpEmbeddingFunction implements IEmbeddingFunction {
  private url: string;
  private headers: Record<string, string>;
  private batchSize: number;

  constructor(url: string, headers?: Record<string, string>, batchSize = 100) {
    this.url = url;
    this.headers = headers || {};
    this.batchSize = batchSize;
    console.log(`[HttpEmbeddingFunction] Initialized for URL: ${this.url}, Batch Size: ${this.batchSize}`);
  }

  public async generate(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const allEmbeddings: number[][] = [];
    const headers = {
      'Content-Type': 'application/json',
      ...this.headers,
    };

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batchTexts = texts.slice(i, i + this.batchSize);
      try {
        const response = await fetch(this.url, {
          method: 'POST',
          headers,
          body: JSON.stringify({ texts: batchTexts }),
          signal,
        });

        if (!response.ok) {
          const errorBody = await response.text();
          throw new Error(`HTTP error ${response.status}: ${response.statusText}. Body: ${errorBody}`);
        }

        const parsed = HttpEmbeddingResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new Error('Invalid response format from embedding API. Expected { "embeddings": [...] }.');
        }
        if (parsed.data.embeddings.length !== batchTexts.length) {
          throw new Error(
            `HTTP embedding count mismatch: expected ${batchTexts.length}, got ${parsed.data.embeddings.length}`,
          );
        }
        allEmbeddings.push(...parsed.data.embeddings);
      } catch (error) {
        console.error(`[HttpEmbeddingFunction] Batch starting at index ${i} failed:`, error);
        throw new Error(`HTTP embedding generation failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return allEmbeddings;
  }
}

export function createEmbeddingFunction(config: EmbeddingModelConfig): IEmbeddingFunction {
  switch (config.provider) {
    case EmbeddingModelProvider.Mock:
      return new MockEmbeddingFunction(config.mockDimension);
    case EmbeddingModelProvider.Ollama:
      return new OllamaEmbeddingFunction(config.modelName, config.baseURL);
    case EmbeddingModelProvider.Http:
      return new HttpEmbeddingFunction(config.url, config.headers, config.batchSize);
    default: {
      const exhaustiveCheck: never = config;
      throw new Error(`Unhandled embedding provider: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

/** Single-text form of the capability. */
export async function embed(
  embeddingFn: IEmbeddingFunction,
  text: string,
  signal?: AbortSignal,
): Promise<EmbeddingVector> {
  const [vector] = await embeddingFn.generate([text], signal);
  if (!vector) {
    throw new Error('Embedding generation returned no results.');
  }
  return vector;
}
