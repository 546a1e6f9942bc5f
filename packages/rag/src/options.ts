import { OcrProvider } from '@civic-rag/extract-core';
import {
  CompletionProvider,
  EmbeddingModelProvider,
  type RagConfigInput,
  VectorDbProvider,
} from '@civic-rag/rag-core';
import { z } from 'zod';

/** Provider and tuning flags shared by every command. */
export interface ProviderOptions {
  embeddingProvider: EmbeddingModelProvider;
  ollamaModel?: string;
  ollamaBaseUrl?: string;
  httpEmbeddingUrl?: string;
  httpEmbeddingHeaders?: string;
  completionProvider: CompletionProvider;
  completionModel?: string;
  completionBaseUrl?: string;
  completionApiKey?: string;
  ocrProvider: OcrProvider;
  ocrUrl?: string;
  dbProvider: VectorDbProvider;
  collectionName?: string;
  chromaPath?: string;
  pineconeApiKey?: string;
  pineconeIndexName?: string;
  pineconeNamespace?: string;
  denseWeight?: number;
  sparseWeight?: number;
  chunkSize?: number;
  chunkOverlap?: number;
  citationPolicy?: 'strip' | 'reject';
  generationTimeout?: number;
}

const HeadersSchema = z.record(z.string());

/** Parses a JSON object of header values; anything else is ignored with a warning. */
export function parseHeaders(json: string | undefined): Record<string, string> | undefined {
  if (!json) return undefined;
  try {
    const parsed = HeadersSchema.safeParse(JSON.parse(json));
    if (parsed.success) return parsed.data;
    console.warn('Ignoring HTTP embedding headers: expected a JSON object of strings.');
  } catch (e) {
    console.warn('Failed to parse HTTP embedding headers JSON:', e);
  }
  return undefined;
}

function embeddingConfig(options: ProviderOptions): RagConfigInput['embedding'] {
  switch (options.embeddingProvider) {
    case EmbeddingModelProvider.Mock:
      return { provider: EmbeddingModelProvider.Mock };
    case EmbeddingModelProvider.Ollama:
      return {
        provider: EmbeddingModelProvider.Ollama,
        modelName: options.ollamaModel,
        baseURL: options.ollamaBaseUrl,
      };
    case EmbeddingModelProvider.Http:
      return {
        provider: EmbeddingModelProvider.Http,
        url: options.httpEmbeddingUrl ?? '',
        headers: parseHeaders(options.httpEmbeddingHeaders),
      };
    default: {
      const exhaustiveCheck: never = options.embeddingProvider;
      throw new Error(`Unsupported embedding provider: ${String(exhaustiveCheck)}`);
    }
  }
}

function completionConfig(options: ProviderOptions): RagConfigInput['completion'] {
  switch (options.completionProvider) {
    case CompletionProvider.Mock:
      return { provider: CompletionProvider.Mock };
    case CompletionProvider.Ollama:
      return {
        provider: CompletionProvider.Ollama,
        modelName: options.completionModel,
        baseURL: options.completionBaseUrl,
      };
    case CompletionProvider.Http:
      return {
        provider: CompletionProvider.Http,
        baseURL: options.completionBaseUrl ?? '',
        modelName: options.completionModel ?? '',
        apiKey: options.completionApiKey,
      };
    default: {
      const exhaustiveCheck: never = options.completionProvider;
      throw new Error(`Unsupported completion provider: ${String(exhaustiveCheck)}`);
    }
  }
}

function ocrConfig(options: ProviderOptions): RagConfigInput['ocr'] {
  switch (options.ocrProvider) {
    case OcrProvider.None:
      return { provider: OcrProvider.None };
    case OcrProvider.Mock:
      return { provider: OcrProvider.Mock };
    case OcrProvider.Http:
      return { provider: OcrProvider.Http, url: options.ocrUrl ?? '' };
    default: {
      const exhaustiveCheck: never = options.ocrProvider;
      throw new Error(`Unsupported OCR provider: ${String(exhaustiveCheck)}`);
    }
  }
}

function vectorDbConfig(options: ProviderOptions): RagConfigInput['vectorDb'] {
  switch (options.dbProvider) {
    case VectorDbProvider.InMemory:
      return { provider: VectorDbProvider.InMemory };
    case VectorDbProvider.ChromaDB:
      return {
        provider: VectorDbProvider.ChromaDB,
        path: options.chromaPath,
        collectionName: options.collectionName,
      };
    case VectorDbProvider.Pinecone:
      return {
        provider: VectorDbProvider.Pinecone,
        apiKey: options.pineconeApiKey ?? '',
        indexName: options.pineconeIndexName ?? '',
        namespace: options.pineconeNamespace,
      };
    default: {
      const exhaustiveCheck: never = options.dbProvider;
      throw new Error(`Unsupported vector DB provider: ${String(exhaustiveCheck)}`);
    }
  }
}

/**
 * Maps command line flags onto pipeline configuration. Values left out fall back to the
 * schema defaults when the pipeline validates the result.
 */
export function toRagConfigInput(options: ProviderOptions): RagConfigInput {
  return {
    embedding: embeddingConfig(options),
    completion: completionConfig(options),
    ocr: ocrConfig(options),
    vectorDb: vectorDbConfig(options),
    retrieval: { weights: { dense: options.denseWeight, sparse: options.sparseWeight } },
    chunking: { maxChunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap },
    generation: { citationPolicy: options.citationPolicy, timeoutMs: options.generationTimeout },
  };
}
