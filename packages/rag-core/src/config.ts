import { ExtractionOptionsSchema, OcrConfigSchema, defaultOcrConfig } from '@civic-rag/extract-core';
import { z } from 'zod';
import { GenerationOptionsSchema } from './answerGenerator.js';
import { ChunkingOptionsSchema } from './chunking.js';
import { CompletionConfigSchema, defaultCompletionConfig } from './completion.js';
import { VectorDbConfigSchema, VectorDbProvider } from './denseIndex.js';
import { EmbeddingModelConfigSchema, defaultEmbeddingConfig } from './embedding.js';
import { RetrievalOptionsSchema } from './hybridRetriever.js';

export const RagConfigSchema = z.object({
  embedding: EmbeddingModelConfigSchema.default(defaultEmbeddingConfig),
  completion: CompletionConfigSchema.default(defaultCompletionConfig),
  ocr: OcrConfigSchema.default(defaultOcrConfig),
  vectorDb: VectorDbConfigSchema.default({ provider: VectorDbProvider.InMemory }),
  chunking: ChunkingOptionsSchema.default({}),
  retrieval: RetrievalOptionsSchema.default({}),
  generation: GenerationOptionsSchema.default({}),
  extraction: ExtractionOptionsSchema.default({}),
  /** Bound on each embedding call, at build and at query time. */
  embeddingTimeoutMs: z.number().int().positive().default(30_000),
  /** Documents extracted and segmented at the same time during a build. */
  buildConcurrency: z.number().int().positive().default(4),
});

export type RagConfig = z.infer<typeof RagConfigSchema>;
export type RagConfigInput = z.input<typeof RagConfigSchema>;

/**
 * Validates partial configuration and fills in defaults.
 * @throws Error listing every invalid field.
 */
export function parseRagConfig(input: unknown = {}): RagConfig {
  const parsed = RagConfigSchema.safeParse(input);
  if (!parsed.success) {
    const errorMessages = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${errorMessages}`);
  }
  return parsed.data;
}
