import { defineTool, jsonPart, textPart } from '@civic-rag/core';
import type { Part } from '@civic-rag/core';
import type { z } from 'zod';
import type { RetrievalResult } from '../hybridRetriever.js';
import { sourceLine } from '../prompt.js';
import { RagToolContextSchema } from './context.js';
import { RetrievalPreviewSchema, retrieveToolInputSchema } from './retrieveTool.schema.js';

export type RetrieveToolInput = z.infer<typeof retrieveToolInputSchema>;
export type RetrievalPreview = z.infer<typeof RetrievalPreviewSchema>;

export function toRetrievalPreview(result: RetrievalResult): RetrievalPreview {
  return {
    query: result.query,
    k: result.k,
    passages: result.hits.map(({ chunk, score, denseScore, sparseScore }) => ({
      chunkId: chunk.id,
      documentId: chunk.documentId,
      source: sourceLine(chunk),
      score,
      denseScore,
      sparseScore,
      ocrDerived: chunk.ocrDerived,
      text: chunk.text,
    })),
  };
}

/**
 * Ranked passages for a query without generating an answer. Useful for checking what the
 * answer generator would see.
 */
export const retrieveTool = defineTool({
  name: 'retrieve',
  description: 'Returns the passages that best match a query, with fused, dense and sparse scores.',
  inputSchema: retrieveToolInputSchema,
  contextSchema: RagToolContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const preview = toRetrievalPreview(await context.pipeline.retrieve(args.query, args.topK));
    if (preview.passages.length === 0) {
      return [textPart('No relevant passages found in the index.'), jsonPart(preview, RetrievalPreviewSchema)];
    }

    const parts: Part[] = [textPart(`Found ${preview.passages.length} passages for "${preview.query}":`)];
    preview.passages.forEach((passage, index) => {
      parts.push(
        textPart(
          `--- Result ${index + 1} (score ${passage.score.toFixed(4)}, dense ${passage.denseScore.toFixed(4)}, ` +
            `sparse ${passage.sparseScore.toFixed(4)}) ---\n` +
            `Source: ${passage.source} [[${passage.chunkId}]]${passage.ocrDerived ? ' (OCR)' : ''}\n${passage.text}`,
        ),
      );
    });
    parts.push(jsonPart(preview, RetrievalPreviewSchema));
    return parts;
  },
});
