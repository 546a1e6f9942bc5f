import { defineTool, jsonPart, textPart } from '@civic-rag/core';
import type { Part } from '@civic-rag/core';
import { RagToolContextSchema } from './context.js';
import { IndexStatusSchema, indexStatusToolInputSchema } from './indexStatusTool.schema.js';

export const indexStatusTool = defineTool({
  name: 'indexStatus',
  description: 'Gets the status of the knowledge base (documents, chunks, vectors and terms).',
  inputSchema: indexStatusToolInputSchema,
  contextSchema: RagToolContextSchema,

  execute: async ({ context }): Promise<Part[]> => {
    const status = await context.pipeline.status();
    const text =
      status.chunks === 0
        ? 'The index is empty.'
        : `Index contains ${status.chunks} chunks from ${status.documents} documents ` +
          `(${status.denseVectors} vectors, ${status.sparseTerms} terms).`;
    return [textPart(text), jsonPart(status, IndexStatusSchema)];
  },
});
