import { BaseContextSchema } from '@civic-rag/core';
import { z } from 'zod';
import { RagPipeline } from '../pipeline.js';

/** Context of the RAG tools: the workspace plus the pipeline they operate on. */
export const RagToolContextSchema = BaseContextSchema.extend({
  pipeline: z.custom<RagPipeline>((value) => value instanceof RagPipeline, {
    message: 'pipeline must be a RagPipeline instance',
  }),
});

export type RagToolContext = z.infer<typeof RagToolContextSchema>;
