import { z } from 'zod';

export const retrieveToolInputSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  topK: z.number().int().positive().optional(),
});

export const RetrievedPassageSchema = z.object({
  chunkId: z.string(),
  documentId: z.string(),
  source: z.string(),
  score: z.number(),
  denseScore: z.number(),
  sparseScore: z.number(),
  ocrDerived: z.boolean(),
  text: z.string(),
});

export const RetrievalPreviewSchema = z.object({
  query: z.string(),
  k: z.number().int().nonnegative(),
  passages: z.array(RetrievedPassageSchema),
});
