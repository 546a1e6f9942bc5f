import { z } from 'zod';

export const indexStatusToolInputSchema = z.object({});

export const IndexStatusSchema = z.object({
  documents: z.number().int().nonnegative(),
  chunks: z.number().int().nonnegative(),
  denseVectors: z.number().int().nonnegative(),
  sparseTerms: z.number().int().nonnegative(),
  embeddingDimension: z.number().int().positive().nullable(),
});
