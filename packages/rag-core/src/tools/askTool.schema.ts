import { z } from 'zod';

export const askToolInputSchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  topK: z.number().int().positive().optional(),
});
