import { z } from 'zod';
import { BuildReportSchema } from '../pipeline.js';

export const buildIndexToolInputSchema = z.object({
  folder: z.string().min(1, 'folder is required'),
});

export const BuildIndexResultSchema = z.object({
  report: BuildReportSchema,
  /** Files found in the folder that were not handed to the build. */
  rejected: z.array(z.object({ path: z.string(), reason: z.string() })),
});
