import { z } from 'zod';

export const ChunkMetadataSchema = z.object({
  /** Display name of the originating document. */
  source: z.string(),
  /** 1-based page on which the chunk starts, for paged formats. */
  page: z.number().int().positive().optional(),
  /** Original start position within the extracted document text. */
  startOffset: z.number().int().nonnegative(),
  /** Original end position (exclusive) within the extracted document text. */
  endOffset: z.number().int().nonnegative(),
  /** `window` when the text was cut by fixed-size splitting rather than at a marker. */
  strategy: z.enum(['structural', 'window']),
});

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

/**
 * The unit of retrieval: a bounded span of one document's text.
 */
export const ChunkSchema = z.object({
  /** `<documentId>::chunk_<sequenceIndex>` */
  id: z.string(),
  documentId: z.string(),
  text: z.string().min(1),
  /** Section, paragraph and clause labels, e.g. `['§ 5', 'Abs. 2']`. Empty for whole-document window splitting. */
  structuralPath: z.array(z.string()),
  /** Position within the document, starting at 0. */
  sequenceIndex: z.number().int().nonnegative(),
  ocrDerived: z.boolean(),
  metadata: ChunkMetadataSchema,
});

export type Chunk = z.infer<typeof ChunkSchema>;

export interface ScoredId {
  chunkId: string;
  score: number;
}
