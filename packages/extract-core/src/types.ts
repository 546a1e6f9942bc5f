export const SUPPORTED_FORMATS = ['pdf', 'docx', 'xlsx', 'xlsm'] as const;

export type DocumentFormat = (typeof SUPPORTED_FORMATS)[number];

/**
 * A raw document as handed over by ingestion.
 */
export interface SourceDocument {
  /** Unique identifier, usually the path relative to the corpus root. */
  id: string;
  format: DocumentFormat;
  bytes: Uint8Array;
  /** Display name used in source references. Defaults to the id. */
  source?: string;
}

export type ExtractionStatus = 'digital' | 'ocr';

export interface ExtractionResult {
  text: string;
  status: ExtractionStatus;
  /** Character offset at which each page starts in `text`. `[0]` for formats without pages. */
  pageOffsets: number[];
}
