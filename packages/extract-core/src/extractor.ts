import { CapabilityTimeout, ExtractionFailure, withTimeout } from '@civic-rag/core';
import { z } from 'zod';
import { extractDocxText, extractSpreadsheetText } from './office.js';
import type { OcrFunction } from './ocr.js';
import { readPdfPages, renderPdfPages } from './pdf.js';
import type { ExtractionResult, SourceDocument } from './types.js';

export const ExtractionOptionsSchema = z.object({
  /** Below this many non-whitespace characters the direct text layer counts as unusable. */
  minDirectTextChars: z.number().int().nonnegative().default(20),
  /** Render zoom for OCR page images. */
  ocrScale: z.number().positive().default(2),
  ocrTimeoutMs: z.number().int().positive().default(60_000),
});

export type ExtractionOptions = z.infer<typeof ExtractionOptionsSchema>;

export interface ExtractDependencies {
  /** `null` disables the recognition fallback. */
  ocr: OcrFunction | null;
  options?: Partial<ExtractionOptions>;
}

interface PagedText {
  pages: string[];
}

export function countMeaningfulChars(text: string): number {
  return text.replace(/\s+/g, '').length;
}

/** Line endings unified, trailing blanks removed, blank runs collapsed to one empty line. */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function joinPages(pages: string[]): { text: string; pageOffsets: number[] } {
  const pageOffsets: number[] = [];
  let text = '';
  for (const page of pages) {
    if (text !== '') text += '\n\n';
    pageOffsets.push(text.length);
    text += normalizeText(page);
  }
  return { text, pageOffsets: pageOffsets.length > 0 ? pageOffsets : [0] };
}

function isUsable({ pages }: PagedText, minChars: number): boolean {
  const pagesWithText = pages.filter((page) => countMeaningfulChars(page) > 0).length;
  if (pagesWithText === 0) return false;
  const totalChars = pages.reduce((sum, page) => sum + countMeaningfulChars(page), 0);
  return totalChars >= minChars;
}

async function readDirect(document: SourceDocument): Promise<PagedText> {
  switch (document.format) {
    case 'pdf':
      return { pages: readPdfPages(document.bytes) };
    case 'docx':
      return { pages: [await extractDocxText(document.bytes)] };
    case 'xlsx':
    case 'xlsm':
      return { pages: [await extractSpreadsheetText(document.bytes)] };
    default: {
      const exhaustiveCheck: never = document.format;
      throw new Error(`Unhandled document format: ${String(exhaustiveCheck)}`);
    }
  }
}

async function recognizePages(
  document: SourceDocument,
  ocr: OcrFunction,
  options: ExtractionOptions,
): Promise<PagedText> {
  const images = renderPdfPages(document.bytes, options.ocrScale);
  const pages: string[] = [];
  // Pages go one at a time; recognition services rarely take parallel load well.
  for (const image of images) {
    const text = await withTimeout(
      (signal) => ocr.recognize(image, signal),
      options.ocrTimeoutMs,
      () => new CapabilityTimeout('OCR', options.ocrTimeoutMs),
    );
    pages.push(text);
  }
  return { pages };
}

/**
 * Turns a raw document into plain text.
 *
 * The embedded text layer is read first. When it is unusable (no page carries text, or fewer
 * than `minDirectTextChars` non-whitespace characters overall) a PDF is rendered page by page
 * and passed through optical recognition, and the result is marked `ocr`. Recognised text that
 * is itself empty leaves the direct text in place if there was any.
 *
 * @throws ExtractionFailure when neither path yields any text.
 */
export async function extract(
  document: SourceDocument,
  dependencies: ExtractDependencies,
): Promise<ExtractionResult> {
  const options = ExtractionOptionsSchema.parse(dependencies.options ?? {});

  let direct: PagedText;
  try {
    direct = await readDirect(document);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionFailure(document.id, `could not read ${document.format}: ${reason}`, error);
  }

  if (isUsable(direct, options.minDirectTextChars)) {
    return { ...joinPages(direct.pages), status: 'digital' };
  }

  const directHasText = direct.pages.some((page) => countMeaningfulChars(page) > 0);

  if (document.format === 'pdf' && dependencies.ocr) {
    console.log(`[Extractor] Direct text of '${document.id}' is unusable, falling back to OCR.`);
    let recognized: PagedText;
    try {
      recognized = await recognizePages(document, dependencies.ocr, options);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionFailure(document.id, `OCR failed: ${reason}`, error);
    }
    if (recognized.pages.some((page) => countMeaningfulChars(page) > 0)) {
      return { ...joinPages(recognized.pages), status: 'ocr' };
    }
    console.warn(`[Extractor] OCR produced no text for '${document.id}'.`);
  }

  if (directHasText) {
    console.warn(`[Extractor] Keeping sparse direct text of '${document.id}'.`);
    return { ...joinPages(direct.pages), status: 'digital' };
  }

  throw new ExtractionFailure(
    document.id,
    document.format === 'pdf' && !dependencies.ocr
      ? 'no embedded text and OCR is disabled'
      : 'no usable text found',
  );
}
