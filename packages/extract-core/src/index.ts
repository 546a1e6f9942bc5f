export * from './types.js';
export * from './formats.js';
export * from './ocr.js';
export { extract, normalizeText, countMeaningfulChars, ExtractionOptionsSchema } from './extractor.js';
export type { ExtractDependencies, ExtractionOptions } from './extractor.js';
export { readPdfPages, renderPdfPages } from './pdf.js';
export { extractDocxText, extractSpreadsheetText } from './office.js';
