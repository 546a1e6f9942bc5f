import type { ToolError } from './index.js';

export type RagErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILURE'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_FAULT'
  | 'CAPABILITY_TIMEOUT'
  | 'SNAPSHOT_INVALID';

interface RagErrorOptions {
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base class of every failure the pipeline reports on purpose.
 * `code` is stable and safe to branch on; `suggestion` is meant for the person running the tool.
 */
export class RagError extends Error {
  readonly code: RagErrorCode;
  readonly suggestion?: string;

  constructor(code: RagErrorCode, message: string, options: RagErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.suggestion = options.suggestion;
  }
}

/** Rejected at the ingestion boundary, before extraction runs. */
export class UnsupportedFormat extends RagError {
  readonly format: string;

  constructor(format: string, source?: string) {
    super(
      'UNSUPPORTED_FORMAT',
      `Unsupported document format '${format}'${source ? ` for '${source}'` : ''}.`,
      { suggestion: 'Supported formats are pdf, docx, xlsx and xlsm.' },
    );
    this.format = format;
  }
}

/** Neither direct extraction nor optical recognition produced usable text. */
export class ExtractionFailure extends RagError {
  readonly documentId: string;

  constructor(documentId: string, reason: string, cause?: unknown) {
    super('EXTRACTION_FAILURE', `Extraction failed for document '${documentId}': ${reason}`, {
      suggestion: 'Check that the file is not corrupted and that OCR is configured for scanned documents.',
      cause,
    });
    this.documentId = documentId;
  }
}

export class GenerationTimeout extends RagError {
  constructor(timeoutMs: number) {
    super('GENERATION_TIMEOUT', `Answer generation timed out after ${timeoutMs} ms.`, {
      suggestion: 'Retry the question or raise the generation timeout.',
    });
  }
}

export class GenerationFault extends RagError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FAULT', `Answer generation failed: ${message}`, {
      suggestion: 'Check the completion provider configuration and endpoint.',
      cause,
    });
  }
}

/** An embedding or OCR call exceeded its time budget. */
export class CapabilityTimeout extends RagError {
  readonly capability: string;

  constructor(capability: string, timeoutMs: number) {
    super('CAPABILITY_TIMEOUT', `${capability} call timed out after ${timeoutMs} ms.`, {
      suggestion: `Check that the ${capability} provider is reachable or raise its timeout.`,
    });
    this.capability = capability;
  }
}

export class SnapshotInvalid extends RagError {
  constructor(reason: string, cause?: unknown) {
    super('SNAPSHOT_INVALID', `Index snapshot is invalid: ${reason}`, {
      suggestion: 'Rebuild the index from the source documents.',
      cause,
    });
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

/** Flattens any thrown value into the `{ message, suggestion }` shape tools report. */
export function toToolError(error: unknown): ToolError {
  if (error instanceof RagError) {
    return { message: error.message, suggestion: error.suggestion };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}
