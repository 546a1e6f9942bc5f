import path from 'node:path';
import { UnsupportedFormat } from '@civic-rag/core';
import { type DocumentFormat, SUPPORTED_FORMATS } from './types.js';

export function isSupportedFormat(format: string): format is DocumentFormat {
  return SUPPORTED_FORMATS.some((supported) => supported === format);
}

export function assertSupportedFormat(format: string, source?: string): DocumentFormat {
  const normalized = format.trim().toLowerCase().replace(/^\./, '');
  if (!isSupportedFormat(normalized)) {
    throw new UnsupportedFormat(normalized || format, source);
  }
  return normalized;
}

/** Derives the format tag from a file name, rejecting anything outside the supported set. */
export function formatFromFileName(fileName: string): DocumentFormat {
  const extension = path.extname(fileName);
  if (!extension) {
    throw new UnsupportedFormat('(none)', fileName);
  }
  return assertSupportedFormat(extension, fileName);
}
