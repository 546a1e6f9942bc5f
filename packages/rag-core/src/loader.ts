import fs from 'node:fs/promises';
import path from 'node:path';
import { isRagError } from '@civic-rag/core';
import { type SourceDocument, formatFromFileName } from '@civic-rag/extract-core';
import fg from 'fast-glob';

const DEFAULT_IGNORES = ['**/node_modules/**', '**/.git/**', '**/dist/**'];

export interface RejectedFile {
  path: string;
  reason: string;
}

export interface LoadResult {
  documents: SourceDocument[];
  rejected: RejectedFile[];
}

/**
 * Loads every supported document below `root`. Document ids are paths relative to `root`,
 * with forward slashes, so ids stay stable between machines.
 */
export async function loadDocumentsFromFolder(root: string): Promise<LoadResult> {
  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      console.warn(`[Loader] '${root}' is not a directory, nothing to load.`);
      return { documents: [], rejected: [] };
    }
  } catch (error) {
    console.warn(`[Loader] Folder '${root}' cannot be read, nothing to load:`, error);
    return { documents: [], rejected: [] };
  }

  console.log(`[Loader] Scanning directory: ${root}`);
  const files = await fg('**/*', {
    cwd: root,
    ignore: DEFAULT_IGNORES,
    onlyFiles: true,
    dot: false,
  });
  files.sort();

  const documents: SourceDocument[] = [];
  const rejected: RejectedFile[] = [];
  for (const relativePath of files) {
    let format: SourceDocument['format'];
    try {
      format = formatFromFileName(relativePath);
    } catch (error) {
      if (!isRagError(error)) throw error;
      rejected.push({ path: relativePath, reason: error.message });
      continue;
    }
    try {
      const bytes = await fs.readFile(path.join(root, relativePath));
      documents.push({
        id: relativePath,
        format,
        bytes: new Uint8Array(bytes),
        source: path.basename(relativePath),
      });
    } catch (error) {
      console.warn(`[Loader] Skipping file ${relativePath} due to read error:`, error);
      rejected.push({
        path: relativePath,
        reason: `Read failed: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  console.log(`[Loader] Loaded ${documents.length} documents, rejected ${rejected.length} files.`);
  return { documents, rejected };
}
