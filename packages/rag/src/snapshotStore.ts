import fs from 'node:fs/promises';
import path from 'node:path';
import type { KnowledgeBaseSnapshot } from '@civic-rag/rag-core';

export const DEFAULT_INDEX_PATH = path.join('.civic-rag', 'index.json');

/** Writes the snapshot as JSON, creating the parent directory when needed. */
export async function writeSnapshot(indexPath: string, snapshot: KnowledgeBaseSnapshot): Promise<void> {
  await fs.mkdir(path.dirname(indexPath), { recursive: true });
  await fs.writeFile(indexPath, JSON.stringify(snapshot), 'utf-8');
  console.log(`[SnapshotStore] Wrote ${snapshot.chunks.length} chunks to ${indexPath}`);
}

/**
 * Reads a snapshot file. Its content is validated when a pipeline restores it.
 * @throws Error when the file is missing or not JSON.
 */
export async function readSnapshot(indexPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(indexPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`No index found at '${indexPath}' (${message}). Run 'civic-rag build <folder>' first.`);
  }
  try {
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Index file '${indexPath}' is not valid JSON: ${message}`);
  }
}
