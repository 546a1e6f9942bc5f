import { defineTool, jsonPart, textPart, validateAndResolvePath } from '@civic-rag/core';
import type { Part } from '@civic-rag/core';
import type { z } from 'zod';
import { loadDocumentsFromFolder } from '../loader.js';
import { BuildIndexResultSchema, buildIndexToolInputSchema } from './buildIndexTool.schema.js';
import { RagToolContextSchema } from './context.js';

export type BuildIndexToolInput = z.infer<typeof buildIndexToolInputSchema>;
export type BuildIndexResult = z.infer<typeof BuildIndexResultSchema>;

function summarize({ report, rejected }: BuildIndexResult): string {
  const lines = [
    `Indexed ${report.chunks} chunks from ${report.documents} documents in ${report.durationMs} ms.`,
  ];
  if (report.ocrDocuments.length > 0) {
    lines.push(`Read via OCR: ${report.ocrDocuments.join(', ')}`);
  }
  for (const failure of report.failures) {
    lines.push(`Failed: ${failure.documentId} (${failure.code}) ${failure.message}`);
  }
  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning.message}`);
  }
  for (const file of rejected) {
    lines.push(`Skipped: ${file.path}: ${file.reason}`);
  }
  return lines.join('\n');
}

export const buildIndexTool = defineTool({
  name: 'buildIndex',
  description: 'Rebuilds the knowledge base from every PDF, DOCX and Excel document in a folder.',
  inputSchema: buildIndexToolInputSchema,
  contextSchema: RagToolContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const resolved = validateAndResolvePath(args.folder, context.workspaceRoot, context.allowOutsideWorkspace);
    if (typeof resolved !== 'string') {
      throw new Error(`${resolved.error} ${resolved.suggestion}`);
    }

    const { documents, rejected } = await loadDocumentsFromFolder(resolved);
    const report = await context.pipeline.buildIndex(documents);
    const result: BuildIndexResult = { report, rejected };

    return [textPart(summarize(result)), jsonPart(result, BuildIndexResultSchema)];
  },
});
