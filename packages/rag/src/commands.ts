import { type Part, isJsonPart, isTextPart } from '@civic-rag/core';
import {
  RagPipeline,
  type RagConfigInput,
  askTool,
  buildIndexTool,
  indexStatusTool,
  retrieveTool,
} from '@civic-rag/rag-core';
import { readSnapshot, writeSnapshot } from './snapshotStore.js';

interface CommandBase {
  indexPath: string;
  config: RagConfigInput;
  /** Base for relative paths given on the command line. */
  workspaceRoot: string;
}

export interface BuildCommandOptions extends CommandBase {
  folder: string;
}

export interface AskCommandOptions extends CommandBase {
  question: string;
  topK?: number;
}

/** Rebuilds the index from `folder` and stores it at `indexPath`. */
export async function buildCommand(options: BuildCommandOptions): Promise<Part[]> {
  const pipeline = await RagPipeline.create(options.config);
  const parts = await buildIndexTool.execute({
    context: { workspaceRoot: options.workspaceRoot, allowOutsideWorkspace: true, pipeline },
    args: { folder: options.folder },
  });
  await writeSnapshot(options.indexPath, pipeline.snapshot());
  return parts;
}

async function openPipeline(options: CommandBase): Promise<RagPipeline> {
  return RagPipeline.restore(await readSnapshot(options.indexPath), options.config);
}

export async function askCommand(options: AskCommandOptions): Promise<Part[]> {
  const pipeline = await openPipeline(options);
  return askTool.execute({
    context: { workspaceRoot: options.workspaceRoot, pipeline },
    args: { question: options.question, topK: options.topK },
  });
}

export interface RetrieveCommandOptions extends CommandBase {
  query: string;
  topK?: number;
}

/** Ranked passages for `query`, without asking the language model. */
export async function retrieveCommand(options: RetrieveCommandOptions): Promise<Part[]> {
  const pipeline = await openPipeline(options);
  return retrieveTool.execute({
    context: { workspaceRoot: options.workspaceRoot, pipeline },
    args: { query: options.query, topK: options.topK },
  });
}

export async function statusCommand(options: CommandBase): Promise<Part[]> {
  const pipeline = await openPipeline(options);
  return indexStatusTool.execute({ context: { workspaceRoot: options.workspaceRoot, pipeline }, args: {} });
}

/** Text parts as they are, or the JSON parts' values when `json` is set. */
export function renderParts(parts: Part[], json: boolean): string {
  if (json) {
    const values = parts.filter(isJsonPart).map((part) => part.value);
    return JSON.stringify(values.length === 1 ? values[0] : values, null, 2);
  }
  return parts
    .filter(isTextPart)
    .map((part) => part.value)
    .join('\n\n');
}
