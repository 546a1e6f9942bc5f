import path from 'node:path';
import { SnapshotInvalid, jsonPart, textPart } from '@civic-rag/core';
import { EmbeddingModelProvider } from '@civic-rag/rag-core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { runCli } from './cli.js';

const mocks = vi.hoisted(() => ({
  buildCommand: vi.fn(),
  askCommand: vi.fn(),
  retrieveCommand: vi.fn(),
  statusCommand: vi.fn(),
}));

vi.mock('./commands.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./commands.js')>()),
  buildCommand: mocks.buildCommand,
  askCommand: mocks.askCommand,
  retrieveCommand: mocks.retrieveCommand,
  statusCommand: mocks.statusCommand,
}));

const CWD = '/work';

describe('runCli', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should run ask with the question and top-k', async () => {
    mocks.askCommand.mockResolvedValue([textPart('Antwort [[a.pdf::chunk_0]]')]);

    const code = await runCli(['ask', 'Was kostet ein Parkausweis?', '--top-k', '3'], CWD);

    expect(code).toBe(0);
    expect(mocks.askCommand).toHaveBeenCalledWith(
      expect.objectContaining({
        indexPath: path.resolve(CWD, '.civic-rag/index.json'),
        workspaceRoot: CWD,
        question: 'Was kostet ein Parkausweis?',
        topK: 3,
      }),
    );
    expect(console.log).toHaveBeenCalledWith('Antwort [[a.pdf::chunk_0]]');
  });

  it('should run retrieve with the query and top-k', async () => {
    mocks.retrieveCommand.mockResolvedValue([
      textPart('Found 1 passages for "Hundesteuer":'),
      textPart('--- Result 1 (score 0.7000, dense 0.0000, sparse 1.0000) ---'),
    ]);

    const code = await runCli(['retrieve', 'Hundesteuer', '--top-k', '1', '--index', 'idx.json'], CWD);

    expect(code).toBe(0);
    expect(mocks.retrieveCommand).toHaveBeenCalledWith(
      expect.objectContaining({ indexPath: path.resolve(CWD, 'idx.json'), query: 'Hundesteuer', topK: 1 }),
    );
    expect(mocks.askCommand).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith(
      'Found 1 passages for "Hundesteuer":\n\n--- Result 1 (score 0.7000, dense 0.0000, sparse 1.0000) ---',
    );
  });

  it('should pass provider flags into the configuration', async () => {
    mocks.buildCommand.mockResolvedValue([textPart('Indexed 0 chunks from 0 documents in 1 ms.')]);

    const code = await runCli(
      ['build', 'dokumente', '--index', 'out/index.json', '--embedding-provider', 'ollama', '--dense-weight', '0.5'],
      CWD,
    );

    expect(code).toBe(0);
    const [options] = mocks.buildCommand.mock.calls[0];
    expect(options.folder).toBe('dokumente');
    expect(options.indexPath).toBe(path.resolve(CWD, 'out/index.json'));
    expect(options.config.embedding).toEqual({ provider: EmbeddingModelProvider.Ollama });
    expect(options.config.retrieval).toEqual({ weights: { dense: 0.5 } });
  });

  it('should print json output on request', async () => {
    mocks.statusCommand.mockResolvedValue([
      textPart('Index contains 2 chunks from 1 documents (2 vectors, 9 terms).'),
      jsonPart({ chunks: 2 }, z.object({ chunks: z.number() })),
    ]);

    await runCli(['status', '--json'], CWD);

    expect(console.log).toHaveBeenCalledWith('{\n  "chunks": 2\n}');
  });

  it('should report failures with their suggestion and a non-zero exit code', async () => {
    mocks.statusCommand.mockRejectedValue(new SnapshotInvalid('chunks: Required'));

    const code = await runCli(['status'], CWD);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error: Index snapshot is invalid: chunks: Required');
    expect(console.error).toHaveBeenCalledWith('Suggestion: Rebuild the index from the source documents.');
  });

  it('should fail without a command', async () => {
    const code = await runCli([], CWD);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error: Choose a command: build, ask, retrieve or status.');
  });

  it('should reject an unknown provider', async () => {
    const code = await runCli(['status', '--embedding-provider', 'openai'], CWD);

    expect(code).toBe(1);
    expect(mocks.statusCommand).not.toHaveBeenCalled();
  });
});
