import path from 'node:path';
import { toToolError } from '@civic-rag/core';
import { OcrProvider } from '@civic-rag/extract-core';
import { CompletionProvider, EmbeddingModelProvider, VectorDbProvider } from '@civic-rag/rag-core';
import yargs from 'yargs';
import { askCommand, buildCommand, renderParts, retrieveCommand, statusCommand } from './commands.js';
import { type ProviderOptions, toRagConfigInput } from './options.js';
import { DEFAULT_INDEX_PATH } from './snapshotStore.js';

interface GlobalArgs extends ProviderOptions {
  index: string;
  json: boolean;
}

/**
 * Declares the `build`, `ask`, `retrieve` and `status` commands. Every flag can also be set through a
 * `CIVIC_RAG_` environment variable, e.g. `CIVIC_RAG_EMBEDDING_PROVIDER=ollama`.
 */
export function createCli(args: string[], cwd: string) {
  const common = (argv: GlobalArgs) => ({
    indexPath: path.resolve(cwd, argv.index),
    config: toRagConfigInput(argv),
    workspaceRoot: cwd,
  });
  const print = (output: string) => {
    console.log(output);
  };

  return yargs(args)
    .scriptName('civic-rag')
    .env('CIVIC_RAG')
    .option('index', {
      type: 'string',
      default: DEFAULT_INDEX_PATH,
      description: 'Index file written by build and read by ask and status',
    })
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Print structured output instead of text',
    })
    .option('embedding-provider', {
      choices: Object.values(EmbeddingModelProvider),
      default: EmbeddingModelProvider.Mock,
      description: 'Embedding model provider',
    })
    .option('ollama-model', {
      type: 'string',
      description: 'Ollama embedding model name',
    })
    .option('ollama-base-url', {
      type: 'string',
      description: 'Ollama base URL (optional)',
    })
    .option('http-embedding-url', {
      type: 'string',
      description: 'URL for HTTP embedding endpoint (required if embedding-provider=http)',
    })
    .option('http-embedding-headers', {
      type: 'string',
      description: 'JSON string of headers for HTTP embedding endpoint (optional)',
    })
    .option('completion-provider', {
      choices: Object.values(CompletionProvider),
      default: CompletionProvider.Mock,
      description: 'Language model provider for answers',
    })
    .option('completion-model', {
      type: 'string',
      description: 'Model name for the completion provider',
    })
    .option('completion-base-url', {
      type: 'string',
      description: 'Base URL of an Ollama or OpenAI-compatible endpoint',
    })
    .option('completion-api-key', {
      type: 'string',
      description: 'API key for the HTTP completion endpoint (optional)',
    })
    .option('ocr-provider', {
      choices: Object.values(OcrProvider),
      default: OcrProvider.None,
      description: 'Optical recognition for scanned PDFs',
    })
    .option('ocr-url', {
      type: 'string',
      description: 'URL for HTTP OCR endpoint (required if ocr-provider=http)',
    })
    .option('db-provider', {
      choices: Object.values(VectorDbProvider),
      default: VectorDbProvider.InMemory,
      description: 'Vector DB provider',
    })
    .option('collection-name', {
      type: 'string',
      description: 'Name of the ChromaDB collection',
    })
    .option('chroma-path', {
      type: 'string',
      description: 'ChromaDB server URL',
    })
    .option('pinecone-api-key', {
      type: 'string',
      description: 'Pinecone API Key (required if db-provider=pinecone)',
    })
    .option('pinecone-index-name', {
      type: 'string',
      description: 'Pinecone Index Name (required if db-provider=pinecone)',
    })
    .option('pinecone-namespace', {
      type: 'string',
      description: 'Pinecone Namespace (optional)',
    })
    .option('dense-weight', {
      type: 'number',
      description: 'Weight of the normalised dense score (default 0.3)',
    })
    .option('sparse-weight', {
      type: 'number',
      description: 'Weight of the normalised BM25 score (default 0.7)',
    })
    .option('chunk-size', {
      type: 'number',
      description: 'Maximum chunk length in characters (default 1000)',
    })
    .option('chunk-overlap', {
      type: 'number',
      description: 'Overlap between fixed-size windows (default 100)',
    })
    .option('citation-policy', {
      choices: ['strip', 'reject'] as const,
      description: 'What to do with citations of passages outside the evidence',
    })
    .option('generation-timeout', {
      type: 'number',
      description: 'Time limit for one answer in milliseconds',
    })
    .command(
      'build <folder>',
      'Index every supported document in a folder',
      (y) => y.positional('folder', { type: 'string', demandOption: true, description: 'Folder with source documents' }),
      async (argv) => {
        const parts = await buildCommand({ ...common(argv), folder: argv.folder });
        print(renderParts(parts, argv.json));
      },
    )
    .command(
      'ask <question>',
      'Answer a question from the index',
      (y) =>
        y
          .positional('question', { type: 'string', demandOption: true, description: 'Question in plain language' })
          .option('top-k', { type: 'number', description: 'Passages to retrieve (default 5)' }),
      async (argv) => {
        const parts = await askCommand({ ...common(argv), question: argv.question, topK: argv.topK });
        print(renderParts(parts, argv.json));
      },
    )
    .command(
      'retrieve <query>',
      'List the passages that best match a query, without generating an answer',
      (y) =>
        y
          .positional('query', { type: 'string', demandOption: true, description: 'Search text' })
          .option('top-k', { type: 'number', description: 'Passages to retrieve (default 5)' }),
      async (argv) => {
        const parts = await retrieveCommand({ ...common(argv), query: argv.query, topK: argv.topK });
        print(renderParts(parts, argv.json));
      },
    )
    .command(
      'status',
      'Show what the index contains',
      (y) => y,
      async (argv) => {
        const parts = await statusCommand(common(argv));
        print(renderParts(parts, argv.json));
      },
    )
    .demandCommand(1, 'Choose a command: build, ask, retrieve or status.')
    .strict()
    .help()
    .alias('h', 'help')
    .exitProcess(false)
    .fail(false);
}

/**
 * Runs one command and reports failures as message plus suggestion.
 * @returns The process exit code.
 */
export async function runCli(args: string[], cwd: string): Promise<number> {
  try {
    await createCli(args, cwd).parseAsync();
    return 0;
  } catch (error) {
    const { message, suggestion } = toToolError(error);
    console.error(`Error: ${message}`);
    if (suggestion) console.error(`Suggestion: ${suggestion}`);
    return 1;
  }
}
