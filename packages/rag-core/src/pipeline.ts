import { CapabilityTimeout, UnsupportedFormat, isRagError, withTimeout } from '@civic-rag/core';
import {
  type ExtractionStatus,
  type OcrFunction,
  type SourceDocument,
  createOcrFunction,
  extract,
  isSupportedFormat,
} from '@civic-rag/extract-core';
import { z } from 'zod';
import { type Answer, AnswerGenerator } from './answerGenerator.js';
import { segment } from './chunking.js';
import { type CompletionFunction, createCompletionFunction } from './completion.js';
import { type RagConfig, parseRagConfig } from './config.js';
import { DenseIndex } from './denseIndex.js';
import { type EmbeddingVector, type IEmbeddingFunction, createEmbeddingFunction } from './embedding.js';
import { HybridRetriever, type RetrievalResult } from './hybridRetriever.js';
import { KnowledgeBase, type KnowledgeBaseSnapshot, type KnowledgeBaseStatus } from './knowledgeBase.js';
import type { Chunk } from './types.js';

export const BuildReportSchema = z.object({
  /** Documents that produced text. */
  documents: z.number().int().nonnegative(),
  chunks: z.number().int().nonnegative(),
  /** Ids of the documents whose text came from optical recognition. */
  ocrDocuments: z.array(z.string()),
  failures: z.array(z.object({ documentId: z.string(), code: z.string(), message: z.string() })),
  warnings: z.array(
    z.object({ documentId: z.string(), code: z.literal('SEGMENTATION_EMPTY'), message: z.string() }),
  ),
  durationMs: z.number().nonnegative(),
});

export type BuildReport = z.infer<typeof BuildReportSchema>;
export type BuildFailure = BuildReport['failures'][number];

export interface PipelineDependencies {
  embeddingFn: IEmbeddingFunction;
  completion: CompletionFunction;
  /** `null` disables the OCR fallback. */
  ocr: OcrFunction | null;
}

type DocumentOutcome =
  | { ok: true; documentId: string; status: ExtractionStatus; chunks: Chunk[] }
  | { ok: false; failure: BuildFailure };

/**
 * Build phase: extract, segment, embed and index a document set into a fresh knowledge base.
 *
 * `dense` may share its remote collection with the knowledge base still serving queries, so
 * it is cleared only once every chunk has been embedded.
 */
export class IndexBuilder {
  constructor(
    private readonly config: RagConfig,
    private readonly dependencies: PipelineDependencies,
  ) {}

  async build(
    documents: SourceDocument[],
    dense: DenseIndex,
  ): Promise<{ knowledgeBase: KnowledgeBase; report: BuildReport }> {
    const startedAt = Date.now();
    console.log(`[IndexBuilder] Building index from ${documents.length} documents...`);

    const outcomes: DocumentOutcome[] = [];
    const seen = new Set<string>();
    const unique: SourceDocument[] = [];
    for (const document of documents) {
      if (seen.has(document.id)) {
        outcomes.push({
          ok: false,
          failure: { documentId: document.id, code: 'DUPLICATE_DOCUMENT', message: `Duplicate document id '${document.id}'.` },
        });
        continue;
      }
      seen.add(document.id);
      unique.push(document);
    }

    const concurrency = this.config.buildConcurrency;
    for (let i = 0; i < unique.length; i += concurrency) {
      const batch = unique.slice(i, i + concurrency);
      outcomes.push(...(await Promise.all(batch.map((document) => this.processDocument(document)))));
    }

    const report: BuildReport = {
      documents: 0,
      chunks: 0,
      ocrDocuments: [],
      failures: [],
      warnings: [],
      durationMs: 0,
    };
    const chunks: Chunk[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        report.failures.push(outcome.failure);
        continue;
      }
      report.documents++;
      if (outcome.status === 'ocr') report.ocrDocuments.push(outcome.documentId);
      if (outcome.chunks.length === 0) {
        report.warnings.push({
          documentId: outcome.documentId,
          code: 'SEGMENTATION_EMPTY',
          message: `Document '${outcome.documentId}' produced no chunks.`,
        });
      }
      chunks.push(...outcome.chunks);
    }

    const vectors = await this.embedChunks(chunks);
    await dense.clear();
    const knowledgeBase = new KnowledgeBase(dense);
    await this.indexChunks(knowledgeBase, chunks, vectors);
    report.chunks = chunks.length;
    report.durationMs = Date.now() - startedAt;

    console.log(
      `[IndexBuilder] Indexed ${report.chunks} chunks from ${report.documents} documents ` +
        `(${report.ocrDocuments.length} via OCR, ${report.failures.length} failed) in ${report.durationMs} ms.`,
    );
    return { knowledgeBase, report };
  }

  private async processDocument(document: SourceDocument): Promise<DocumentOutcome> {
    try {
      if (!isSupportedFormat(document.format)) {
        throw new UnsupportedFormat(document.format, document.id);
      }
      const extracted = await extract(document, {
        ocr: this.dependencies.ocr,
        options: this.config.extraction,
      });
      const chunks = segment(
        {
          documentId: document.id,
          source: document.source ?? document.id,
          text: extracted.text,
          ocrDerived: extracted.status === 'ocr',
          pageOffsets: document.format === 'pdf' ? extracted.pageOffsets : [],
        },
        this.config.chunking,
      );
      return { ok: true, documentId: document.id, status: extracted.status, chunks };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[IndexBuilder] ${message}`);
      return {
        ok: false,
        failure: { documentId: document.id, code: isRagError(error) ? error.code : 'UNEXPECTED_ERROR', message },
      };
    }
  }

  /** One vector per chunk, requested in batches of `embedding.batchSize`. */
  private async embedChunks(chunks: Chunk[]): Promise<EmbeddingVector[]> {
    const { batchSize } = this.config.embedding;
    const timeoutMs = this.config.embeddingTimeoutMs;
    const vectors: EmbeddingVector[] = [];
    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch = chunks.slice(i, i + batchSize);
      const batchVectors = await withTimeout(
        (signal) =>
          this.dependencies.embeddingFn.generate(
            batch.map((chunk) => chunk.text),
            signal,
          ),
        timeoutMs,
        () => new CapabilityTimeout('embedding', timeoutMs),
      );
      if (batchVectors.length !== batch.length) {
        throw new Error(`Embedding count mismatch: expected ${batch.length}, got ${batchVectors.length}`);
      }
      vectors.push(...batchVectors);
      console.log(`[IndexBuilder] Embedded ${vectors.length}/${chunks.length} chunks.`);
    }
    return vectors;
  }

  /** Insertion into the indexes happens one batch at a time. */
  private async indexChunks(knowledgeBase: KnowledgeBase, chunks: Chunk[], vectors: EmbeddingVector[]): Promise<void> {
    const { batchSize } = this.config.embedding;
    for (let i = 0; i < chunks.length; i += batchSize) {
      await knowledgeBase.addChunks(chunks.slice(i, i + batchSize), vectors.slice(i, i + batchSize));
    }
  }
}

/**
 * Query phase over a knowledge base that no longer changes.
 */
export class QueryEngine {
  private readonly retriever: HybridRetriever;
  private readonly generator: AnswerGenerator;

  constructor(
    readonly knowledgeBase: KnowledgeBase,
    config: RagConfig,
    dependencies: PipelineDependencies,
  ) {
    this.retriever = new HybridRetriever({
      knowledgeBase,
      embeddingFn: dependencies.embeddingFn,
      options: config.retrieval,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
    });
    this.generator = new AnswerGenerator(dependencies.completion, config.generation);
  }

  retrieve(query: string, k?: number): Promise<RetrievalResult> {
    return this.retriever.retrieve(query, k);
  }

  async ask(query: string, k?: number): Promise<Answer> {
    const retrieval = await this.retrieve(query, k);
    return this.generator.generate(query, retrieval);
  }
}

/**
 * Entry point: owns the current knowledge base and exposes build and query operations.
 * Each instance is independent of every other.
 */
export class RagPipeline {
  private engine: QueryEngine;

  private constructor(
    readonly config: RagConfig,
    private readonly dependencies: PipelineDependencies,
    knowledgeBase: KnowledgeBase,
  ) {
    this.engine = new QueryEngine(knowledgeBase, config, dependencies);
  }

  /**
   * @param configInput Partial configuration, validated with `RagConfigSchema`.
   * @param overrides Capabilities to use instead of the configured providers.
   */
  public static async create(
    configInput: unknown = {},
    overrides: Partial<PipelineDependencies> = {},
  ): Promise<RagPipeline> {
    const config = parseRagConfig(configInput);
    const dependencies: PipelineDependencies = {
      embeddingFn: overrides.embeddingFn ?? createEmbeddingFunction(config.embedding),
      completion: overrides.completion ?? createCompletionFunction(config.completion),
      ocr: overrides.ocr !== undefined ? overrides.ocr : createOcrFunction(config.ocr),
    };
    const dense = await DenseIndex.create(config.vectorDb, dependencies.embeddingFn);
    return new RagPipeline(config, dependencies, new KnowledgeBase(dense));
  }

  /** Creates a pipeline and loads `snapshot` into it. */
  public static async restore(
    snapshot: unknown,
    configInput: unknown = {},
    overrides: Partial<PipelineDependencies> = {},
  ): Promise<RagPipeline> {
    const pipeline = await RagPipeline.create(configInput, overrides);
    await pipeline.loadSnapshot(snapshot);
    return pipeline;
  }

  get knowledgeBase(): KnowledgeBase {
    return this.engine.knowledgeBase;
  }

  /** Full rebuild; the new knowledge base replaces the current one once complete. */
  async buildIndex(documents: SourceDocument[]): Promise<BuildReport> {
    const dense = await DenseIndex.create(this.config.vectorDb, this.dependencies.embeddingFn);
    const builder = new IndexBuilder(this.config, this.dependencies);
    const { knowledgeBase, report } = await builder.build(documents, dense);
    this.engine = new QueryEngine(knowledgeBase, this.config, this.dependencies);
    return report;
  }

  retrieve(query: string, k?: number): Promise<RetrievalResult> {
    return this.engine.retrieve(query, k);
  }

  ask(query: string, k?: number): Promise<Answer> {
    return this.engine.ask(query, k);
  }

  status(): Promise<KnowledgeBaseStatus> {
    return this.knowledgeBase.status();
  }

  snapshot(): KnowledgeBaseSnapshot {
    return this.knowledgeBase.snapshot();
  }

  async loadSnapshot(snapshot: unknown): Promise<void> {
    const dense = await DenseIndex.create(this.config.vectorDb, this.dependencies.embeddingFn);
    const knowledgeBase = await KnowledgeBase.restore(snapshot, dense);
    this.engine = new QueryEngine(knowledgeBase, this.config, this.dependencies);
  }
}
