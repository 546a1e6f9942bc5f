import { GenerationFault, GenerationTimeout, withTimeout } from '@civic-rag/core';
import { z } from 'zod';
import type { CompletionFunction } from './completion.js';
import type { RetrievalHit, RetrievalResult } from './hybridRetriever.js';
import { REFUSAL_TEXT, buildPrompt, evidenceBlock, isRefusal, parseCitations, sourceLine, stripCitations } from './prompt.js';
import type { Chunk } from './types.js';

export const GenerationOptionsSchema = z.object({
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0),
  topP: z.number().gt(0).max(1).default(0.9),
  timeoutMs: z.number().int().positive().default(120_000),
  /** Upper bound on the evidence handed to the model, in characters. */
  maxContextChars: z.number().int().positive().default(4000),
  /** `strip`: drop unknown citations and flag the answer. `reject`: replace the answer. */
  citationPolicy: z.enum(['strip', 'reject']).default('strip'),
});

export type GenerationOptions = z.infer<typeof GenerationOptionsSchema>;

export const AnswerFaultSchema = z.object({
  code: z.enum(['UNVERIFIED_CITATIONS', 'MISSING_CITATIONS', 'EMPTY_RESPONSE']),
  message: z.string(),
  rejectedCitations: z.array(z.string()),
});

export type AnswerFault = z.infer<typeof AnswerFaultSchema>;

export const AnswerSchema = z.object({
  text: z.string(),
  /** Chunk ids the answer cites, all taken from the evidence. */
  citations: z.array(z.string()),
  /** One human-readable source line per citation. */
  sources: z.array(z.string()),
  /** `false` for refusals and degraded answers. */
  grounded: z.boolean(),
  lowConfidence: z.boolean(),
  fault: AnswerFaultSchema.optional(),
});

export type Answer = z.infer<typeof AnswerSchema>;

export function refusalAnswer(): Answer {
  return { text: REFUSAL_TEXT, citations: [], sources: [], grounded: false, lowConfidence: false };
}

/** Returned whenever the model's citations cannot be verified. */
export function degradedAnswer(fault: AnswerFault): Answer {
  return { text: REFUSAL_TEXT, citations: [], sources: [], grounded: false, lowConfidence: true, fault };
}

/**
 * Evidence in rank order until the character budget would be exceeded. Chunks repeating
 * the text of an earlier one are skipped. The best chunk is always included.
 */
export function selectContext(hits: RetrievalHit[], maxContextChars: number): Chunk[] {
  const selected: Chunk[] = [];
  const seenTexts = new Set<string>();
  let used = 0;
  for (const { chunk } of hits) {
    const normalized = chunk.text.trim();
    if (seenTexts.has(normalized)) continue;
    const size = evidenceBlock(chunk).length + 2;
    if (selected.length > 0 && used + size > maxContextChars) break;
    selected.push(chunk);
    seenTexts.add(normalized);
    used += size;
  }
  return selected;
}

export class AnswerGenerator {
  readonly options: GenerationOptions;

  constructor(
    private readonly completion: CompletionFunction,
    options: Partial<GenerationOptions> = {},
  ) {
    this.options = GenerationOptionsSchema.parse(options);
  }

  /**
   * Answers `query` from the retrieved evidence only.
   *
   * @throws GenerationTimeout when the model does not answer within `timeoutMs`.
   * @throws GenerationFault for any other failure of the completion capability.
   */
  async generate(query: string, retrieval: RetrievalResult): Promise<Answer> {
    const context = selectContext(retrieval.hits, this.options.maxContextChars);
    if (context.length === 0) {
      console.log('[AnswerGenerator] No evidence retrieved, returning refusal.');
      return refusalAnswer();
    }

    const raw = await this.complete(buildPrompt(query, context));
    const text = raw.trim();
    if (text === '') {
      console.warn('[AnswerGenerator] Model returned an empty response.');
      return degradedAnswer({
        code: 'EMPTY_RESPONSE',
        message: 'The model returned an empty response.',
        rejectedCitations: [],
      });
    }
    if (isRefusal(text)) {
      return refusalAnswer();
    }

    const evidence = new Map(context.map((chunk) => [chunk.id, chunk]));
    const cited = parseCitations(text);
    const unknown = cited.filter((id) => !evidence.has(id));
    const valid = cited.filter((id) => evidence.has(id));

    let fault: AnswerFault | undefined;
    if (unknown.length > 0) {
      console.warn(`[AnswerGenerator] Answer cites unknown chunk ids: ${unknown.join(', ')}`);
      fault = {
        code: 'UNVERIFIED_CITATIONS',
        message: `Answer cited ${unknown.length} id(s) not present in the evidence: ${unknown.join(', ')}.`,
        rejectedCitations: unknown,
      };
      if (this.options.citationPolicy === 'reject') {
        return degradedAnswer(fault);
      }
    }

    if (valid.length === 0) {
      console.warn('[AnswerGenerator] Answer carries no verifiable citation.');
      return degradedAnswer({
        code: 'MISSING_CITATIONS',
        message: 'Answer contains no citation of the provided evidence.',
        rejectedCitations: unknown,
      });
    }

    const answer: Answer = {
      text: unknown.length > 0 ? stripCitations(text, new Set(unknown)) : text,
      citations: valid,
      sources: valid.flatMap((id) => {
        const chunk = evidence.get(id);
        return chunk ? [sourceLine(chunk)] : [];
      }),
      grounded: true,
      lowConfidence: fault !== undefined,
    };
    if (fault) answer.fault = fault;
    return answer;
  }

  private async complete(prompt: string): Promise<string> {
    const { maxTokens, temperature, topP, timeoutMs } = this.options;
    try {
      return await withTimeout(
        (signal) => this.completion.complete(prompt, { maxTokens, temperature, topP, signal }),
        timeoutMs,
        () => new GenerationTimeout(timeoutMs),
      );
    } catch (error) {
      if (error instanceof GenerationTimeout) {
        console.error(`[AnswerGenerator] Completion timed out after ${timeoutMs} ms.`);
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[AnswerGenerator] Completion failed: ${message}`);
      throw new GenerationFault(message, error);
    }
  }
}
