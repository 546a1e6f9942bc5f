import { defineTool, jsonPart, textPart } from '@civic-rag/core';
import type { Part } from '@civic-rag/core';
import type { z } from 'zod';
import { type Answer, AnswerSchema } from '../answerGenerator.js';
import { askToolInputSchema } from './askTool.schema.js';
import { RagToolContextSchema } from './context.js';

export type AskToolInput = z.infer<typeof askToolInputSchema>;

/** Answer text followed by a numbered source list. */
export function formatAnswer(answer: Answer): string {
  if (answer.sources.length === 0) return answer.text;
  const sources = answer.sources.map((source, i) => `${i + 1}. ${source} [[${answer.citations[i]}]]`);
  return `${answer.text}\n\nQuellen:\n${sources.join('\n')}`;
}

export const askTool = defineTool({
  name: 'ask',
  description: 'Answers a question from the indexed documents, citing the passages it relies on.',
  inputSchema: askToolInputSchema,
  contextSchema: RagToolContextSchema,

  execute: async ({ context, args }): Promise<Part[]> => {
    const answer = await context.pipeline.ask(args.question, args.topK);
    const parts: Part[] = [textPart(formatAnswer(answer))];
    if (answer.fault) {
      parts.push(textPart(`Hinweis: ${answer.fault.message}`));
    }
    parts.push(jsonPart(answer, AnswerSchema));
    return parts;
  },
});
