import type { Chunk } from './types.js';

/** The exact sentence the model must give when the evidence does not answer the question. */
export const REFUSAL_TEXT = 'Dazu liegt mir keine verlässliche Information vor.';

const CITATION_PATTERN = /\[\[(.+?)\]\](?!\])/g;

export function citationMarker(chunkId: string): string {
  return `[[${chunkId}]]`;
}

/** Chunk ids cited in `text`, in order of first appearance. */
export function parseCitations(text: string): string[] {
  const ids = new Set<string>();
  for (const match of text.matchAll(CITATION_PATTERN)) {
    ids.add(match[1].trim());
  }
  return [...ids];
}

/** Removes the markers of the given ids and tidies the whitespace left behind. */
export function stripCitations(text: string, ids: ReadonlySet<string>): string {
  return text
    .replace(CITATION_PATTERN, (marker, id: string) => (ids.has(id.trim()) ? '' : marker))
    .replace(/[ \t]+([.,;:!?])/g, '$1')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/[ \t]+$/gm, '')
    .trim();
}

export function isRefusal(text: string): boolean {
  return text.trim().replace(/\s+/g, ' ') === REFUSAL_TEXT;
}

/** `satzung.pdf (Seite 2, § 12, Abs. 1)` */
export function sourceLine(chunk: Chunk): string {
  const details = [
    ...(chunk.metadata.page !== undefined ? [`Seite ${chunk.metadata.page}`] : []),
    ...chunk.structuralPath,
  ];
  return details.length > 0 ? `${chunk.metadata.source} (${details.join(', ')})` : chunk.metadata.source;
}

export function evidenceBlock(chunk: Chunk): string {
  return `${citationMarker(chunk.id)} Quelle: ${sourceLine(chunk)}\n${chunk.text}`;
}

const INSTRUCTIONS = [
  'Du beantwortest Fragen von Bürgerinnen und Bürgern zu Dokumenten einer Kommunalverwaltung.',
  'Regeln:',
  '- Antworte ausschließlich auf Grundlage der unten aufgeführten Belege. Nutze kein Vorwissen.',
  '- Belege jede Aussage mit der Kennung des verwendeten Belegs in der Form [[Kennung]].',
  '- Verwende nur Kennungen, die bei den Belegen angegeben sind.',
  '- Nenne Gebühren, Beträge und Fristen nur, wenn sie wörtlich in einem Beleg stehen.',
  '- Gliedere Antworten mit mehreren Punkten als nummerierte Liste oder Tabelle.',
  `- Reichen die Belege nicht aus, antworte genau mit: ${REFUSAL_TEXT}`,
].join('\n');

/**
 * Builds the constrained prompt: instructions, the evidence in rank order, then the question.
 */
export function buildPrompt(query: string, chunks: Chunk[]): string {
  const evidence = chunks.map(evidenceBlock).join('\n\n');
  return `${INSTRUCTIONS}\n\nBelege:\n\n${evidence}\n\nFrage: ${query.trim()}\n\nAntwort:`;
}
